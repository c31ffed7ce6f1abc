import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

vi.mock("chalk", () => {
  const identity = (text: string) => text;
  const chain: (text: string) => string = new Proxy(identity, { get: () => chain });
  return { default: chain };
});

import { initContext, resetContext } from "../lib/cli-context.js";
import { runDoctor } from "./doctor.js";
import { fakeServices } from "./test-helpers.js";

const LINUX_AMD64 = { os: "linux", arch: "amd64", executableExtension: "" } as const;

describe("doctor command", () => {
  let workDir: string;
  let specPath: string;
  let consoleLogSpy: MockInstance;

  function printed(): string[] {
    return consoleLogSpy.mock.calls.map((call) => String(call[0]));
  }

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "cqsync-doctor-"));
    specPath = join(workDir, "sync_spec.yml");
    await writeFile(specPath, "kind: source\n");
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    initContext(["node", "cqsync", "doctor", "--quiet"], {});
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  it("warns when the binary is not cached yet", async () => {
    const fake = fakeServices({ cacheDir: workDir, specFilePath: specPath });

    await runDoctor({}, fake.factory);

    expect(printed()).toContain("✓ Platform: linux/amd64");
    expect(printed()).toContain("⚠ Cached binary: Not cached");
    expect(printed()).toContain(`✓ Spec file: ${specPath}`);
    expect(printed()).toContain("✓ Configuration: Defaults only");
    expect(printed()).toContain("⚠ 4 passed, 1 warning(s)");
    expect(process.exitCode).toBeUndefined();
    expect(fake.download).not.toHaveBeenCalled();
    expect(fake.dispose).toHaveBeenCalledTimes(1);
  });

  it("passes when the configured version is cached", async () => {
    const fake = fakeServices({ cacheDir: workDir, specFilePath: specPath });
    const cachePath = join(workDir, "cloudquery");
    await writeFile(cachePath, "#!/bin/sh\n");
    fake.metadata.record({
      path: cachePath,
      version: "v6.4.1",
      platform: LINUX_AMD64,
      url: "https://example.test/cloudquery_linux_amd64",
      downloadedAt: "2024-05-01T12:00:00.000Z",
    });

    await runDoctor({ details: true }, fake.factory);

    expect(printed()).toContain(`✓ Cached binary: v6.4.1 at ${cachePath}`);
    expect(printed()).toContain("    Downloaded 2024-05-01T12:00:00.000Z");
    expect(printed()).toContain("✓ All 5 checks passed");
  });

  it("warns when the cached binary is another version", async () => {
    const fake = fakeServices({ cacheDir: workDir, specFilePath: specPath });
    const cachePath = join(workDir, "cloudquery");
    await writeFile(cachePath, "#!/bin/sh\n");
    fake.metadata.record({
      path: cachePath,
      version: "v6.0.0",
      platform: LINUX_AMD64,
      url: "https://example.test/cloudquery_linux_amd64",
      downloadedAt: "2024-05-01T12:00:00.000Z",
    });

    await runDoctor({}, fake.factory);

    expect(printed()).toContain(
      "⚠ Cached binary: Cached binary is v6.0.0, configured version is v6.4.1"
    );
  });

  it("fails on an unsupported architecture", async () => {
    const fake = fakeServices(
      { cacheDir: workDir, specFilePath: specPath },
      { platform: "linux", arch: "s390x" }
    );

    await runDoctor({}, fake.factory);

    expect(printed()).toContain("✗ Platform: Unsupported architecture: s390x");
    expect(printed()).toContain("✗ 1 check(s) failed");
    expect(process.exitCode).toBe(1);
  });

  it("warns about a missing spec file", async () => {
    const missing = join(workDir, "missing.yml");
    const fake = fakeServices({ cacheDir: workDir });

    await runDoctor({ spec: missing }, fake.factory);

    expect(fake.factory).toHaveBeenCalledWith(expect.objectContaining({ specFilePath: missing }));
    expect(printed()).toContain(`⚠ Spec file: Not found: ${missing}`);
  });

  it("outputs the report as JSON", async () => {
    initContext(["node", "cqsync", "doctor", "--json"], {});
    const fake = fakeServices({ cacheDir: workDir, specFilePath: specPath });

    await runDoctor({ cloudqueryVersion: "v6.5.0" }, fake.factory);

    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.data.binary).toEqual({
      version: "v6.5.0",
      cached: false,
      url: "https://github.com/cloudquery/cloudquery/releases/download/cli-v6.5.0/cloudquery_linux_amd64",
      cachePath: join(workDir, "cloudquery"),
    });
    expect(output.data.system).toMatchObject({ os: "linux", arch: "x64" });
    expect(output.data.checks.map((check: { name: string; status: string }) => [check.name, check.status])).toEqual([
      ["Node.js version", "pass"],
      ["Platform", "pass"],
      ["Cached binary", "warn"],
      ["Spec file", "pass"],
      ["Configuration", "pass"],
    ]);
  });
});

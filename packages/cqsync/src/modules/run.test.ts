import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

// Identity chalk, so assertions see plain text
vi.mock("chalk", () => {
  const identity = (text: string) => text;
  const chain: (text: string) => string = new Proxy(identity, { get: () => chain });
  return { default: chain };
});

import { initContext, resetContext } from "../lib/cli-context.js";
import { configInvalid } from "../lib/errors/catalog.js";
import { registerRunCommand, runCommand } from "./run.js";
import { fakeServices, processResult, type FakeServices } from "./test-helpers.js";

describe("run command", () => {
  let workDir: string;
  let specPath: string;
  let fake: FakeServices;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "cqsync-run-"));
    specPath = join(workDir, "sync_spec.yml");
    await writeFile(specPath, "kind: source\n");
    fake = fakeServices({ cacheDir: workDir, specFilePath: specPath, retries: 0 });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    resetContext();
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(workDir, { recursive: true, force: true });
  });

  it("downloads the binary, syncs, and prints the sync output", async () => {
    await runCommand({}, fake.factory);

    expect(fake.download).toHaveBeenCalledTimes(1);
    expect(fake.run).toHaveBeenCalledWith(join(workDir, "cloudquery"), ["sync", specPath], {
      timeoutMs: 0,
      signal: fake.controller.signal,
    });
    expect(consoleLogSpy).toHaveBeenCalledWith("Sync completed successfully.");
    expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringMatching(/^✓ Sync completed in /));
    expect(consoleLogSpy).toHaveBeenCalledWith(`  Binary: ${join(workDir, "cloudquery")} (download)`);
    expect(process.exitCode).toBeUndefined();
    expect(fake.dispose).toHaveBeenCalledTimes(1);
  });

  it("prints a JSON result in JSON mode", async () => {
    initContext(["node", "cqsync", "--json"], {});

    await runCommand({}, fake.factory);

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output.success).toBe(true);
    expect(output.data.pipeline).toBe("cloudquery-sync");
    expect(output.data.specFilePath).toBe(specPath);
    expect(output.data.binary).toMatchObject({
      path: join(workDir, "cloudquery"),
      platform: "linux/amd64",
      source: "download",
      reportedVersion: "cloudquery version 6.4.1",
    });
    expect(output.data.steps.map((s: { id: string; status: string }) => `${s.id}:${s.status}`)).toEqual([
      "fetch:succeeded",
      "sync:succeeded",
    ]);
  });

  it("sets exit code 1 and reports the failed step", async () => {
    fake.run.mockImplementation(async (_command, args) =>
      args[0] === "--version"
        ? processResult({ stdout: "v6.4.1" })
        : processResult({ exitCode: 2, stdout: "partial", stderr: "Error: table failed\n" })
    );

    await runCommand({}, fake.factory);

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ CloudQuery sync failed with exit code 2");
    expect(consoleErrorSpy).toHaveBeenCalledWith("    Error: table failed");
    expect(fake.dispose).toHaveBeenCalledTimes(1);
  });

  it("puts the failed step into the JSON error", async () => {
    initContext(["node", "cqsync", "--json"], {});
    fake.download.mockRejectedValue(new Error("socket hang up"));

    await runCommand({}, fake.factory);

    expect(process.exitCode).toBe(1);
    const output = JSON.parse(String(consoleErrorSpy.mock.calls[0]?.[0]));
    expect(output.success).toBe(false);
    expect(output.error.code).toBe("DOWNLOAD_FAILED");
    expect(output.meta.step).toBe("fetch");
    expect(output.meta.steps).toEqual([
      { id: "fetch", status: "failed", attempts: 1, durationMs: expect.any(Number), errorCode: "DOWNLOAD_FAILED" },
      { id: "sync", status: "skipped", attempts: 0, durationMs: 0 },
    ]);
  });

  it("reports a missing spec file without retrying", async () => {
    await runCommand({ spec: join(workDir, "missing.yml"), retries: 3 }, fake.factory);

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringContaining("Can't find spec file"));
    expect(fake.run.mock.calls.filter(([, args]) => args[0] === "sync")).toHaveLength(0);
  });

  it("reports invalid configuration", async () => {
    fake.factory.mockImplementation(() => {
      throw configInvalid("/etc/cqsync/config.yaml", "Invalid YAML: bad");
    });

    await runCommand({}, fake.factory);

    expect(process.exitCode).toBe(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith("✗ Invalid configuration in /etc/cqsync/config.yaml");
  });

  it("maps flags onto configuration overrides", async () => {
    const program = new Command();
    program.exitOverride();
    registerRunCommand(program, fake.factory);

    await program.parseAsync([
      "node",
      "test",
      "run",
      "--spec",
      specPath,
      "--retries",
      "2",
      "--sync-timeout",
      "60000",
      "--cloudquery-version",
      "v6.5.0",
      "--versioned-cache",
    ]);

    expect(fake.factory).toHaveBeenCalledWith({
      cloudqueryVersion: "v6.5.0",
      cacheDir: undefined,
      versionedCache: true,
      releaseBaseUrl: undefined,
      downloadTimeoutMs: undefined,
      specFilePath: specPath,
      retries: 2,
      retryDelayMs: undefined,
      syncTimeoutMs: 60000,
    });
    expect(fake.run).toHaveBeenCalledWith(
      join(workDir, "cloudquery-v6.5.0-linux-amd64"),
      ["sync", specPath],
      { timeoutMs: 60000, signal: fake.controller.signal }
    );
  });

  it("rejects a negative retry count", async () => {
    const program = new Command();
    program.exitOverride();
    program.configureOutput({ writeErr: () => {} });
    registerRunCommand(program, fake.factory);

    await expect(program.parseAsync(["node", "test", "run", "--retries", "-1"])).rejects.toThrow();
    expect(fake.factory).not.toHaveBeenCalled();
  });

  it("documents where the default spec file is looked up", () => {
    const program = new Command();
    program.configureHelp({ helpWidth: 200 });
    registerRunCommand(program, fake.factory);

    const help = program.commands.find((command) => command.name() === "run")?.helpInformation();

    expect(help).toContain("CloudQuery spec file (default: sync_spec.yml in the working directory)");
  });
});

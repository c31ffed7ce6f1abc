import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { Command } from "commander";
import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

vi.mock("chalk", () => {
  const identity = (text: string) => text;
  const chain: (text: string) => string = new Proxy(identity, { get: () => chain });
  return { default: chain };
});

import { initContext, resetContext } from "../lib/cli-context.js";
import type { CachedBinaryRecord } from "../lib/ports/cache-metadata.js";
import { registerCacheCommands } from "./cache.js";
import { fakeServices, type FakeServices } from "./test-helpers.js";

describe("cache commands", () => {
  let cacheDir: string;
  let fake: FakeServices;
  let consoleLogSpy: MockInstance;

  function record(path: string, version: string): CachedBinaryRecord {
    return {
      path,
      version,
      platform: { os: "linux", arch: "amd64", executableExtension: "" },
      url: `https://example.test/${version}/cloudquery_linux_amd64`,
      downloadedAt: "2024-05-01T12:00:00.000Z",
    };
  }

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.exitOverride();
    registerCacheCommands(program, fake.factory);
    await program.parseAsync(["node", "cqsync", "cache", ...args]);
  }

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), "cqsync-cache-cmd-"));
    fake = fakeServices({ cacheDir });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    initContext(["node", "cqsync", "--quiet"], {});
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    await rm(cacheDir, { recursive: true, force: true });
  });

  describe("path", () => {
    it("prints the cache path for this platform", async () => {
      await run("path");

      expect(consoleLogSpy).toHaveBeenCalledWith(join(cacheDir, "cloudquery"));
    });

    it("includes version and platform with --versioned-cache", async () => {
      await run("path", "--versioned-cache", "--cloudquery-version", "v6.5.0");

      expect(consoleLogSpy).toHaveBeenCalledWith(join(cacheDir, "cloudquery-v6.5.0-linux-amd64"));
    });

    it("reports whether the file exists in JSON mode", async () => {
      initContext(["node", "cqsync", "--json"], {});
      await writeFile(join(cacheDir, "cloudquery"), "#!/bin/sh\n");

      await run("path");

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        success: true,
        data: { path: join(cacheDir, "cloudquery"), cached: true },
      });
    });

    it("fails on an unsupported platform", async () => {
      fake = fakeServices({ cacheDir }, { platform: "sunos", arch: "x64" });

      await run("path");

      expect(process.exitCode).toBe(1);
      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe("list", () => {
    it("says when nothing has been downloaded", async () => {
      await run("list");

      expect(consoleLogSpy).toHaveBeenCalledWith("No downloaded binaries recorded.");
    });

    it("lists recorded binaries and whether they are still on disk", async () => {
      initContext(["node", "cqsync", "--json"], {});
      const present = join(cacheDir, "cloudquery");
      const gone = join(cacheDir, "cloudquery-v6.0.0-linux-amd64");
      await writeFile(present, "#!/bin/sh\n");
      fake.metadata.record(record(present, "v6.4.1"));
      fake.metadata.record(record(gone, "v6.0.0"));

      await run("list");

      const output = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output.data).toEqual({
        cacheDir,
        entries: [
          {
            path: present,
            version: "v6.4.1",
            platform: "linux/amd64",
            downloadedAt: "2024-05-01T12:00:00.000Z",
            present: true,
          },
          {
            path: gone,
            version: "v6.0.0",
            platform: "linux/amd64",
            downloadedAt: "2024-05-01T12:00:00.000Z",
            present: false,
          },
        ],
      });
    });

    it("renders a table", async () => {
      const present = join(cacheDir, "cloudquery");
      await writeFile(present, "#!/bin/sh\n");
      fake.metadata.record(record(present, "v6.4.1"));

      await run("list");

      const table = String(consoleLogSpy.mock.calls[0]?.[0]);
      expect(table).toContain("Version");
      expect(table).toContain("v6.4.1");
      expect(table).toContain("yes");
    });
  });

  describe("clear", () => {
    it("removes the binary for the current configuration", async () => {
      const path = join(cacheDir, "cloudquery");
      await writeFile(path, "#!/bin/sh\n");
      fake.metadata.record(record(path, "v6.4.1"));

      await run("clear");

      expect(consoleLogSpy).toHaveBeenCalledWith(`Removed ${path}`);
      expect(await readdir(cacheDir)).toEqual([]);
      expect(fake.metadata.list()).toEqual([]);
    });

    it("removes every recorded binary with --all", async () => {
      const first = join(cacheDir, "cloudquery-v6.4.1-linux-amd64");
      const second = join(cacheDir, "cloudquery-v6.5.0-linux-amd64");
      await writeFile(first, "#!/bin/sh\n");
      await writeFile(second, "#!/bin/sh\n");
      fake.metadata.record(record(first, "v6.4.1"));
      fake.metadata.record(record(second, "v6.5.0"));

      await run("clear", "--all");

      expect(consoleLogSpy).toHaveBeenCalledWith(`Removed ${first}`);
      expect(consoleLogSpy).toHaveBeenCalledWith(`Removed ${second}`);
      expect(await readdir(cacheDir)).toEqual([]);
      expect(fake.metadata.list()).toEqual([]);
    });

    it("says when there is nothing to remove", async () => {
      await run("clear");

      expect(consoleLogSpy).toHaveBeenCalledWith("Nothing to remove.");
    });

    it("outputs the removed paths as JSON", async () => {
      initContext(["node", "cqsync", "--json"], {});
      const path = join(cacheDir, "cloudquery");
      await writeFile(path, "#!/bin/sh\n");

      await run("clear");

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        success: true,
        data: { removed: [path] },
      });
    });
  });
});

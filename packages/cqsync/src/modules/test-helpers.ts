import { vi, type Mock } from "vitest";
import { writeFile } from "fs/promises";
import { MemoryCacheMetadataStore } from "../lib/adapters/conf-cache-metadata.js";
import { resolveConfig, type ResolvedConfig } from "../lib/config.js";
import { createNoopLogger } from "../lib/logger.js";
import type { HostInfo } from "../lib/platform.js";
import type { DownloadService } from "../lib/ports/download.js";
import type { ProcessResult, ProcessRunner } from "../lib/ports/process-runner.js";
import type { ServicesFactory } from "../lib/runtime.js";

export function processResult(overrides: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: "",
    stderr: "",
    timedOut: false,
    cancelled: false,
    ...overrides,
  };
}

export interface FakeServices {
  factory: Mock<ServicesFactory>;
  dispose: Mock<() => void>;
  download: Mock<DownloadService["download"]>;
  run: Mock<ProcessRunner["run"]>;
  metadata: MemoryCacheMetadataStore;
  controller: AbortController;
}

/**
 * Services wired to in-memory fakes. `base` plays the part of the config
 * files; the factory's own argument still overrides it like CLI flags do.
 */
export function fakeServices(
  base: Partial<ResolvedConfig>,
  host: HostInfo = { platform: "linux", arch: "x64" }
): FakeServices {
  const metadata = new MemoryCacheMetadataStore();
  const controller = new AbortController();
  const dispose = vi.fn<() => void>();
  const download = vi.fn<DownloadService["download"]>(async (_url, outputPath) => {
    await writeFile(outputPath, "#!/bin/sh\n");
  });
  const run = vi.fn<ProcessRunner["run"]>(async (_command, args) =>
    args[0] === "--version"
      ? processResult({ stdout: "cloudquery version 6.4.1\n" })
      : processResult({ stdout: "Sync completed successfully.\n" })
  );

  const factory = vi.fn<ServicesFactory>((cliOptions) => ({
    services: {
      config: resolveConfig(cliOptions, undefined, undefined, base),
      sources: [],
      logger: createNoopLogger(),
      signal: controller.signal,
      metadata,
      downloader: { download },
      processRunner: { run },
      host,
    },
    dispose,
  }));

  return { factory, dispose, download, run, metadata, controller };
}

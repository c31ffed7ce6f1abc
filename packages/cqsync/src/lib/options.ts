import { InvalidArgumentError, type Command } from "commander";
import type { ResolvedConfig } from "./config.js";

/**
 * Commander argument parser for integers >= 0 (retries, timeouts).
 */
export function parseNonNegativeIntOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a whole number of 0 or more.");
  }
  return parsed;
}

export interface ResolverFlags {
  cloudqueryVersion?: string;
  cacheDir?: string;
  versionedCache?: boolean;
  releaseBaseUrl?: string;
  downloadTimeout?: number;
}

/**
 * Flags shared by every command that locates the CloudQuery binary.
 */
export function addResolverOptions(command: Command): Command {
  return command
    .option("--cloudquery-version <version>", "CloudQuery release tag, e.g. v6.4.1")
    .option("--cache-dir <dir>", "Directory holding the cached binary")
    .option("--versioned-cache", "Keep a separate cached binary per version and platform")
    .option("--release-base-url <url>", "Base URL of the release downloads")
    .option(
      "--download-timeout <ms>",
      "Give up on the download after this many milliseconds (0 = never)",
      parseNonNegativeIntOption
    );
}

export function resolverOverrides(flags: ResolverFlags): Partial<ResolvedConfig> {
  return {
    cloudqueryVersion: flags.cloudqueryVersion,
    cacheDir: flags.cacheDir,
    versionedCache: flags.versionedCache,
    releaseBaseUrl: flags.releaseBaseUrl,
    downloadTimeoutMs: flags.downloadTimeout,
  };
}

/**
 * Human-friendly duration, e.g. "850ms" or "12.3s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Binary resolver: finds or downloads the CloudQuery executable for this host.
 *
 * The cache is a single file whose existence is taken as proof of a usable
 * binary. Downloads happen under a cross-process lock and land through an
 * atomic rename, so concurrent runs on one host cannot corrupt it.
 */

import { tmpdir } from "os";
import { createDeadline, type Deadline } from "./abort.js";
import { childProcessRunner } from "./adapters/child-process-runner.js";
import { fetchDownloadService } from "./adapters/fetch-download.js";
import { systemClock } from "./adapters/system-clock.js";
import {
  fileExists,
  installAtomically,
  withCacheLock,
  type CacheLockOptions,
} from "./binary-cache.js";
import {
  cacheLockFailed,
  cacheUnreadable,
  downloadNetworkError,
  downloadTimedOut,
} from "./errors/catalog.js";
import { DownloadError, UnsupportedPlatformError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { detectPlatform, formatPlatform, type HostInfo, type PlatformDescriptor } from "./platform.js";
import type { CacheMetadataStore } from "./ports/cache-metadata.js";
import type { Clock } from "./ports/clock.js";
import type { DownloadService } from "./ports/download.js";
import type { ProcessRunner } from "./ports/process-runner.js";
import { buildDownloadUrl, cachedBinaryPath, DEFAULT_RELEASE_BASE_URL } from "./release.js";
import { err, ok, type Result } from "./result.js";

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 5 * 60 * 1000;
const VERSION_QUERY_TIMEOUT_MS = 30_000;

export type ResolveError = UnsupportedPlatformError | DownloadError;

export interface ResolvedBinary {
  path: string;
  /** Version that was requested, not necessarily the one on disk */
  version: string;
  platform: PlatformDescriptor;
  url: string;
  source: "cache" | "download";
  /** Output of `cloudquery --version`, when it could be read */
  reportedVersion?: string;
}

export interface ResolveBinaryOptions {
  /** Directory holding the cached binary (default: the system temp dir) */
  cacheDir?: string;
  releaseBaseUrl?: string;
  /** Encode version and platform in the cached file name */
  versionedCache?: boolean;
  /** 0 disables the deadline */
  downloadTimeoutMs?: number;
  /** Override host detection (tests) */
  host?: HostInfo;
  signal?: AbortSignal;
  downloader?: DownloadService;
  processRunner?: ProcessRunner;
  metadata?: CacheMetadataStore;
  clock?: Clock;
  logger?: Logger;
  lock?: CacheLockOptions;
}

/**
 * Resolve the cached CloudQuery binary for `version`, downloading it if the
 * cache file is absent.
 */
export async function resolveBinary(
  version: string,
  options: ResolveBinaryOptions = {}
): Promise<Result<ResolvedBinary, ResolveError>> {
  const logger = options.logger ?? createNoopLogger();

  const detected = detectPlatform(options.host);
  if (!detected.ok) {
    return detected;
  }
  const platform = detected.value;

  const url = buildDownloadUrl(version, platform, options.releaseBaseUrl ?? DEFAULT_RELEASE_BASE_URL);
  const path = cachedBinaryPath(options.cacheDir ?? tmpdir(), platform, {
    versioned: options.versionedCache,
    version,
  });
  const resolved: ResolvedBinary = { path, version, platform, url, source: "cache" };

  let cached: boolean;
  try {
    cached = await fileExists(path);
  } catch (error) {
    return err(cacheUnreadable(path, error instanceof Error ? error : new Error(String(error))));
  }
  if (cached) {
    logger.info("Binary already cached, skipping download", { path });
    return ok(resolved);
  }

  const downloader = options.downloader ?? fetchDownloadService;
  const timeoutMs = options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  const deadline = createDeadline(options.signal, timeoutMs);

  let downloaded: boolean;
  try {
    downloaded = await withCacheLock(
      path,
      async () => {
        // Another process may have finished while we waited for the lock
        if (await fileExists(path)) return false;

        logger.info(`Downloading ${url} to ${path}...`, {
          platform: formatPlatform(platform),
        });
        await installAtomically(
          path,
          (tempPath) => downloader.download(url, tempPath, { signal: deadline.signal }),
          { executable: platform.os !== "windows" }
        );
        return true;
      },
      {
        onCompromised: (error) =>
          logger.warn("Cache lock was taken over by another process", { error: error.message }),
        ...options.lock,
      }
    );
  } catch (error) {
    return err(toDownloadError(error, url, path, deadline, timeoutMs));
  } finally {
    deadline.dispose();
  }

  if (!downloaded) {
    logger.info("Binary was downloaded by another run", { path });
    return ok(resolved);
  }

  if (platform.os !== "windows") {
    logger.debug("Set executable permissions", { path });
  }

  const reportedVersion = await queryVersion(path, options.processRunner ?? childProcessRunner, logger, options.signal);

  if (options.metadata) {
    try {
      options.metadata.record({
        path,
        version,
        platform,
        url,
        downloadedAt: (options.clock ?? systemClock).isoNow(),
      });
    } catch (error) {
      logger.warn("Couldn't record cached binary metadata", { error: errorMessage(error) });
    }
  }

  logger.info(`Downloaded to ${path}`);
  return ok({ ...resolved, source: "download", reportedVersion });
}

/**
 * Run `<binary> --version` and log what it prints. Advisory only: a failure
 * is logged and yields undefined.
 */
export async function queryVersion(
  binaryPath: string,
  runner: ProcessRunner,
  logger: Logger,
  signal?: AbortSignal
): Promise<string | undefined> {
  logger.info("Checking CloudQuery version...");
  try {
    const result = await runner.run(binaryPath, ["--version"], {
      timeoutMs: VERSION_QUERY_TIMEOUT_MS,
      signal,
    });
    const output = (result.stdout || result.stderr).trim();
    if (result.exitCode !== 0) {
      logger.warn("CloudQuery version check failed", {
        exitCode: result.exitCode,
        output,
      });
      return undefined;
    }
    logger.info(`CloudQuery version: ${output}`);
    return output || undefined;
  } catch (error) {
    logger.warn("Couldn't run CloudQuery version check", { error: errorMessage(error) });
    return undefined;
  }
}

function toDownloadError(
  error: unknown,
  url: string,
  path: string,
  deadline: Deadline,
  timeoutMs: number
): DownloadError {
  if (error instanceof DownloadError) {
    return error;
  }
  if (deadline.timedOut()) {
    return downloadTimedOut(url, timeoutMs);
  }
  const cause = error instanceof Error ? error : new Error(String(error));
  if ("code" in cause && cause.code === "ELOCKED") {
    return cacheLockFailed(path, cause);
  }
  return downloadNetworkError(url, cause);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

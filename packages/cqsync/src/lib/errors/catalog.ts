import {
  CLIError,
  DownloadError,
  SyncExecutionError,
  UnsupportedPlatformError,
} from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

const RELEASES_PAGE = "https://github.com/cloudquery/cloudquery/releases";

// ============================================================================
// Platform Errors
// ============================================================================

export function unsupportedOs(value: string): UnsupportedPlatformError {
  return new UnsupportedPlatformError("os", value, `Unsupported operating system: ${value}`, {
    suggestion: "CloudQuery releases are published for darwin, linux and windows",
    docs: RELEASES_PAGE,
  });
}

export function unsupportedArch(value: string): UnsupportedPlatformError {
  return new UnsupportedPlatformError("arch", value, `Unsupported architecture: ${value}`, {
    suggestion: "CloudQuery releases are published for amd64 and arm64",
    docs: RELEASES_PAGE,
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function downloadHttpError(url: string, statusCode: number, statusText: string): DownloadError {
  const status = statusText ? `${statusCode} ${statusText}` : String(statusCode);
  return new DownloadError("DOWNLOAD_FAILED", url, `Failed to download CloudQuery (HTTP ${status})`, {
    statusCode,
    details: url,
    suggestion:
      statusCode === 404
        ? "Check that the requested version exists in the releases"
        : "The release host may be temporarily unavailable. Try again",
    docs: statusCode === 404 ? RELEASES_PAGE : undefined,
  });
}

export function downloadNetworkError(url: string, cause: Error): DownloadError {
  return new DownloadError("DOWNLOAD_FAILED", url, `Network error while downloading CloudQuery: ${cause.message}`, {
    details: url,
    suggestion: "Check your network connection and try again",
    cause,
  });
}

export function downloadTimedOut(url: string, timeoutMs: number): DownloadError {
  return new DownloadError("DOWNLOAD_TIMEOUT", url, `Download did not finish within ${timeoutMs}ms`, {
    details: url,
    suggestion: "Increase download.timeoutMs or retry on a faster connection",
  });
}

// ============================================================================
// Sync Errors
// ============================================================================

export function syncFailed(exitCode: number, stdout: string, stderr: string): SyncExecutionError {
  return new SyncExecutionError(
    "SYNC_FAILED",
    `CloudQuery sync failed with exit code ${exitCode}. Output: ${stdout}`,
    {
      exitCode,
      stdout,
      stderr,
      summary: `CloudQuery sync failed with exit code ${exitCode}`,
      details: stderr.trim() || undefined,
      suggestion: "Check the sync output above and the spec file for errors",
    }
  );
}

export function syncKilled(signal: string, stdout: string, stderr: string): SyncExecutionError {
  return new SyncExecutionError(
    "SYNC_FAILED",
    `CloudQuery sync was terminated by ${signal}. Output: ${stdout}`,
    {
      stdout,
      stderr,
      summary: `CloudQuery sync was terminated by ${signal}`,
      details: stderr.trim() || undefined,
    }
  );
}

export function syncTimedOut(timeoutMs: number, stdout: string, stderr: string): SyncExecutionError {
  return new SyncExecutionError("SYNC_TIMEOUT", `CloudQuery sync did not finish within ${timeoutMs}ms`, {
    stdout,
    stderr,
    details: stderr.trim() || undefined,
    suggestion: "Increase sync.timeoutMs or set it to 0 to wait indefinitely",
  });
}

export function syncSpawnFailed(binaryPath: string, cause: Error): SyncExecutionError {
  return new SyncExecutionError("SYNC_SPAWN_FAILED", `Couldn't start CloudQuery at ${binaryPath}: ${cause.message}`, {
    cause,
    suggestion: "Clear the cached binary and download it again",
    example: "cqsync cache clear",
  });
}

export function syncCancelled(stdout: string, stderr: string): SyncExecutionError {
  return new SyncExecutionError("CANCELLED", `CloudQuery sync was cancelled. Output: ${stdout}`, {
    stdout,
    stderr,
    summary: "CloudQuery sync was cancelled",
  });
}

export function specFileNotFound(path: string, cause?: Error): SyncExecutionError {
  return new SyncExecutionError("SPEC_FILE_NOT_FOUND", `Can't find spec file "${path}"`, {
    cause,
    details: cause?.message,
    suggestion: "Pass the CloudQuery spec with --spec or set sync.specFilePath",
    example: "cqsync run --spec ./sync_spec.yml",
  });
}

// ============================================================================
// Configuration Errors
// ============================================================================

export function configInvalid(path: string, details: string): CLIError {
  return new CLIError("CONFIG_INVALID", `Invalid configuration in ${path}`, {
    details,
    suggestion: "Fix the listed settings, then validate the file",
    example: `cqsync config validate --config ${path}`,
  });
}

// ============================================================================
// Pipeline Errors
// ============================================================================

export function bindingMissing(stepId: string, upstream: string): CLIError {
  return new CLIError(
    "PIPELINE_BINDING_MISSING",
    `Step "${stepId}" needs the output of "${upstream}", which has not run`
  );
}

export function cancelled(stepId: string): CLIError {
  return new CLIError("CANCELLED", `Pipeline cancelled during step "${stepId}"`);
}

// ============================================================================
// Cache Errors
// ============================================================================

export function cacheUnreadable(path: string, cause: Error): DownloadError {
  return new DownloadError("DOWNLOAD_FAILED", path, `Couldn't check the binary cache at ${path}: ${cause.message}`, {
    cause,
    suggestion: "Point --cache-dir at a writable directory",
  });
}

export function cacheLockFailed(path: string, cause: Error): DownloadError {
  return new DownloadError("DOWNLOAD_FAILED", path, `Couldn't lock the binary cache at ${path}: ${cause.message}`, {
    cause,
    suggestion: "Another run may be downloading CloudQuery. Try again when it finishes",
  });
}

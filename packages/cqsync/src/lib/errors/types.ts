/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure scenario with predefined messaging.
 */
export type ErrorCode =
  // Platform errors
  | "PLATFORM_UNSUPPORTED"
  // Download errors
  | "DOWNLOAD_FAILED"
  | "DOWNLOAD_TIMEOUT"
  // Sync errors
  | "SYNC_FAILED"
  | "SYNC_TIMEOUT"
  | "SYNC_SPAWN_FAILED"
  | "SPEC_FILE_NOT_FOUND"
  // Configuration errors
  | "CONFIG_INVALID"
  // Pipeline errors
  | "PIPELINE_BINDING_MISSING"
  | "CANCELLED"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  docs?: string;
  details?: string;
  retryable?: boolean;
  cause?: Error;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly docs?: string;
  readonly details?: string;
  /** Whether restarting the failed step can succeed without changing anything */
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.docs = options?.docs;
    this.details = options?.details;
    this.retryable = options?.retryable ?? false;
  }
}

export type PlatformComponent = "os" | "arch";

/**
 * The host operating system or CPU architecture has no CloudQuery release.
 */
export class UnsupportedPlatformError extends CLIError {
  readonly component: PlatformComponent;
  readonly value: string;

  constructor(
    component: PlatformComponent,
    value: string,
    message: string,
    options?: Omit<CLIErrorOptions, "retryable">
  ) {
    super("PLATFORM_UNSUPPORTED", message, { ...options, retryable: false });
    this.name = "UnsupportedPlatformError";
    this.component = component;
    this.value = value;
  }
}

/**
 * Fetching the release binary failed: bad HTTP status, network error or timeout.
 */
export class DownloadError extends CLIError {
  readonly url: string;
  readonly statusCode?: number;

  constructor(
    code: "DOWNLOAD_FAILED" | "DOWNLOAD_TIMEOUT",
    url: string,
    message: string,
    options?: Omit<CLIErrorOptions, "retryable"> & { statusCode?: number }
  ) {
    super(code, message, { ...options, retryable: true });
    this.name = "DownloadError";
    this.url = url;
    this.statusCode = options?.statusCode;
  }
}

export type SyncErrorCode =
  | "CANCELLED"
  | "SYNC_FAILED"
  | "SYNC_TIMEOUT"
  | "SYNC_SPAWN_FAILED"
  | "SPEC_FILE_NOT_FOUND";

/**
 * The sync subprocess could not run or finished unsuccessfully.
 */
export class SyncExecutionError extends CLIError {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** The message without the captured output appended */
  readonly summary: string;

  constructor(
    code: SyncErrorCode,
    message: string,
    options: Omit<CLIErrorOptions, "retryable"> & {
      exitCode?: number | null;
      stdout?: string;
      stderr?: string;
      summary?: string;
    } = {}
  ) {
    super(code, message, {
      ...options,
      retryable: code !== "SPEC_FILE_NOT_FOUND" && code !== "CANCELLED",
    });
    this.name = "SyncExecutionError";
    this.exitCode = options.exitCode ?? null;
    this.stdout = options.stdout ?? "";
    this.stderr = options.stderr ?? "";
    this.summary = options.summary ?? message;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Wrap an arbitrary thrown value so it can travel in a Result.
 */
export function toCLIError(error: unknown): CLIError {
  if (isCLIError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import { formatJsonError, renderError } from "./errors/renderer.js";
import { toCLIError } from "./errors/types.js";
import { formatPlatform } from "./platform.js";
import type { StepReport } from "./pipeline.js";
import type { ResolvedBinary } from "./resolver.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

export interface JsonError {
  success: false;
  error: Record<string, unknown>;
  meta?: {
    step?: string;
    steps?: StepJson[];
    version?: string;
  };
}

export type JsonResult<T> = JsonSuccess<T> | JsonError;

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface BinaryJson {
  path: string;
  version: string;
  platform: string;
  url: string;
  source: "cache" | "download";
  reportedVersion?: string;
}

export interface StepJson {
  id: string;
  status: "succeeded" | "failed" | "skipped";
  attempts: number;
  durationMs: number;
  errorCode?: string;
}

export interface RunResultJson {
  pipeline: string;
  specFilePath: string;
  binary?: BinaryJson;
  steps: StepJson[];
  durationMs: number;
}

export interface SyncResultJson {
  binaryPath: string;
  specFilePath: string;
  exitCode: number;
  durationMs: number;
  stdout: string;
  stderr: string;
}

export interface DoctorResultJson {
  checks: Array<{
    name: string;
    status: "pass" | "fail" | "warn";
    message: string;
    details?: string;
  }>;
  system: {
    os: string;
    arch: string;
    nodeVersion: string;
    cliVersion: string;
  };
  binary: {
    version: string;
    url?: string;
    cachePath?: string;
    cached: boolean;
    recordedVersion?: string;
  };
}

export interface CacheListJson {
  cacheDir: string;
  entries: Array<{
    path: string;
    version: string;
    platform: string;
    downloadedAt: string;
    present: boolean;
  }>;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an error JSON result to stderr.
 */
export function outputError(error: unknown, meta?: JsonError["meta"]): void {
  const result: JsonError = {
    success: false,
    error: formatJsonError(toCLIError(error)),
    ...(meta && { meta }),
  };
  console.error(JSON.stringify(result, null, 2));
}

/**
 * Report a command failure in the current output mode and set exit code 1.
 */
export function reportError(error: unknown, meta?: JsonError["meta"]): void {
  if (isJsonMode()) {
    outputError(error, meta);
  } else {
    renderError(toCLIError(error));
  }
  process.exitCode = 1;
}

export function toBinaryJson(binary: ResolvedBinary): BinaryJson {
  return {
    path: binary.path,
    version: binary.version,
    platform: formatPlatform(binary.platform),
    url: binary.url,
    source: binary.source,
    ...(binary.reportedVersion && { reportedVersion: binary.reportedVersion }),
  };
}

export function toStepJson(step: StepReport): StepJson {
  return {
    id: step.id,
    status: step.status,
    attempts: step.attempts,
    durationMs: step.durationMs,
    ...(step.error && { errorCode: step.error.code }),
  };
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}

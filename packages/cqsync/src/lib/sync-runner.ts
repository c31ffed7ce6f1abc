/**
 * Sync runner: invokes `cloudquery sync <spec>` and turns its exit status
 * into a Result.
 */

import { childProcessRunner } from "./adapters/child-process-runner.js";
import { systemClock } from "./adapters/system-clock.js";
import { fileExists } from "./binary-cache.js";
import {
  specFileNotFound,
  syncCancelled,
  syncFailed,
  syncKilled,
  syncSpawnFailed,
  syncTimedOut,
} from "./errors/catalog.js";
import type { SyncExecutionError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { ProcessResult, ProcessRunner } from "./ports/process-runner.js";
import { err, ok, type Result } from "./result.js";

export const SYNC_SUBCOMMAND = "sync";

export interface SyncOutcome {
  exitCode: 0;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface RunSyncOptions {
  /** Kill the sync after this many milliseconds; 0 waits forever */
  timeoutMs?: number;
  signal?: AbortSignal;
  processRunner?: ProcessRunner;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Run a CloudQuery sync with the given spec file.
 */
export async function runSync(
  configPath: string,
  binaryPath: string,
  options: RunSyncOptions = {}
): Promise<Result<SyncOutcome, SyncExecutionError>> {
  const logger = options.logger ?? createNoopLogger();
  const runner = options.processRunner ?? childProcessRunner;
  const clock = options.clock ?? systemClock;
  const timeoutMs = options.timeoutMs ?? 0;

  try {
    if (!(await fileExists(configPath))) {
      return err(specFileNotFound(configPath));
    }
  } catch (error) {
    return err(specFileNotFound(configPath, toError(error)));
  }

  logger.info("Running CloudQuery sync", { binary: binaryPath, spec: configPath });
  const startedAt = clock.now();

  let result: ProcessResult;
  try {
    result = await runner.run(binaryPath, [SYNC_SUBCOMMAND, configPath], {
      timeoutMs,
      signal: options.signal,
    });
  } catch (error) {
    return err(syncSpawnFailed(binaryPath, toError(error)));
  }

  const durationMs = clock.now() - startedAt;
  const { stdout, stderr } = result;

  if (result.timedOut) {
    return err(syncTimedOut(timeoutMs, stdout, stderr));
  }

  if (result.cancelled) {
    logger.warn("CloudQuery sync was cancelled", { durationMs });
    return err(syncCancelled(stdout, stderr));
  }

  if (result.exitCode === null) {
    return err(syncKilled(result.signal ?? "a signal", stdout, stderr));
  }

  if (result.exitCode !== 0) {
    logger.error("CloudQuery sync failed", { exitCode: result.exitCode, durationMs });
    return err(syncFailed(result.exitCode, stdout, stderr));
  }

  logger.info("CloudQuery sync completed", { durationMs });
  return ok({ exitCode: 0, stdout, stderr, durationMs });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

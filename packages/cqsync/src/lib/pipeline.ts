/**
 * Pipeline definition and runner.
 *
 * A pipeline is a plain value listing its ordered steps. Each step reads the
 * pipeline parameters and the outputs of earlier steps, and returns a Result.
 * Failed steps are restarted as a whole, up to the configured retry count,
 * unless the error says a retry cannot help.
 */

import { realDelay } from "./adapters/real-timers.js";
import { systemClock } from "./adapters/system-clock.js";
import { bindingMissing, cancelled } from "./errors/catalog.js";
import { toCLIError, type CLIError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { DelayFn } from "./ports/timer.js";
import { resolveBinary, type ResolveBinaryOptions, type ResolvedBinary } from "./resolver.js";
import { err, ok, type Result } from "./result.js";
import { runSync, type RunSyncOptions, type SyncOutcome } from "./sync-runner.js";

export const DEFAULT_RETRIES = 1;

export interface PipelineParams {
  /** CloudQuery spec file passed to `cloudquery sync` */
  specFilePath: string;
  /** Release tag used to build the download URL */
  cloudqueryVersion: string;
}

/** Output type of every step, keyed by step id */
export interface StepOutputs {
  fetch: ResolvedBinary;
  sync: SyncOutcome;
}

export type StepId = keyof StepOutputs;

export interface StepContext {
  signal: AbortSignal;
  logger: Logger;
  attempt: number;
}

export interface PipelineStep<K extends StepId> {
  id: K;
  description: string;
  /** Steps whose outputs this step reads */
  needs: StepId[];
  run(
    params: PipelineParams,
    outputs: Partial<StepOutputs>,
    context: StepContext
  ): Promise<Result<StepOutputs[K], CLIError>>;
}

export type AnyPipelineStep = { [K in StepId]: PipelineStep<K> }[StepId];

export interface PipelineDefinition {
  name: string;
  description: string;
  steps: AnyPipelineStep[];
}

export interface SyncPipelineDeps {
  resolve?: Omit<ResolveBinaryOptions, "signal" | "logger">;
  sync?: Omit<RunSyncOptions, "signal" | "logger">;
}

/**
 * Build the two-step CloudQuery pipeline: fetch the binary, then sync.
 */
export function createSyncPipeline(deps: SyncPipelineDeps = {}): PipelineDefinition {
  const fetchStep: PipelineStep<"fetch"> = {
    id: "fetch",
    description: "Download the CloudQuery CLI binary and return the path where it is stored",
    needs: [],
    run: (params, _outputs, context) =>
      resolveBinary(params.cloudqueryVersion, {
        ...deps.resolve,
        signal: context.signal,
        logger: context.logger,
      }),
  };

  const syncStep: PipelineStep<"sync"> = {
    id: "sync",
    description: "Run `cloudquery sync` with the spec file using the fetched binary",
    needs: ["fetch"],
    run: async (params, outputs, context) => {
      const binary = outputs.fetch;
      if (!binary) {
        return err(bindingMissing("sync", "fetch"));
      }
      return runSync(params.specFilePath, binary.path, {
        ...deps.sync,
        signal: context.signal,
        logger: context.logger,
      });
    },
  };

  return {
    name: "cloudquery-sync",
    description: "Download CloudQuery and run a sync with the given spec file",
    steps: [fetchStep, syncStep],
  };
}

// ---------------------------------------------------------------------------
// Runner
// ---------------------------------------------------------------------------

export interface StepReport {
  id: StepId;
  status: "succeeded" | "failed" | "skipped";
  attempts: number;
  durationMs: number;
  error?: CLIError;
}

export interface PipelineRun {
  pipeline: string;
  outputs: Partial<StepOutputs>;
  steps: StepReport[];
  durationMs: number;
}

export interface PipelineFailure {
  pipeline: string;
  failedStep: StepId;
  error: CLIError;
  steps: StepReport[];
  durationMs: number;
}

export interface RunPipelineOptions {
  /** Restarts allowed per step after the first attempt */
  retries?: number;
  retryDelayMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
  delay?: DelayFn;
  clock?: Clock;
  /** Called before each attempt, e.g. to update a spinner */
  onStepStart?: (step: AnyPipelineStep, attempt: number) => void;
}

/**
 * Execute the pipeline's steps in order. Stops at the first step that still
 * fails after its retries; later steps are reported as skipped.
 */
export async function runPipeline(
  definition: PipelineDefinition,
  params: PipelineParams,
  options: RunPipelineOptions = {}
): Promise<Result<PipelineRun, PipelineFailure>> {
  const logger = (options.logger ?? createNoopLogger()).child({ pipeline: definition.name });
  const clock = options.clock ?? systemClock;
  const delay = options.delay ?? realDelay;
  const retries = Math.max(0, options.retries ?? DEFAULT_RETRIES);
  const signal = options.signal ?? new AbortController().signal;

  const startedAt = clock.now();
  const outputs: Partial<StepOutputs> = {};
  const reports: StepReport[] = [];

  for (const [index, step] of definition.steps.entries()) {
    const report = await runStep(step, params, outputs, {
      retries,
      retryDelayMs: options.retryDelayMs ?? 0,
      signal,
      logger: logger.child({ step: step.id }),
      delay,
      clock,
      onStepStart: options.onStepStart,
    });
    reports.push(report);

    if (report.status === "failed") {
      for (const skipped of definition.steps.slice(index + 1)) {
        reports.push({ id: skipped.id, status: "skipped", attempts: 0, durationMs: 0 });
      }
      return err({
        pipeline: definition.name,
        failedStep: step.id,
        error: report.error ?? cancelled(step.id),
        steps: reports,
        durationMs: clock.now() - startedAt,
      });
    }
  }

  return ok({
    pipeline: definition.name,
    outputs,
    steps: reports,
    durationMs: clock.now() - startedAt,
  });
}

interface StepRunOptions {
  retries: number;
  retryDelayMs: number;
  signal: AbortSignal;
  logger: Logger;
  delay: DelayFn;
  clock: Clock;
  onStepStart?: (step: AnyPipelineStep, attempt: number) => void;
}

async function runStep<K extends StepId>(
  step: PipelineStep<K>,
  params: PipelineParams,
  outputs: Partial<StepOutputs>,
  options: StepRunOptions
): Promise<StepReport> {
  const { logger, signal, clock } = options;
  const startedAt = clock.now();
  const maxAttempts = options.retries + 1;
  let lastError: CLIError | undefined;
  let attempt = 0;

  while (attempt < maxAttempts) {
    if (signal.aborted) {
      lastError = cancelled(step.id);
      break;
    }

    attempt++;
    options.onStepStart?.(step, attempt);
    logger.debug(`Starting step ${step.id}`, { attempt });

    let result: Result<StepOutputs[K], CLIError>;
    try {
      result = await step.run(params, { ...outputs }, { signal, logger, attempt });
    } catch (error) {
      result = err(toCLIError(error));
    }

    if (result.ok) {
      outputs[step.id] = result.value;
      return {
        id: step.id,
        status: "succeeded",
        attempts: attempt,
        durationMs: clock.now() - startedAt,
      };
    }

    lastError = signal.aborted ? cancelled(step.id) : result.error;

    if (signal.aborted || !lastError.retryable) {
      break;
    }

    if (attempt < maxAttempts) {
      logger.warn(`Step ${step.id} failed, retrying`, {
        attempt,
        retriesLeft: maxAttempts - attempt,
        error: lastError.message,
      });
      await options.delay(options.retryDelayMs, signal);
    }
  }

  logger.error(`Step ${step.id} failed`, { attempts: attempt, code: lastError?.code });
  return {
    id: step.id,
    status: "failed",
    attempts: attempt,
    durationMs: clock.now() - startedAt,
    error: lastError,
  };
}

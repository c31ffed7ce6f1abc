/**
 * Run command - fetch the CloudQuery binary, then sync with a spec file.
 */

import { Command } from "commander";
import chalk from "chalk";
import {
  maybeOutputJson,
  reportError,
  toBinaryJson,
  toStepJson,
  type RunResultJson,
} from "../lib/json-output.js";
import {
  addResolverOptions,
  formatDuration,
  parseNonNegativeIntOption,
  resolverOverrides,
  type ResolverFlags,
} from "../lib/options.js";
import { createSyncPipeline, runPipeline } from "../lib/pipeline.js";
import {
  createServices,
  resolverOptions,
  type ServicesFactory,
  type ServicesHandle,
} from "../lib/runtime.js";
import { CLI_VERSION } from "../lib/version.js";

export interface RunOptions extends ResolverFlags {
  spec?: string;
  retries?: number;
  retryDelay?: number;
  syncTimeout?: number;
}

export function registerRunCommand(
  program: Command,
  servicesFactory: ServicesFactory = createServices
): void {
  const command = program
    .command("run")
    .description("Download CloudQuery if needed, then run a sync")
    .option("-s, --spec <path>", "CloudQuery spec file (default: sync_spec.yml in the working directory)")
    .option("--retries <n>", "Restarts allowed per failed step", parseNonNegativeIntOption)
    .option("--retry-delay <ms>", "Wait between restarts", parseNonNegativeIntOption)
    .option(
      "--sync-timeout <ms>",
      "Stop the sync after this many milliseconds (0 = never)",
      parseNonNegativeIntOption
    );

  addResolverOptions(command)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Steps:")}
  ${chalk.yellow("1. fetch")}  Download the CloudQuery CLI for this platform (skipped when cached)
  ${chalk.yellow("2. sync")}   Run ${chalk.cyan("cloudquery sync <spec>")} with the fetched binary

${chalk.bold.cyan("Examples:")}
  cqsync run                                   ${chalk.gray("Sync with ./sync_spec.yml")}
  cqsync run --spec specs/aws.yml              ${chalk.gray("Use another spec file")}
  cqsync run --cloudquery-version v6.5.0       ${chalk.gray("Pin a CloudQuery release")}
  cqsync run --retries 0 --json                ${chalk.gray("No restarts, JSON result")}
`
    )
    .action(async (options: RunOptions) => {
      await runCommand(options, servicesFactory);
    });
}

export async function runCommand(
  options: RunOptions,
  servicesFactory: ServicesFactory = createServices
): Promise<void> {
  let handle: ServicesHandle;
  try {
    handle = servicesFactory({
      ...resolverOverrides(options),
      specFilePath: options.spec,
      retries: options.retries,
      retryDelayMs: options.retryDelay,
      syncTimeoutMs: options.syncTimeout,
    });
  } catch (error) {
    reportError(error);
    return;
  }

  const { services } = handle;
  const { config, logger } = services;

  try {
    const pipeline = createSyncPipeline({
      resolve: resolverOptions(services),
      sync: {
        timeoutMs: config.syncTimeoutMs,
        processRunner: services.processRunner,
      },
    });

    logger.info(`Starting ${pipeline.name}`, {
      spec: config.specFilePath,
      version: config.cloudqueryVersion,
    });

    const result = await runPipeline(
      pipeline,
      {
        specFilePath: config.specFilePath,
        cloudqueryVersion: config.cloudqueryVersion,
      },
      {
        retries: config.retries,
        retryDelayMs: config.retryDelayMs,
        signal: services.signal,
        logger,
      }
    );

    if (!result.ok) {
      const failure = result.error;
      reportError(failure.error, {
        step: failure.failedStep,
        steps: failure.steps.map(toStepJson),
        version: CLI_VERSION,
      });
      return;
    }

    const run = result.value;
    const binary = run.outputs.fetch;
    const sync = run.outputs.sync;

    const json: RunResultJson = {
      pipeline: run.pipeline,
      specFilePath: config.specFilePath,
      ...(binary && { binary: toBinaryJson(binary) }),
      steps: run.steps.map(toStepJson),
      durationMs: run.durationMs,
    };
    if (maybeOutputJson(json, { duration: run.durationMs, version: CLI_VERSION })) {
      return;
    }

    const syncOutput = sync?.stdout.trimEnd();
    if (syncOutput) {
      console.log(syncOutput);
    }
    console.log(chalk.green(`✓ Sync completed in ${formatDuration(run.durationMs)}`));
    if (binary) {
      console.log(chalk.gray(`  Binary: ${binary.path} (${binary.source})`));
    }
  } finally {
    handle.dispose();
  }
}

import { Command } from "commander";
import chalk from "chalk";
import {
  maybeOutputJson,
  reportError,
  type SyncResultJson,
} from "../lib/json-output.js";
import { formatDuration, parseNonNegativeIntOption } from "../lib/options.js";
import { createServices, type ServicesFactory, type ServicesHandle } from "../lib/runtime.js";
import { runSync } from "../lib/sync-runner.js";

export interface SyncOptions {
  binary: string;
  syncTimeout?: number;
}

export function registerSyncCommand(
  program: Command,
  servicesFactory: ServicesFactory = createServices
): void {
  program
    .command("sync")
    .description("Run `cloudquery sync` with an existing binary")
    .argument("[spec]", "CloudQuery spec file (default: sync_spec.yml)")
    .requiredOption("-b, --binary <path>", "Path to the CloudQuery executable")
    .option(
      "--sync-timeout <ms>",
      "Stop the sync after this many milliseconds (0 = never)",
      parseNonNegativeIntOption
    )
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  cqsync sync --binary /tmp/cloudquery
  cqsync sync specs/aws.yml --binary "$(cqsync fetch -q)"
`
    )
    .action(async (spec: string | undefined, options: SyncOptions) => {
      await syncCommand(spec, options, servicesFactory);
    });
}

export async function syncCommand(
  spec: string | undefined,
  options: SyncOptions,
  servicesFactory: ServicesFactory = createServices
): Promise<void> {
  let handle: ServicesHandle;
  try {
    handle = servicesFactory({ specFilePath: spec, syncTimeoutMs: options.syncTimeout });
  } catch (error) {
    reportError(error);
    return;
  }

  const { services } = handle;
  const { config } = services;

  try {
    const result = await runSync(config.specFilePath, options.binary, {
      timeoutMs: config.syncTimeoutMs,
      signal: services.signal,
      processRunner: services.processRunner,
      logger: services.logger,
    });

    if (!result.ok) {
      reportError(result.error, { step: "sync" });
      return;
    }

    const outcome = result.value;
    const json: SyncResultJson = {
      binaryPath: options.binary,
      specFilePath: config.specFilePath,
      exitCode: outcome.exitCode,
      durationMs: outcome.durationMs,
      stdout: outcome.stdout,
      stderr: outcome.stderr,
    };
    if (maybeOutputJson(json, { duration: outcome.durationMs })) {
      return;
    }

    const syncOutput = outcome.stdout.trimEnd();
    if (syncOutput) {
      console.log(syncOutput);
    }
    console.log(chalk.green(`✓ Sync completed in ${formatDuration(outcome.durationMs)}`));
  } finally {
    handle.dispose();
  }
}

#!/usr/bin/env node
import { Command } from "commander";
import { initContext } from "./lib/cli-context.js";
import { reportError } from "./lib/json-output.js";
import { CLI_VERSION } from "./lib/version.js";
import { registerCacheCommands } from "./modules/cache.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDoctorCommand } from "./modules/doctor.js";
import { registerFetchCommand } from "./modules/fetch.js";
import { registerRunCommand } from "./modules/run.js";
import { registerSyncCommand } from "./modules/sync.js";

export function createProgram(): Command {
  const program = new Command()
    .name("cqsync")
    .description("Download the CloudQuery CLI and run syncs with it")
    .version(CLI_VERSION)
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress spinners and progress output")
    .option("-v, --verbose", "Log debug messages")
    .option("--config <path>", "Use this config file instead of the user and system files");

  registerRunCommand(program);
  registerFetchCommand(program);
  registerSyncCommand(program);
  registerDoctorCommand(program);
  registerCacheCommands(program);
  registerConfigCommands(program);

  return program;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    reportError(error);
  }
}

void main();

import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { getContext } from "../lib/cli-context.js";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { isCLIError } from "../lib/errors/types.js";
import { maybeOutputJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# cqsync configuration
# Place at ~/.config/cqsync/config.yaml (user) or /etc/cqsync/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. CQSYNC_* environment variables
# 3. User config (~/.config/cqsync/config.yaml)
# 4. System config (/etc/cqsync/config.yaml)
# 5. Built-in defaults

cloudquery:
  # Release tag to download
  version: v6.4.1

  # Where release assets are downloaded from
  releaseBaseUrl: https://github.com/cloudquery/cloudquery/releases/download

  # Directory holding the cached binary (default: system temp dir)
  # cacheDir: /var/cache/cqsync

  # Keep one binary per version and platform instead of a single
  # "cloudquery" file that is reused whatever the version
  versionedCache: false

sync:
  # Spec file passed to "cloudquery sync"
  specFilePath: sync_spec.yml

  # Stop the sync after this many milliseconds (0 = never)
  timeoutMs: 0

download:
  # Give up on the download after this many milliseconds (0 = never)
  timeoutMs: 300000

pipeline:
  # Restarts allowed per failed step (0-10)
  retries: 1

  # Wait between restarts (ms)
  retryDelayMs: 0

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs (for log aggregation)
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage cqsync configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/cqsync/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${(error as Error).message}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s), or the one given with --config")
    .action(() => {
      const explicitPath = getContext().configPath;
      const pathsToCheck = explicitPath
        ? [explicitPath]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicitPath) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${(error as Error).message}`));
          if (isCLIError(error) && error.details) {
            console.error(chalk.gray(error.details));
          }
          hasErrors = true;
        }
      }

      if (!foundAny && !explicitPath) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'cqsync config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action(() => {
      try {
        const { config: resolved, sources } = loadConfig(getContext().configPath);

        if (maybeOutputJson({ config: resolved, sources })) {
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("CloudQuery:"));
        console.log(`  version:           ${resolved.cloudqueryVersion}`);
        console.log(`  releaseBaseUrl:    ${resolved.releaseBaseUrl}`);
        console.log(`  cacheDir:          ${resolved.cacheDir}`);
        console.log(`  versionedCache:    ${resolved.versionedCache}`);

        console.log();
        console.log(chalk.bold("Sync:"));
        console.log(`  specFilePath:      ${resolved.specFilePath}`);
        console.log(`  timeoutMs:         ${resolved.syncTimeoutMs}`);

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  timeoutMs:         ${resolved.downloadTimeoutMs}`);

        console.log();
        console.log(chalk.bold("Pipeline:"));
        console.log(`  retries:           ${resolved.retries}`);
        console.log(`  retryDelayMs:      ${resolved.retryDelayMs}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:             ${resolved.logLevel}`);
        console.log(`  json:              ${resolved.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${(error as Error).message}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}

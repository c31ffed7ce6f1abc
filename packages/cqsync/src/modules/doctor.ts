/**
 * Doctor command - diagnostics and health check.
 * Verifies the host platform, the cached binary and the spec file without
 * downloading or syncing anything.
 */

import { Command } from "commander";
import chalk from "chalk";
import os from "os";
import { fileExists } from "../lib/binary-cache.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, reportError, type DoctorResultJson } from "../lib/json-output.js";
import { addResolverOptions, resolverOverrides, type ResolverFlags } from "../lib/options.js";
import { currentHost, detectPlatform, formatPlatform } from "../lib/platform.js";
import { buildDownloadUrl, cachedBinaryPath } from "../lib/release.js";
import { createServices, type ServicesFactory, type ServicesHandle } from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";
import { CLI_VERSION } from "../lib/version.js";

const MIN_NODE_MAJOR = 20;

interface CheckResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  details?: string;
}

export interface DoctorOptions extends ResolverFlags {
  spec?: string;
  details?: boolean;
}

export function registerDoctorCommand(
  program: Command,
  servicesFactory: ServicesFactory = createServices
): void {
  const command = program
    .command("doctor")
    .description("Check platform support, the cached binary and the spec file")
    .option("-s, --spec <path>", "Spec file to look for")
    .option("--details", "Show detailed diagnostic information");

  addResolverOptions(command)
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it checks:")}
  ${chalk.yellow("•")} Node.js version compatibility
  ${chalk.yellow("•")} A CloudQuery release exists for this OS and architecture
  ${chalk.yellow("•")} Whether the binary is already cached, and for which version
  ${chalk.yellow("•")} The spec file exists

${chalk.bold.cyan("Examples:")}
  cqsync doctor              ${chalk.gray("Run all diagnostic checks")}
  cqsync doctor --details    ${chalk.gray("Show detailed information")}
  cqsync doctor --json       ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(async (options: DoctorOptions) => {
      await runDoctor(options, servicesFactory);
    });
}

export async function runDoctor(
  options: DoctorOptions,
  servicesFactory: ServicesFactory = createServices
): Promise<void> {
  let handle: ServicesHandle;
  try {
    handle = servicesFactory({ ...resolverOverrides(options), specFilePath: options.spec });
  } catch (error) {
    reportError(error);
    return;
  }

  const { services } = handle;
  const { config } = services;
  const host = services.host ?? currentHost();
  const spinner = createSpinner("Running diagnostics...").start();
  const checks: CheckResult[] = [];
  const binary: DoctorResultJson["binary"] = {
    version: config.cloudqueryVersion,
    cached: false,
  };

  try {
    const nodeVersion = process.version;
    const nodeMajor = parseInt(nodeVersion.slice(1).split(".")[0] ?? "0", 10);

    if (nodeMajor >= MIN_NODE_MAJOR) {
      checks.push({ name: "Node.js version", status: "pass", message: `Node.js ${nodeVersion}` });
    } else {
      checks.push({
        name: "Node.js version",
        status: "fail",
        message: `Node.js ${nodeVersion} (requires >= ${MIN_NODE_MAJOR})`,
        details: `Upgrade Node.js to version ${MIN_NODE_MAJOR} or higher`,
      });
    }

    const detected = detectPlatform(host);
    if (!detected.ok) {
      checks.push({
        name: "Platform",
        status: "fail",
        message: detected.error.message,
        details: detected.error.suggestion,
      });
    } else {
      const platform = detected.value;
      const url = buildDownloadUrl(config.cloudqueryVersion, platform, config.releaseBaseUrl);
      const cachePath = cachedBinaryPath(config.cacheDir, platform, {
        versioned: config.versionedCache,
        version: config.cloudqueryVersion,
      });
      binary.url = url;
      binary.cachePath = cachePath;

      checks.push({
        name: "Platform",
        status: "pass",
        message: formatPlatform(platform),
        details: url,
      });

      spinner.update("Checking binary cache...");
      binary.cached = await fileExists(cachePath);
      const record = services.metadata.get(cachePath);
      if (record) {
        binary.recordedVersion = record.version;
      }

      if (!binary.cached) {
        checks.push({
          name: "Cached binary",
          status: "warn",
          message: "Not cached",
          details: `Will be downloaded to ${cachePath} on the next run`,
        });
      } else if (record && record.version !== config.cloudqueryVersion) {
        checks.push({
          name: "Cached binary",
          status: "warn",
          message: `Cached binary is ${record.version}, configured version is ${config.cloudqueryVersion}`,
          details: "Delete it with: cqsync cache clear, or enable versioned caching",
        });
      } else {
        checks.push({
          name: "Cached binary",
          status: "pass",
          message: record ? `${record.version} at ${cachePath}` : cachePath,
          details: record ? `Downloaded ${record.downloadedAt}` : undefined,
        });
      }
    }

    if (await fileExists(config.specFilePath)) {
      checks.push({ name: "Spec file", status: "pass", message: config.specFilePath });
    } else {
      checks.push({
        name: "Spec file",
        status: "warn",
        message: `Not found: ${config.specFilePath}`,
        details: "Pass another file with --spec, or set sync.specFilePath in the config",
      });
    }

    checks.push({
      name: "Configuration",
      status: "pass",
      message: services.sources.length > 0 ? services.sources.join(", ") : "Defaults only",
    });
  } finally {
    spinner.stop();
    handle.dispose();
  }

  const result: DoctorResultJson = {
    checks: checks.map((c) => ({
      name: c.name,
      status: c.status,
      message: c.message,
      ...(c.details && { details: c.details }),
    })),
    system: {
      os: host.platform,
      arch: host.arch,
      nodeVersion: process.version,
      cliVersion: CLI_VERSION,
    },
    binary,
  };

  const failCount = checks.filter((c) => c.status === "fail").length;
  if (failCount > 0) {
    process.exitCode = 1;
  }

  if (isJsonMode()) {
    outputSuccess(result);
    return;
  }

  const showDetails = options.details ?? false;

  // Human-readable output
  console.log("");
  console.log(chalk.bold.cyan("Diagnostics Report"));
  console.log(chalk.dim("─".repeat(50)));

  for (const check of checks) {
    const icon = check.status === "pass" ? chalk.green("✓") :
                 check.status === "warn" ? chalk.yellow("⚠") :
                 chalk.red("✗");
    console.log(`${icon} ${chalk.bold(check.name)}: ${check.message}`);
    if (showDetails && check.details) {
      console.log(chalk.dim(`    ${check.details}`));
    }
  }

  console.log("");
  console.log(chalk.dim("─".repeat(50)));
  console.log(chalk.bold("System Information:"));
  console.log(`  OS: ${host.platform} ${os.release()}`);
  console.log(`  Arch: ${host.arch}`);
  console.log(`  Node.js: ${process.version}`);
  console.log(`  CLI: v${CLI_VERSION}`);
  console.log(`  CloudQuery: ${config.cloudqueryVersion}`);

  const passCount = checks.filter((c) => c.status === "pass").length;
  const warnCount = checks.filter((c) => c.status === "warn").length;

  console.log("");
  if (failCount > 0) {
    console.log(chalk.red(`✗ ${failCount} check(s) failed`));
  } else if (warnCount > 0) {
    console.log(chalk.yellow(`⚠ ${passCount} passed, ${warnCount} warning(s)`));
  } else {
    console.log(chalk.green(`✓ All ${passCount} checks passed`));
  }

  if (!showDetails && (failCount > 0 || warnCount > 0)) {
    console.log(chalk.dim("\nRun with --details for more information"));
  }
}

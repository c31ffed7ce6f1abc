import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { fileExists, removeCachedBinary } from "../lib/binary-cache.js";
import {
  maybeOutputJson,
  reportError,
  type CacheListJson,
} from "../lib/json-output.js";
import { addResolverOptions, resolverOverrides, type ResolverFlags } from "../lib/options.js";
import { detectPlatform, formatPlatform } from "../lib/platform.js";
import { cachedBinaryPath } from "../lib/release.js";
import {
  createServices,
  type CommandServices,
  type ServicesFactory,
  type ServicesHandle,
} from "../lib/runtime.js";
import { createSpinner } from "../lib/spinner.js";

export interface CacheClearOptions extends ResolverFlags {
  all?: boolean;
}

export function registerCacheCommands(
  program: Command,
  servicesFactory: ServicesFactory = createServices
): void {
  const cache = program
    .command("cache")
    .description("Inspect and clear the cached CloudQuery binary");

  addResolverOptions(cache.command("path").description("Print where the binary is cached"))
    .action(async (options: ResolverFlags) => {
      await withServices(servicesFactory, resolverOverrides(options), (services) =>
        printCachePath(services)
      );
    });

  addResolverOptions(cache.command("list").description("List downloaded binaries"))
    .action(async (options: ResolverFlags) => {
      await withServices(servicesFactory, resolverOverrides(options), listCache);
    });

  addResolverOptions(
    cache
      .command("clear")
      .description("Delete the cached binary so the next run downloads it again")
      .option("-a, --all", "Delete every binary this tool has downloaded")
  ).action(async (options: CacheClearOptions) => {
    await withServices(servicesFactory, resolverOverrides(options), (services) =>
      clearCache(services, options.all ?? false)
    );
  });
}

async function withServices(
  servicesFactory: ServicesFactory,
  overrides: ReturnType<typeof resolverOverrides>,
  action: (services: CommandServices) => Promise<void>
): Promise<void> {
  let handle: ServicesHandle;
  try {
    handle = servicesFactory(overrides);
  } catch (error) {
    reportError(error);
    return;
  }
  try {
    await action(handle.services);
  } finally {
    handle.dispose();
  }
}

function configuredCachePath(services: CommandServices): string | undefined {
  const { config } = services;
  const detected = detectPlatform(services.host);
  if (!detected.ok) {
    reportError(detected.error);
    return undefined;
  }
  return cachedBinaryPath(config.cacheDir, detected.value, {
    versioned: config.versionedCache,
    version: config.cloudqueryVersion,
  });
}

async function printCachePath(services: CommandServices): Promise<void> {
  const path = configuredCachePath(services);
  if (!path) return;

  const cached = await fileExists(path);
  if (maybeOutputJson({ path, cached })) return;
  console.log(path);
}

async function listCache(services: CommandServices): Promise<void> {
  const records = services.metadata.list();
  const entries: CacheListJson["entries"] = [];
  for (const record of records) {
    entries.push({
      path: record.path,
      version: record.version,
      platform: formatPlatform(record.platform),
      downloadedAt: record.downloadedAt,
      present: await fileExists(record.path),
    });
  }

  const json: CacheListJson = { cacheDir: services.config.cacheDir, entries };
  if (maybeOutputJson(json)) return;

  if (entries.length === 0) {
    console.log(chalk.gray("No downloaded binaries recorded."));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Path"),
      chalk.cyan("Version"),
      chalk.cyan("Platform"),
      chalk.cyan("Downloaded"),
      chalk.cyan("Present"),
    ],
  });
  for (const entry of entries) {
    table.push([
      entry.path,
      entry.version,
      entry.platform,
      entry.downloadedAt,
      entry.present ? chalk.green("yes") : chalk.yellow("no"),
    ]);
  }
  console.log(table.toString());
}

async function clearCache(services: CommandServices, all: boolean): Promise<void> {
  let targets: string[];
  if (all) {
    targets = services.metadata.list().map((record) => record.path);
  } else {
    const path = configuredCachePath(services);
    if (!path) return;
    targets = [path];
  }

  const spinner = createSpinner("Clearing cache...").start();
  const removed: string[] = [];
  try {
    for (const path of targets) {
      if (await removeCachedBinary(path)) {
        removed.push(path);
      }
      services.metadata.remove(path);
    }
  } catch (error) {
    spinner.fail("Failed to clear cache");
    reportError(error);
    return;
  }
  spinner.stop();

  if (maybeOutputJson({ removed })) return;

  if (removed.length === 0) {
    console.log(chalk.gray("Nothing to remove."));
    return;
  }
  for (const path of removed) {
    console.log(chalk.green(`Removed ${path}`));
  }
}

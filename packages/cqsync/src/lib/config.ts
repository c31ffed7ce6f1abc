import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { configInvalid } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { DEFAULT_CLOUDQUERY_VERSION, DEFAULT_RELEASE_BASE_URL } from "./release.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/cqsync/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "cqsync",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  cloudqueryVersion: DEFAULT_CLOUDQUERY_VERSION,
  releaseBaseUrl: DEFAULT_RELEASE_BASE_URL,
  versionedCache: false,
  specFilePath: "sync_spec.yml",
  syncTimeoutMs: 0,
  downloadTimeoutMs: 5 * 60 * 1000,
  retries: 1,
  retryDelayMs: 0,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const CloudQuerySchema = z.object({
  version: z.string().min(1).optional(),
  releaseBaseUrl: z.string().url().optional(),
  cacheDir: z.string().min(1).optional(),
  versionedCache: z.boolean().optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  cloudquery: CloudQuerySchema.optional(),
  sync: z
    .object({
      specFilePath: z.string().min(1).optional(),
      timeoutMs: z.number().int().min(0).optional(),
    })
    .optional(),
  download: z
    .object({
      timeoutMs: z.number().int().min(0).optional(),
    })
    .optional(),
  pipeline: z
    .object({
      retries: z.number().int().min(0).max(10).optional(),
      retryDelayMs: z.number().int().min(0).max(600000).optional(),
    })
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  cloudqueryVersion: string;
  releaseBaseUrl: string;
  cacheDir: string;
  versionedCache: boolean;
  specFilePath: string;
  syncTimeoutMs: number;
  downloadTimeoutMs: number;
  retries: number;
  retryDelayMs: number;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws a CONFIG_INVALID CLIError if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw configInvalid(path, `Cannot read file: ${(err as Error).message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw configInvalid(path, `Invalid YAML: ${(err as Error).message}`);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw configInvalid(path, `Config validation failed:\n${issues}`);
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { cloudquery, sync, download, pipeline, logging } = source;

  if (cloudquery?.version !== undefined) target.cloudqueryVersion = cloudquery.version;
  if (cloudquery?.releaseBaseUrl !== undefined) target.releaseBaseUrl = cloudquery.releaseBaseUrl;
  if (cloudquery?.cacheDir !== undefined) target.cacheDir = cloudquery.cacheDir;
  if (cloudquery?.versionedCache !== undefined) target.versionedCache = cloudquery.versionedCache;
  if (sync?.specFilePath !== undefined) target.specFilePath = sync.specFilePath;
  if (sync?.timeoutMs !== undefined) target.syncTimeoutMs = sync.timeoutMs;
  if (download?.timeoutMs !== undefined) target.downloadTimeoutMs = download.timeoutMs;
  if (pipeline?.retries !== undefined) target.retries = pipeline.retries;
  if (pipeline?.retryDelayMs !== undefined) target.retryDelayMs = pipeline.retryDelayMs;
  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : undefined;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

/**
 * Read overrides from CQSYNC_* environment variables.
 * Unparseable values are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<ResolvedConfig> {
  const logLevel = env.CQSYNC_LOG_LEVEL;
  const logJson = env.CQSYNC_LOG_JSON;

  return filterUndefined({
    cloudqueryVersion: env.CQSYNC_CLOUDQUERY_VERSION || undefined,
    specFilePath: env.CQSYNC_SPEC_FILE || undefined,
    cacheDir: env.CQSYNC_CACHE_DIR || undefined,
    releaseBaseUrl: env.CQSYNC_RELEASE_BASE_URL || undefined,
    retries: parseNonNegativeInt(env.CQSYNC_RETRIES),
    syncTimeoutMs: parseNonNegativeInt(env.CQSYNC_SYNC_TIMEOUT_MS),
    downloadTimeoutMs: parseNonNegativeInt(env.CQSYNC_DOWNLOAD_TIMEOUT_MS),
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
    logJson: logJson === "1" || logJson === "true" ? true : undefined,
  });
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Environment > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOptions: Partial<ResolvedConfig> = {}
): ResolvedConfig {
  // Start with defaults
  const config: ResolvedConfig = {
    cloudqueryVersion: CONFIG_DEFAULTS.cloudqueryVersion,
    releaseBaseUrl: CONFIG_DEFAULTS.releaseBaseUrl,
    cacheDir: tmpdir(),
    versionedCache: CONFIG_DEFAULTS.versionedCache,
    specFilePath: CONFIG_DEFAULTS.specFilePath,
    syncTimeoutMs: CONFIG_DEFAULTS.syncTimeoutMs,
    downloadTimeoutMs: CONFIG_DEFAULTS.downloadTimeoutMs,
    retries: CONFIG_DEFAULTS.retries,
    retryDelayMs: CONFIG_DEFAULTS.retryDelayMs,
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(envOptions));
  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, configFromEnv(env));

  return { config, sources };
}

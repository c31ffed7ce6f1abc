/**
 * Per-command wiring: configuration, logger, cancellation and adapters.
 */

import { ConfCacheMetadataStore, createProcessSignalHandler } from "./adapters/index.js";
import { getContext } from "./cli-context.js";
import { loadConfig, type ResolvedConfig } from "./config.js";
import { createLogger, type LogSink, type Logger } from "./logger.js";
import type { HostInfo } from "./platform.js";
import type { CacheMetadataStore, DownloadService, ProcessRunner } from "./ports/index.js";
import type { ResolveBinaryOptions } from "./resolver.js";

export interface CommandServices {
  config: ResolvedConfig;
  /** Config files that contributed to `config` */
  sources: string[];
  logger: Logger;
  signal: AbortSignal;
  metadata: CacheMetadataStore;
  downloader?: DownloadService;
  processRunner?: ProcessRunner;
  host?: HostInfo;
}

export interface ServicesHandle {
  services: CommandServices;
  dispose(): void;
}

/** Builds services for one command invocation; replaced in tests */
export type ServicesFactory = (cliOptions: Partial<ResolvedConfig>) => ServicesHandle;

/** stdout is reserved for command results (paths, sync output, JSON) */
const stderrSink: LogSink = {
  out: (line) => console.error(line),
  err: (line) => console.error(line),
};

/**
 * Load configuration and build the services a command needs.
 * SIGINT/SIGTERM abort `services.signal` until `dispose` is called.
 * Throws a CONFIG_INVALID CLIError when a config file is invalid.
 */
export function createServices(cliOptions: Partial<ResolvedConfig> = {}): ServicesHandle {
  const context = getContext();
  const { config, sources } = loadConfig(context.configPath, cliOptions);

  const logger = createLogger({
    level: context.verbose ? "debug" : config.logLevel,
    json: config.logJson,
    sink: stderrSink,
  });

  const controller = new AbortController();
  const signals = createProcessSignalHandler();
  signals.onShutdown((signal) => {
    logger.warn(`Received ${signal}, stopping`);
    controller.abort(new Error(`Received ${signal}`));
  });

  return {
    services: {
      config,
      sources,
      logger,
      signal: controller.signal,
      metadata: new ConfCacheMetadataStore(),
    },
    dispose: () => signals.removeAll(),
  };
}

/**
 * Resolver options derived from configuration and injected adapters.
 */
export function resolverOptions(services: CommandServices): ResolveBinaryOptions {
  const { config } = services;
  return {
    cacheDir: config.cacheDir,
    releaseBaseUrl: config.releaseBaseUrl,
    versionedCache: config.versionedCache,
    downloadTimeoutMs: config.downloadTimeoutMs,
    metadata: services.metadata,
    downloader: services.downloader,
    processRunner: services.processRunner,
    host: services.host,
  };
}

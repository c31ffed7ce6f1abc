export type { Clock } from "./clock.js";
export type { DelayFn } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { DownloadService, DownloadOptions } from "./download.js";
export type { ProcessRunner, ProcessRunOptions, ProcessResult } from "./process-runner.js";
export type { CacheMetadataStore, CachedBinaryRecord } from "./cache-metadata.js";

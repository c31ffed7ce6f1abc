export { systemClock } from "./system-clock.js";
export { realDelay } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export { createFetchDownloadService, fetchDownloadService } from "./fetch-download.js";
export { childProcessRunner } from "./child-process-runner.js";
export { ConfCacheMetadataStore, MemoryCacheMetadataStore } from "./conf-cache-metadata.js";

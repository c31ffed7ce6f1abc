import type { PlatformDescriptor } from "../platform.js";

export interface CachedBinaryRecord {
  path: string;
  version: string;
  platform: PlatformDescriptor;
  url: string;
  /** ISO 8601 */
  downloadedAt: string;
}

/**
 * Abstraction over where records of downloaded binaries are kept.
 * Records are informational; the cache itself is the file on disk.
 */
export interface CacheMetadataStore {
  get(path: string): CachedBinaryRecord | undefined;
  list(): CachedBinaryRecord[];
  record(entry: CachedBinaryRecord): void;
  remove(path: string): void;
}

import Conf from "conf";
import type { CacheMetadataStore, CachedBinaryRecord } from "../ports/cache-metadata.js";

interface CacheMetadata {
  entries: CachedBinaryRecord[];
}

/**
 * Store for records of downloaded binaries, persisted with conf in the
 * user's config directory.
 */
export class ConfCacheMetadataStore implements CacheMetadataStore {
  private readonly conf: Conf<CacheMetadata>;

  constructor(options: { cwd?: string } = {}) {
    this.conf = new Conf<CacheMetadata>({
      projectName: "cqsync",
      configName: "binary-cache",
      cwd: options.cwd,
      defaults: { entries: [] },
    });
  }

  get(path: string): CachedBinaryRecord | undefined {
    return this.list().find((entry) => entry.path === path);
  }

  list(): CachedBinaryRecord[] {
    return this.conf.get("entries");
  }

  record(entry: CachedBinaryRecord): void {
    const others = this.list().filter((existing) => existing.path !== entry.path);
    this.conf.set("entries", [...others, entry]);
  }

  remove(path: string): void {
    this.conf.set(
      "entries",
      this.list().filter((entry) => entry.path !== path)
    );
  }
}

/**
 * In-memory store, for tests and for runs that should leave no trace.
 */
export class MemoryCacheMetadataStore implements CacheMetadataStore {
  private entries: CachedBinaryRecord[] = [];

  get(path: string): CachedBinaryRecord | undefined {
    return this.entries.find((entry) => entry.path === path);
  }

  list(): CachedBinaryRecord[] {
    return [...this.entries];
  }

  record(entry: CachedBinaryRecord): void {
    this.entries = [...this.entries.filter((existing) => existing.path !== entry.path), entry];
  }

  remove(path: string): void {
    this.entries = this.entries.filter((entry) => entry.path !== path);
  }
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { CachedBinaryRecord } from "../ports/cache-metadata.js";
import { ConfCacheMetadataStore, MemoryCacheMetadataStore } from "./conf-cache-metadata.js";

function record(path: string, version: string): CachedBinaryRecord {
  return {
    path,
    version,
    platform: { os: "linux", arch: "amd64", executableExtension: "" },
    url: `https://github.com/cloudquery/cloudquery/releases/download/cli-${version}/cloudquery_linux_amd64`,
    downloadedAt: "2024-05-01T12:00:00.000Z",
  };
}

describe("ConfCacheMetadataStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cqsync-meta-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty", () => {
    expect(new ConfCacheMetadataStore({ cwd: dir }).list()).toEqual([]);
  });

  it("persists records across instances", () => {
    new ConfCacheMetadataStore({ cwd: dir }).record(record("/tmp/cloudquery", "v6.4.1"));

    const reopened = new ConfCacheMetadataStore({ cwd: dir });
    expect(reopened.get("/tmp/cloudquery")?.version).toBe("v6.4.1");
  });

  it("replaces the record for the same path", () => {
    const store = new ConfCacheMetadataStore({ cwd: dir });
    store.record(record("/tmp/cloudquery", "v6.4.1"));
    store.record(record("/tmp/cloudquery", "v6.5.0"));

    expect(store.list().map((entry) => entry.version)).toEqual(["v6.5.0"]);
  });

  it("removes records", () => {
    const store = new ConfCacheMetadataStore({ cwd: dir });
    store.record(record("/tmp/a", "v6.4.1"));
    store.record(record("/tmp/b", "v6.4.1"));
    store.remove("/tmp/a");

    expect(store.list().map((entry) => entry.path)).toEqual(["/tmp/b"]);
  });
});

describe("MemoryCacheMetadataStore", () => {
  it("records, lists and removes", () => {
    const store = new MemoryCacheMetadataStore();
    store.record(record("/tmp/a", "v6.4.1"));
    store.record(record("/tmp/a", "v6.5.0"));

    expect(store.get("/tmp/a")?.version).toBe("v6.5.0");
    expect(store.list()).toHaveLength(1);

    store.remove("/tmp/a");
    expect(store.get("/tmp/a")).toBeUndefined();
  });
});

import { chmod, mkdir, rename, rm, stat } from "fs/promises";
import { dirname } from "path";
import { lock } from "proper-lockfile";

export const EXECUTABLE_MODE = 0o755;

export interface CacheLockOptions {
  /** Attempts to acquire the lock before giving up */
  retries?: number;
  /** A lock whose holder stopped refreshing it for this long is taken over */
  staleMs?: number;
  /** Called if another process takes over the lock while we still hold it */
  onCompromised?: (error: Error) => void;
}

/**
 * Check whether a file exists at `path`.
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Run `operation` while holding a cross-process lock on `cachePath`.
 *
 * The lock is a `<cachePath>.lock` directory managed by proper-lockfile; the
 * cached file itself does not need to exist.
 */
export async function withCacheLock<T>(
  cachePath: string,
  operation: () => Promise<T>,
  options: CacheLockOptions = {}
): Promise<T> {
  await mkdir(dirname(cachePath), { recursive: true });

  const release = await lock(cachePath, {
    realpath: false,
    stale: options.staleMs ?? 60_000,
    retries: {
      retries: options.retries ?? 60,
      minTimeout: 250,
      maxTimeout: 2_000,
    },
    // proper-lockfile's default handler throws from a timer
    ...(options.onCompromised && { onCompromised: options.onCompromised }),
  });

  try {
    return await operation();
  } finally {
    await release();
  }
}

let partialCounter = 0;

/**
 * Temporary sibling of `cachePath` that is unique to this process and call.
 */
export function partialPath(cachePath: string): string {
  partialCounter += 1;
  return `${cachePath}.${process.pid}.${partialCounter}.partial`;
}

export interface InstallOptions {
  /** Set the execute bits (skipped on Windows) */
  executable: boolean;
}

/**
 * Produce a file with `write` and move it into `cachePath` in one rename, so
 * readers never observe a half-written or non-executable binary.
 * The temporary file is removed if any step fails.
 */
export async function installAtomically(
  cachePath: string,
  write: (tempPath: string) => Promise<void>,
  options: InstallOptions
): Promise<void> {
  const tempPath = partialPath(cachePath);

  try {
    await write(tempPath);
    if (options.executable) {
      await chmod(tempPath, EXECUTABLE_MODE);
    }
    await rename(tempPath, cachePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Delete a cached binary. Returns false if there was nothing to delete.
 */
export async function removeCachedBinary(cachePath: string): Promise<boolean> {
  if (!(await fileExists(cachePath))) {
    return false;
  }
  await rm(cachePath, { force: true });
  return true;
}

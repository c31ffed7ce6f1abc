import { join } from "path";
import type { PlatformDescriptor } from "./platform.js";

export const DEFAULT_RELEASE_BASE_URL =
  "https://github.com/cloudquery/cloudquery/releases/download";

export const DEFAULT_CLOUDQUERY_VERSION = "v6.4.1";

const BINARY_PREFIX = "cloudquery";

/**
 * Release asset name, e.g. "cloudquery_linux_amd64" or "cloudquery_windows_arm64.exe".
 */
export function binaryFileName(platform: PlatformDescriptor): string {
  return `${BINARY_PREFIX}_${platform.os}_${platform.arch}${platform.executableExtension}`;
}

/**
 * Download URL of the release asset for a CLI version tag.
 */
export function buildDownloadUrl(
  version: string,
  platform: PlatformDescriptor,
  baseUrl: string = DEFAULT_RELEASE_BASE_URL
): string {
  const base = baseUrl.replace(/\/+$/, "");
  return `${base}/cli-${version}/${binaryFileName(platform)}`;
}

export interface CachePathOptions {
  /** Encode version and platform in the file name */
  versioned?: boolean;
  version?: string;
}

/**
 * Location of the cached executable.
 *
 * By default the file name is fixed (`cloudquery[.exe]`), so a binary cached for
 * one version is reused for every other version until it is deleted.
 */
export function cachedBinaryPath(
  cacheDir: string,
  platform: PlatformDescriptor,
  options: CachePathOptions = {}
): string {
  if (options.versioned && options.version) {
    const name = `${BINARY_PREFIX}-${options.version}-${platform.os}-${platform.arch}`;
    return join(cacheDir, `${name}${platform.executableExtension}`);
  }
  return join(cacheDir, `${BINARY_PREFIX}${platform.executableExtension}`);
}

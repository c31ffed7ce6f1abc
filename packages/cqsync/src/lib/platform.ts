/**
 * Host platform detection and normalization to CloudQuery release names.
 */

import os from "os";
import type { UnsupportedPlatformError } from "./errors/types.js";
import { unsupportedArch, unsupportedOs } from "./errors/catalog.js";
import { err, ok, type Result } from "./result.js";

export type SupportedOs = "darwin" | "linux" | "windows";
export type SupportedArch = "amd64" | "arm64";

export interface PlatformDescriptor {
  os: SupportedOs;
  arch: SupportedArch;
  executableExtension: "" | ".exe";
}

/** Raw values as reported by the host */
export interface HostInfo {
  platform: string;
  arch: string;
}

const OS_MAP = new Map<string, SupportedOs>([
  ["darwin", "darwin"],
  ["linux", "linux"],
  ["windows", "windows"],
  // Node reports Windows as win32
  ["win32", "windows"],
]);

const ARCH_MAP = new Map<string, SupportedArch>([
  ["x86_64", "amd64"],
  ["amd64", "amd64"],
  // Node's name for x86_64
  ["x64", "amd64"],
  ["aarch64", "arm64"],
  ["arm64", "arm64"],
]);

export function currentHost(): HostInfo {
  return { platform: os.platform(), arch: os.arch() };
}

export function normalizeOs(value: string): Result<SupportedOs, UnsupportedPlatformError> {
  const mapped = OS_MAP.get(value.toLowerCase());
  return mapped ? ok(mapped) : err(unsupportedOs(value));
}

export function normalizeArch(value: string): Result<SupportedArch, UnsupportedPlatformError> {
  const mapped = ARCH_MAP.get(value.toLowerCase());
  return mapped ? ok(mapped) : err(unsupportedArch(value));
}

/**
 * Detect the platform descriptor for the given host (defaults to this process).
 * The OS is checked before the architecture, so an unknown pair reports the OS.
 */
export function detectPlatform(
  host: HostInfo = currentHost()
): Result<PlatformDescriptor, UnsupportedPlatformError> {
  const osResult = normalizeOs(host.platform);
  if (!osResult.ok) return osResult;

  const archResult = normalizeArch(host.arch);
  if (!archResult.ok) return archResult;

  return ok({
    os: osResult.value,
    arch: archResult.value,
    executableExtension: osResult.value === "windows" ? ".exe" : "",
  });
}

/**
 * Format a platform descriptor for display (e.g. "linux/amd64").
 */
export function formatPlatform(platform: PlatformDescriptor): string {
  return `${platform.os}/${platform.arch}`;
}

import { describe, it, expect } from "vitest";
import { UnsupportedPlatformError } from "./errors/types.js";
import { detectPlatform, formatPlatform, normalizeArch, normalizeOs } from "./platform.js";

describe("platform", () => {
  describe("normalizeOs", () => {
    it.each([
      ["darwin", "darwin"],
      ["linux", "linux"],
      ["windows", "windows"],
      ["win32", "windows"],
      ["Linux", "linux"],
      ["Darwin", "darwin"],
    ])("maps %s to %s", (input, expected) => {
      expect(normalizeOs(input)).toEqual({ ok: true, value: expected });
    });

    it("rejects unknown systems", () => {
      const result = normalizeOs("freebsd");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(UnsupportedPlatformError);
      expect(result.error.component).toBe("os");
      expect(result.error.value).toBe("freebsd");
      expect(result.error.message).toBe("Unsupported operating system: freebsd");
    });

    it("does not treat object prototype keys as systems", () => {
      expect(normalizeOs("constructor").ok).toBe(false);
    });
  });

  describe("normalizeArch", () => {
    it.each([
      ["x86_64", "amd64"],
      ["amd64", "amd64"],
      ["x64", "amd64"],
      ["AMD64", "amd64"],
      ["aarch64", "arm64"],
      ["arm64", "arm64"],
    ])("maps %s to %s", (input, expected) => {
      expect(normalizeArch(input)).toEqual({ ok: true, value: expected });
    });

    it("rejects unknown architectures", () => {
      const result = normalizeArch("riscv64");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.component).toBe("arch");
      expect(result.error.message).toBe("Unsupported architecture: riscv64");
      expect(result.error.retryable).toBe(false);
    });
  });

  describe("detectPlatform", () => {
    it("builds a descriptor for Linux on x86_64", () => {
      expect(detectPlatform({ platform: "linux", arch: "x64" })).toEqual({
        ok: true,
        value: { os: "linux", arch: "amd64", executableExtension: "" },
      });
    });

    it("adds the .exe extension on Windows", () => {
      const result = detectPlatform({ platform: "win32", arch: "arm64" });

      expect(result).toEqual({
        ok: true,
        value: { os: "windows", arch: "arm64", executableExtension: ".exe" },
      });
    });

    it("reports the operating system first when both are unsupported", () => {
      const result = detectPlatform({ platform: "sunos", arch: "sparc" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.component).toBe("os");
    });

    it("reports the architecture on a supported system", () => {
      const result = detectPlatform({ platform: "darwin", arch: "ppc64" });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.component).toBe("arch");
      expect(result.error.value).toBe("ppc64");
    });
  });

  describe("formatPlatform", () => {
    it("joins os and arch", () => {
      expect(formatPlatform({ os: "darwin", arch: "arm64", executableExtension: "" })).toBe(
        "darwin/arm64"
      );
    });
  });
});

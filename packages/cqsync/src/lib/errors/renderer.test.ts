import { describe, it, expect, vi } from "vitest";

// Identity chalk, so assertions see plain text
vi.mock("chalk", () => {
  const identity = (text: string) => text;
  const chain: (text: string) => string = new Proxy(identity, { get: () => chain });
  return { default: chain };
});

import { downloadHttpError, specFileNotFound, syncFailed } from "./catalog.js";
import { formatJsonError, formatStaticError, tailLines, wrapText } from "./renderer.js";
import { CLIError } from "./types.js";

describe("renderer", () => {
  describe("wrapText", () => {
    it("breaks on spaces and indents continuation lines", () => {
      expect(wrapText("one two three four", 9, "  ")).toEqual(["one two", "  three", "  four"]);
    });
  });

  describe("tailLines", () => {
    it("keeps the last non-empty lines", () => {
      expect(tailLines("a\n\nb\r\nc\n", 2)).toEqual(["b", "c"]);
    });
  });

  describe("formatStaticError", () => {
    it("shows the sync summary with output blocks", () => {
      const lines = formatStaticError(syncFailed(2, "Loading spec\nSyncing\n", "Error: bad table\n"), 80);

      expect(lines[1]).toBe("✗ CloudQuery sync failed with exit code 2");
      expect(lines).toContain("  stdout:");
      expect(lines).toContain("    Syncing");
      expect(lines).toContain("  stderr:");
      expect(lines).toContain("    Error: bad table");
      expect(lines).toContain("  → Check the sync output above and the spec file for errors");
    });

    it("shows details, example and docs for other errors", () => {
      const lines = formatStaticError(
        downloadHttpError("https://example.test/cloudquery", 404, "Not Found"),
        80
      );

      expect(lines[1]).toBe("✗ Failed to download CloudQuery (HTTP 404 Not Found)");
      expect(lines).toContain("  https://example.test/cloudquery");
      expect(lines).toContain("  Docs: https://github.com/cloudquery/cloudquery/releases");
    });

    it("shows a single example after Try:", () => {
      const lines = formatStaticError(specFileNotFound("missing.yml"), 80);

      expect(lines).toContain("  Try: cqsync run --spec ./sync_spec.yml");
    });
  });

  describe("formatJsonError", () => {
    it("includes the captured output of a failed sync", () => {
      expect(formatJsonError(syncFailed(1, "out", "err\n"))).toEqual({
        error: true,
        code: "SYNC_FAILED",
        message: "CloudQuery sync failed with exit code 1. Output: out",
        retryable: true,
        exitCode: 1,
        stdout: "out",
        stderr: "err\n",
        suggestion: "Check the sync output above and the spec file for errors",
        details: "err",
      });
    });

    it("omits fields that are not set", () => {
      expect(formatJsonError(new CLIError("UNKNOWN_ERROR", "boom"))).toEqual({
        error: true,
        code: "UNKNOWN_ERROR",
        message: "boom",
        retryable: false,
      });
    });
  });
});

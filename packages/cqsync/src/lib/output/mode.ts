/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tty" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tty`: Interactive terminal, spinners and colour
 * - `static`: Plain line output (for CI, pipes, schedulers)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): OutputMode {
  if (argv.includes("--json") || env.CQSYNC_JSON === "1" || env.CQSYNC_JSON === "true") {
    return "json";
  }

  if (env.CI || env.TERM === "dumb" || !isTTY) {
    return "static";
  }

  return "tty";
}

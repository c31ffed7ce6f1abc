/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Lower the log level to debug */
  verbose: boolean;
  /** Explicit config file (--config) */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  verbose: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (argv.includes("--verbose") || argv.includes("-v")) {
    currentContext.verbose = true;
  }

  const configIdx = argv.findIndex((arg) => arg === "--config");
  const configValue = configIdx === -1 ? undefined : argv[configIdx + 1];
  if (configValue && !configValue.startsWith("-")) {
    currentContext.configPath = configValue;
  }

  // Environment variable overrides
  if (isTruthyEnv(env.CQSYNC_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  // No spinners in CI logs
  if (isTruthyEnv(env.CQSYNC_QUIET) || env.CI) {
    currentContext.quiet = true;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}

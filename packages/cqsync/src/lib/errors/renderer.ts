import chalk from "chalk";
import { CLIError, SyncExecutionError, toCLIError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/** Lines of captured sync output shown in static mode */
const OUTPUT_TAIL_LINES = 20;

function getTerminalWidth(): number {
  return process.stdout.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Last `count` non-empty lines of captured process output.
 */
export function tailLines(output: string, count: number = OUTPUT_TAIL_LINES): string[] {
  return output
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "")
    .slice(-count);
}

/**
 * Build the static-mode lines for an error.
 */
export function formatStaticError(error: CLIError, width: number = getTerminalWidth()): string[] {
  const termWidth = Math.min(width, 80);
  const output: string[] = [""];

  // Sync output goes in its own block, so the headline stays short
  const headline = error instanceof SyncExecutionError ? error.summary : error.message;

  const errorLines = wrapText(headline, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0] ?? "")}`);
  for (const line of errorLines.slice(1)) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error instanceof SyncExecutionError) {
    const stdoutTail = tailLines(error.stdout);
    if (stdoutTail.length > 0) {
      output.push("");
      output.push(`  ${chalk.dim("stdout:")}`);
      for (const line of stdoutTail) output.push(`    ${line}`);
    }
    const stderrTail = tailLines(error.stderr);
    if (stderrTail.length > 0) {
      output.push("");
      output.push(`  ${chalk.dim("stderr:")}`);
      for (const line of stderrTail) output.push(`    ${chalk.yellow(line)}`);
    }
  } else if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, termWidth - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion || error.example || error.examples?.length) {
    output.push("");

    if (error.suggestion) {
      const suggestionLines = wrapText(error.suggestion, termWidth - 4, "  ");
      output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0] ?? ""}`);
      for (const line of suggestionLines.slice(1)) {
        output.push(`    ${line}`);
      }
    }

    const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];
    if (examples.length === 1) {
      output.push("");
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
    } else if (examples.length > 1) {
      output.push("");
      output.push(`  ${chalk.dim("Examples:")}`);
      for (const ex of examples.slice(0, 3)) {
        output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
      }
    }
  }

  if (error.docs) {
    output.push("");
    output.push(`  ${chalk.dim("Docs:")} ${chalk.blue.underline(error.docs)}`);
  }

  output.push("");
  return output;
}

/**
 * JSON shape of an error, without undefined fields.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    retryable: error.retryable,
    exitCode: error instanceof SyncExecutionError ? error.exitCode : undefined,
    stdout: error instanceof SyncExecutionError ? error.stdout : undefined,
    stderr: error instanceof SyncExecutionError ? error.stderr : undefined,
    suggestion: error.suggestion,
    example: error.example,
    examples: error.examples,
    docs: error.docs,
    details: error.details,
  };

  return Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );
}

/**
 * Render an error based on the current output mode. Always writes to stderr.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      console.error(JSON.stringify(formatJsonError(error), null, 2));
      break;
    case "static":
    case "tty":
      for (const line of formatStaticError(error)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(toCLIError(error), mode);
}

// Re-export for convenience
export { CLIError };

/**
 * Abstraction for running a child process to completion.
 * Allows testing without spawning real executables.
 */
export interface ProcessRunner {
  /**
   * Run `command` with `args`, buffering both output streams until exit.
   * Rejects only when the process cannot be started.
   */
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

export interface ProcessRunOptions {
  /** Kill the child after this many milliseconds; 0 or undefined waits forever */
  timeoutMs?: number;
  signal?: AbortSignal;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  /** Null when the child was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
}

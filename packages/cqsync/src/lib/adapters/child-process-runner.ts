import { spawn } from "child_process";
import type { ProcessResult, ProcessRunner, ProcessRunOptions } from "../ports/process-runner.js";

/**
 * Process runner backed by child_process.spawn.
 * Output is collected in memory and handed back once the child has exited.
 */
export const childProcessRunner: ProcessRunner = {
  run(command: string, args: string[], options: ProcessRunOptions = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      if (options.signal?.aborted) {
        resolve({
          exitCode: null,
          signal: null,
          stdout: "",
          stderr: "",
          timedOut: false,
          cancelled: true,
        });
        return;
      }

      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let cancelled = false;
      let timer: NodeJS.Timeout | undefined;

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      const onAbort = () => {
        cancelled = true;
        child.kill("SIGTERM");
      };
      options.signal?.addEventListener("abort", onAbort, { once: true });

      if (options.timeoutMs && options.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill("SIGTERM");
        }, options.timeoutMs);
      }

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        options.signal?.removeEventListener("abort", onAbort);
      };

      child.once("error", (error) => {
        cleanup();
        reject(error);
      });

      child.once("close", (code, signal) => {
        cleanup();
        resolve({
          exitCode: code,
          signal,
          stdout: Buffer.concat(stdout).toString("utf-8"),
          stderr: Buffer.concat(stderr).toString("utf-8"),
          timedOut,
          cancelled,
        });
      });
    });
  },
};

import type { SignalHandler } from "../ports/signal-handler.js";

/**
 * Create a signal handler for process shutdown signals.
 * The first signal is handed to the callbacks; the process is left to wind
 * down on its own so that child processes can be reaped.
 */
export function createProcessSignalHandler(): SignalHandler {
  const handlers: Array<(signal: NodeJS.Signals) => void> = [];
  let isHandling = false;

  const handleSignal = (signal: NodeJS.Signals) => {
    if (isHandling) {
      // Second Ctrl+C: stop waiting
      process.exit(130);
    }
    isHandling = true;
    for (const handler of handlers) {
      handler(signal);
    }
  };

  return {
    onShutdown(callback) {
      handlers.push(callback);
      if (handlers.length === 1) {
        process.on("SIGTERM", handleSignal);
        process.on("SIGINT", handleSignal);
      }
    },
    removeAll() {
      handlers.length = 0;
      isHandling = false;
      process.off("SIGTERM", handleSignal);
      process.off("SIGINT", handleSignal);
    },
  };
}

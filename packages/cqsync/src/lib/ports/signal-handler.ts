/**
 * Abstraction for process signal handling.
 * Allows testing cancellation without actual process signals.
 */
export interface SignalHandler {
  /** Register a callback for shutdown signals (SIGTERM, SIGINT) */
  onShutdown(callback: (signal: NodeJS.Signals) => void): void;
  /** Remove all registered handlers */
  removeAll(): void;
}

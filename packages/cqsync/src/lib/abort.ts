/**
 * Deadline helpers for AbortSignal-driven operations.
 */

export interface Deadline {
  /** Aborts when the parent aborts or the timeout elapses */
  signal: AbortSignal;
  /** True once the timeout (not the parent) caused the abort */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Derive a signal that follows `parent` and additionally aborts after
 * `timeoutMs`. A timeout of 0 or less means no deadline.
 */
export function createDeadline(parent: AbortSignal | undefined, timeoutMs: number): Deadline {
  const controller = new AbortController();
  let expired = false;
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  if (timeoutMs > 0 && !controller.signal.aborted) {
    timer = setTimeout(() => {
      expired = true;
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Promise-based delay function type.
 * Used between retry attempts; tests inject an immediate one.
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;

import type { Clock } from "../ports/clock.js";

/**
 * Wall clock of the running process.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  isoNow: () => new Date().toISOString(),
};

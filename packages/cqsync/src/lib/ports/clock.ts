/**
 * Abstraction for time-related operations.
 * Allows injecting fake clocks for testing.
 */
export interface Clock {
  /** Current timestamp in milliseconds, used for step durations */
  now(): number;
  /** Current time as an ISO 8601 string, used for cache records */
  isoNow(): string;
}

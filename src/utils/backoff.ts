/**
 * Exponential backoff helpers shared by the side-effect executor and the
 * startup database retry loop.
 *
 * @module utils/backoff
 */

/**
 * Delay before the next attempt: `baseDelayMs * 2^(attempt - 1)`, capped
 *
 * @param attempt - 1-based number of the attempt that just failed
 *
 * @example
 * computeBackoffDelay(1, 500, 10000); // 500
 * computeBackoffDelay(3, 500, 10000); // 2000
 * computeBackoffDelay(10, 500, 10000); // 10000
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(baseDelayMs * Math.pow(2, exponent), maxDelayMs);
}

/**
 * Sleep function signature, injectable so tests do not wait
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Resolve after the given number of milliseconds
 */
export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

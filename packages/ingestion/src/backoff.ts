/**
 * @fileoverview Exponential backoff for rate-limited providers.
 *
 * @module @tickbase/ingestion/backoff
 */

const RATE_LIMIT_MARKERS = ['rate limit', 'too many requests', '429'] as const;

/** Waits the given number of seconds. */
export type Sleeper = (seconds: number) => Promise<void>;

export const sleepSeconds: Sleeper = (seconds) =>
  new Promise((resolve) => setTimeout(resolve, seconds * 1000));

/**
 * Delay before retrying after the given 0-indexed attempt:
 * min(baseDelay * 2^attempt, maxDelay), in seconds.
 *
 * @example
 * ```typescript
 * computeBackoffDelay(0, 1, 60); // 1
 * computeBackoffDelay(3, 1, 60); // 8
 * computeBackoffDelay(7, 1, 60); // 60
 * ```
 */
export function computeBackoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  return Math.min(baseDelay * 2 ** attempt, maxDelay);
}

/**
 * Whether a failure message signals rate limiting (case-insensitive).
 */
export function isRateLimited(message: string | undefined): boolean {
  if (!message) {
    return false;
  }
  const lowered = message.toLowerCase();
  return RATE_LIMIT_MARKERS.some((marker) => lowered.includes(marker));
}

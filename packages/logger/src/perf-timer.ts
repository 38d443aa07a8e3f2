/**
 * @fileoverview Duration measurement for log entries (`duration_ms`).
 */

import type { Logger } from './types.js';

/** Monotonic millisecond clock. */
export type Clock = () => number;

const monotonic: Clock = () => performance.now();

export interface PerfTimer {
  /** Whole milliseconds so far, or the frozen duration once stopped. */
  elapsed(): number;

  /** Freezes the duration on the first call and returns it on every call. */
  stop(): number;

  readonly stopped: boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = await provider.fetchEodData(symbol, start, end);
 * logger.info('Fetched candles', { provider: provider.name, duration_ms: timer.stop() });
 * ```
 */
export function startTimer(clock: Clock = monotonic): PerfTimer {
  const startedAt = clock();
  let stoppedAt: number | undefined;

  return {
    elapsed: () => Math.round((stoppedAt ?? clock()) - startedAt),
    stop() {
      stoppedAt ??= clock();
      return Math.round(stoppedAt - startedAt);
    },
    get stopped() {
      return stoppedAt !== undefined;
    },
  };
}

/**
 * Awaits `fn` and logs `message` at info with its duration. A rejection is
 * logged at error with the duration and rethrown.
 *
 * @example
 * ```typescript
 * await logDuration(logger, 'Price store migrated', { db: db.dbType }, () => migratePriceStore(db));
 * ```
 */
export async function logDuration<T>(
  logger: Logger,
  message: string,
  fields: Record<string, unknown>,
  fn: () => Promise<T>
): Promise<T> {
  const timer = startTimer();
  try {
    const result = await fn();
    logger.info(message, { ...fields, duration_ms: timer.stop() });
    return result;
  } catch (error) {
    logger.error(`${message} (failed)`, {
      ...fields,
      duration_ms: timer.stop(),
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

/**
 * @fileoverview Small series helpers for the numeric cores.
 */

import type { Candle, Decimal } from '@tickbase/contracts';

/**
 * Index access for positions the caller has already bounds-checked.
 *
 * @throws {RangeError} If index is outside the array
 */
export function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`Index ${index} out of bounds for series of length ${items.length}`);
  }
  return item;
}

export function closes(candles: readonly Candle[]): Decimal[] {
  return candles.map((candle) => candle.close);
}

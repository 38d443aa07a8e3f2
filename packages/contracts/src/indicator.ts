/**
 * @fileoverview Indicator output types.
 *
 * @module @tickbase/contracts/indicator
 */

import type { Decimal } from './decimal.js';

/** Auxiliary float outputs attached to an indicator value. */
export type IndicatorMetadata = Readonly<Record<string, number>>;

export type MacdMetadata = {
  readonly signal_line: number;
  readonly histogram: number;
};

export type BollingerMetadata = {
  readonly upper_band: number;
  readonly lower_band: number;
  readonly bandwidth: number;
};

export type AtrMetadata = {
  readonly true_range: number;
};

/**
 * One indicator output aligned to the candle it was computed at.
 *
 * @invariant timestamp equals the timestamp of the input candle at the same position
 */
export interface IndicatorValue<M extends IndicatorMetadata = IndicatorMetadata> {
  readonly timestamp: Date;
  readonly indicatorName: string;
  readonly value: Decimal;
  readonly metadata?: M;
}

/**
 * Builds a frozen IndicatorValue. Metadata is copied and frozen too.
 *
 * @example
 * ```typescript
 * createIndicatorValue(candle.timestamp, 'ATR_14', atr, { true_range: 1.5 });
 * ```
 */
export function createIndicatorValue<M extends IndicatorMetadata = IndicatorMetadata>(
  timestamp: Date,
  indicatorName: string,
  value: Decimal,
  metadata?: M
): IndicatorValue<M> {
  let result: IndicatorValue<M>;
  if (metadata === undefined) {
    result = { timestamp, indicatorName, value };
  } else {
    const copy = { ...metadata };
    Object.freeze(copy);
    result = { timestamp, indicatorName, value, metadata: copy };
  }
  Object.freeze(result);
  return result;
}

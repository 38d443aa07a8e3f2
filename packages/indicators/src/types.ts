/**
 * @fileoverview Indicator contract.
 *
 * @module @tickbase/indicators/types
 */

import type { Candle, IndicatorValue } from '@tickbase/contracts';

/** Untyped parameter bag, e.g. `{ period: 20 }` or `{ fast: 12, slow: 26, signal: 9 }`. */
export type IndicatorParams = Readonly<Record<string, unknown>>;

/**
 * A technical indicator bound to its configured parameters.
 *
 * Passing `params` to either method overrides the configured ones for that
 * call only; the overriding params go through the same validation.
 *
 * @example
 * ```typescript
 * const sma = new SMAIndicator(20);
 * sma.name;                          // 'SMA_20'
 * sma.requiredPeriods();             // 20
 * sma.compute(candles, { period: 5 }); // values named 'SMA_5'
 * ```
 */
export interface Indicator {
  /** Stable identity encoding the parameters, e.g. 'MACD_12_26_9'. */
  readonly name: string;
  readonly params: IndicatorParams;
  requiredPeriods(params?: IndicatorParams): number;
  /**
   * @throws {IndicatorParameterError} If params are invalid
   * @throws {InsufficientDataError} If fewer candles than requiredPeriods() are given
   */
  compute(candles: readonly Candle[], params?: IndicatorParams): IndicatorValue[];
}

/**
 * Everything {@link guardedCompute} needs to run one indicator: how to parse
 * and name its parameters, how much history it needs, and its numeric core.
 */
export interface IndicatorDefinition<P extends IndicatorParams> {
  parseParams(params: IndicatorParams): P;
  nameFor(params: P): string;
  requiredPeriods(params: P): number;
  /** Receives ascending candles, at least requiredPeriods(params) of them. */
  computeValues(candles: readonly Candle[], params: P, name: string): IndicatorValue[];
}

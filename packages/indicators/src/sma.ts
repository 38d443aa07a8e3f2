/**
 * @fileoverview Simple Moving Average.
 *
 * SMA(i) = mean(close[i-period+1..i]). The first value lands on the candle at
 * index period-1, so n candles yield n-period+1 values.
 *
 * @module @tickbase/indicators/sma
 */

import { createIndicatorValue, meanDecimals, type Candle, type IndicatorValue } from '@tickbase/contracts';
import { guardedCompute } from './guard.js';
import { validatePeriod } from './params.js';
import { closes } from './series.js';
import type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';

export type PeriodParams = { readonly period: number };

/**
 * Numeric core, also the middle band of Bollinger Bands. Expects ascending
 * candles, at least `period` of them.
 */
export function computeSma(candles: readonly Candle[], period: number, name: string): IndicatorValue[] {
  const series = closes(candles);
  const values: IndicatorValue[] = [];

  for (const [i, candle] of candles.entries()) {
    if (i < period - 1) {
      continue;
    }
    const mean = meanDecimals(series.slice(i - period + 1, i + 1));
    values.push(createIndicatorValue(candle.timestamp, name, mean));
  }

  return values;
}

export const smaDefinition: IndicatorDefinition<PeriodParams> = {
  parseParams: (params) => ({ period: validatePeriod(params, 'period', 'SMA') }),
  nameFor: ({ period }) => `SMA_${period}`,
  requiredPeriods: ({ period }) => period,
  computeValues: (candles, { period }, name) => computeSma(candles, period, name),
};

/**
 * @example
 * ```typescript
 * new SMAIndicator(3).compute(candlesWithCloses([10, 20, 30, 40, 50])).map((v) => v.value.toNumber());
 * // [20, 30, 40]
 * ```
 */
export class SMAIndicator implements Indicator {
  readonly name: string;
  readonly params: PeriodParams;

  constructor(period = 20) {
    this.params = smaDefinition.parseParams({ period });
    this.name = smaDefinition.nameFor(this.params);
  }

  requiredPeriods(params: IndicatorParams = this.params): number {
    return smaDefinition.requiredPeriods(smaDefinition.parseParams(params));
  }

  compute(candles: readonly Candle[], params: IndicatorParams = this.params): IndicatorValue[] {
    return guardedCompute(smaDefinition, candles, params);
  }
}

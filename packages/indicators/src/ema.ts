/**
 * @fileoverview Exponential Moving Average.
 *
 * alpha = 2 / (period + 1), seeded with the SMA of the first `period` closes:
 *
 *   EMA(i) = alpha * close(i) + (1 - alpha) * EMA(i-1)
 *
 * evaluated as EMA(i-1) + alpha * (close(i) - EMA(i-1)), which is the same
 * recurrence and keeps a constant series exactly constant under rounding.
 *
 * @module @tickbase/indicators/ema
 */

import {
  Decimal,
  createIndicatorValue,
  meanDecimals,
  type Candle,
  type IndicatorValue,
} from '@tickbase/contracts';
import { guardedCompute } from './guard.js';
import { validatePeriod } from './params.js';
import { at, closes } from './series.js';
import type { PeriodParams } from './sma.js';
import type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';

/**
 * EMA over an arbitrary series. `result[k]` belongs to `values[k + period - 1]`,
 * so the result has values.length - period + 1 entries.
 */
export function emaSeries(values: readonly Decimal[], period: number): Decimal[] {
  const alpha = new Decimal(2).dividedBy(period + 1);
  let previous = meanDecimals(values.slice(0, period));
  const result = [previous];

  for (const value of values.slice(period)) {
    previous = previous.plus(alpha.times(value.minus(previous)));
    result.push(previous);
  }

  return result;
}

export const emaDefinition: IndicatorDefinition<PeriodParams> = {
  parseParams: (params) => ({ period: validatePeriod(params, 'period', 'EMA') }),
  nameFor: ({ period }) => `EMA_${period}`,
  requiredPeriods: ({ period }) => period,
  computeValues: (candles, { period }, name) =>
    emaSeries(closes(candles), period).map((value, k) =>
      createIndicatorValue(at(candles, k + period - 1).timestamp, name, value)
    ),
};

export class EMAIndicator implements Indicator {
  readonly name: string;
  readonly params: PeriodParams;

  constructor(period = 12) {
    this.params = emaDefinition.parseParams({ period });
    this.name = emaDefinition.nameFor(this.params);
  }

  requiredPeriods(params: IndicatorParams = this.params): number {
    return emaDefinition.requiredPeriods(emaDefinition.parseParams(params));
  }

  compute(candles: readonly Candle[], params: IndicatorParams = this.params): IndicatorValue[] {
    return guardedCompute(emaDefinition, candles, params);
  }
}

/**
 * @fileoverview Average True Range with Wilder smoothing.
 *
 * TR(0) = high - low; TR(i) = max(high - low, |high - prevClose|, |low - prevClose|).
 * The seed is mean(TR[1..period]) and lands on candle `period`; after that
 * ATR(i) = (ATR(i-1) * (period - 1) + TR(i)) / period.
 *
 * @module @tickbase/indicators/atr
 */

import {
  createIndicatorValue,
  meanDecimals,
  type AtrMetadata,
  type Candle,
  type IndicatorValue,
} from '@tickbase/contracts';
import { guardedCompute } from './guard.js';
import { validatePeriod } from './params.js';
import { at } from './series.js';
import type { PeriodParams } from './sma.js';
import type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';

function computeAtr(candles: readonly Candle[], period: number, name: string): IndicatorValue<AtrMetadata>[] {
  const trueRanges = candles.map((candle, i) =>
    i === 0 ? candle.trueRange() : candle.trueRange(at(candles, i - 1).close)
  );

  let atr = meanDecimals(trueRanges.slice(1, period + 1));
  const values = [
    createIndicatorValue<AtrMetadata>(at(candles, period).timestamp, name, atr, {
      true_range: at(trueRanges, period).toNumber(),
    }),
  ];

  for (let i = period + 1; i < candles.length; i++) {
    const trueRange = at(trueRanges, i);
    atr = atr.times(period - 1).plus(trueRange).dividedBy(period);
    values.push(
      createIndicatorValue<AtrMetadata>(at(candles, i).timestamp, name, atr, { true_range: trueRange.toNumber() })
    );
  }

  return values;
}

export const atrDefinition: IndicatorDefinition<PeriodParams> = {
  parseParams: (params) => ({ period: validatePeriod(params, 'period', 'ATR') }),
  nameFor: ({ period }) => `ATR_${period}`,
  requiredPeriods: ({ period }) => period + 1,
  computeValues: (candles, { period }, name) => computeAtr(candles, period, name),
};

export class ATRIndicator implements Indicator {
  readonly name: string;
  readonly params: PeriodParams;

  constructor(period = 14) {
    this.params = atrDefinition.parseParams({ period });
    this.name = atrDefinition.nameFor(this.params);
  }

  requiredPeriods(params: IndicatorParams = this.params): number {
    return atrDefinition.requiredPeriods(atrDefinition.parseParams(params));
  }

  compute(candles: readonly Candle[], params: IndicatorParams = this.params): IndicatorValue[] {
    return guardedCompute(atrDefinition, candles, params);
  }
}

/**
 * @fileoverview Relative Strength Index with Wilder smoothing.
 *
 * The first average gain/loss is the plain mean of the first `period` close
 * changes; after that avg(i) = (avg(i-1) * (period - 1) + x(i)) / period.
 * RSI = 100 - 100 / (1 + avgGain / avgLoss), and 100 whenever avgLoss is zero
 * (a flat run included). The first value lands on the candle at index
 * `period`, so `period + 1` candles are required.
 *
 * @module @tickbase/indicators/rsi
 */

import {
  Decimal,
  ZERO,
  createIndicatorValue,
  sumDecimals,
  type Candle,
  type IndicatorValue,
} from '@tickbase/contracts';
import { guardedCompute } from './guard.js';
import { validatePeriod } from './params.js';
import { at } from './series.js';
import type { PeriodParams } from './sma.js';
import type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';

const HUNDRED = new Decimal(100);

function rsiFrom(avgGain: Decimal, avgLoss: Decimal): Decimal {
  if (avgLoss.isZero()) {
    return HUNDRED;
  }
  const rs = avgGain.dividedBy(avgLoss);
  return HUNDRED.minus(HUNDRED.dividedBy(rs.plus(1)));
}

function computeRsi(candles: readonly Candle[], period: number, name: string): IndicatorValue[] {
  const gains: Decimal[] = [];
  const losses: Decimal[] = [];

  for (let i = 1; i < candles.length; i++) {
    const change = at(candles, i).close.minus(at(candles, i - 1).close);
    gains.push(change.greaterThan(0) ? change : ZERO);
    losses.push(change.lessThan(0) ? change.negated() : ZERO);
  }

  let avgGain = sumDecimals(gains.slice(0, period)).dividedBy(period);
  let avgLoss = sumDecimals(losses.slice(0, period)).dividedBy(period);
  const values = [createIndicatorValue(at(candles, period).timestamp, name, rsiFrom(avgGain, avgLoss))];

  // changes[i] is the move into candles[i + 1]
  for (let i = period; i < gains.length; i++) {
    avgGain = avgGain.times(period - 1).plus(at(gains, i)).dividedBy(period);
    avgLoss = avgLoss.times(period - 1).plus(at(losses, i)).dividedBy(period);
    values.push(createIndicatorValue(at(candles, i + 1).timestamp, name, rsiFrom(avgGain, avgLoss)));
  }

  return values;
}

export const rsiDefinition: IndicatorDefinition<PeriodParams> = {
  parseParams: (params) => ({ period: validatePeriod(params, 'period', 'RSI') }),
  nameFor: ({ period }) => `RSI_${period}`,
  requiredPeriods: ({ period }) => period + 1,
  computeValues: (candles, { period }, name) => computeRsi(candles, period, name),
};

export class RSIIndicator implements Indicator {
  readonly name: string;
  readonly params: PeriodParams;

  constructor(period = 14) {
    this.params = rsiDefinition.parseParams({ period });
    this.name = rsiDefinition.nameFor(this.params);
  }

  requiredPeriods(params: IndicatorParams = this.params): number {
    return rsiDefinition.requiredPeriods(rsiDefinition.parseParams(params));
  }

  compute(candles: readonly Candle[], params: IndicatorParams = this.params): IndicatorValue[] {
    return guardedCompute(rsiDefinition, candles, params);
  }
}

/**
 * @fileoverview Bollinger Bands.
 *
 * The primary value is the middle band, produced by the SMA core itself so it
 * equals SMA(period) pointwise. sigma is the population standard deviation of
 * the same window; upper/lower = middle +/- std_dev * sigma.
 *
 * @module @tickbase/indicators/bollinger
 */

import {
  Decimal,
  createIndicatorValue,
  meanDecimals,
  type BollingerMetadata,
  type Candle,
  type IndicatorValue,
} from '@tickbase/contracts';
import { guardedCompute } from './guard.js';
import { validatePeriod, validatePositiveNumber } from './params.js';
import { closes } from './series.js';
import { computeSma } from './sma.js';
import type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';

export type BollingerParams = {
  readonly period: number;
  readonly std_dev: number;
};

function computeBollinger(
  candles: readonly Candle[],
  params: BollingerParams,
  name: string
): IndicatorValue<BollingerMetadata>[] {
  const { period, std_dev } = params;
  const series = closes(candles);
  const multiplier = new Decimal(std_dev);

  return computeSma(candles, period, name).map((middle, k) => {
    const window = series.slice(k, k + period);
    const sigma = meanDecimals(window.map((close) => close.minus(middle.value).pow(2))).sqrt();
    const upper = middle.value.plus(multiplier.times(sigma));
    const lower = middle.value.minus(multiplier.times(sigma));

    return createIndicatorValue<BollingerMetadata>(middle.timestamp, name, middle.value, {
      upper_band: upper.toNumber(),
      lower_band: lower.toNumber(),
      bandwidth: upper.minus(middle.value).toNumber(),
    });
  });
}

/** Whole multipliers keep one decimal place: 2 renders as `2.0`. */
function formatMultiplier(stdDev: number): string {
  return Number.isInteger(stdDev) ? stdDev.toFixed(1) : String(stdDev);
}

export const bollingerDefinition: IndicatorDefinition<BollingerParams> = {
  parseParams: (params) => ({
    period: validatePeriod(params, 'period', 'BB'),
    std_dev: validatePositiveNumber(params, ['std_dev', 'stdDev'], 'BB'),
  }),
  nameFor: ({ period, std_dev }) => `BB_${period}_${formatMultiplier(std_dev)}`,
  requiredPeriods: ({ period }) => period,
  computeValues: (candles, params, name) => computeBollinger(candles, params, name),
};

export class BollingerBandsIndicator implements Indicator {
  readonly name: string;
  readonly params: BollingerParams;

  constructor(period = 20, stdDev = 2) {
    this.params = bollingerDefinition.parseParams({ period, std_dev: stdDev });
    this.name = bollingerDefinition.nameFor(this.params);
  }

  requiredPeriods(params: IndicatorParams = this.params): number {
    return bollingerDefinition.requiredPeriods(bollingerDefinition.parseParams(params));
  }

  compute(candles: readonly Candle[], params: IndicatorParams = this.params): IndicatorValue[] {
    return guardedCompute(bollingerDefinition, candles, params);
  }
}

/**
 * @fileoverview Moving Average Convergence Divergence.
 *
 * MACD line = EMA(fast) - EMA(slow) wherever both exist (from candle
 * slow-1 on); signal = EMA(signal) over the MACD line. A value is emitted
 * where the signal exists, from candle slow+signal-2 on, so slow+signal-1
 * candles are required. With 12/26/9 and 40 candles that is 7 values.
 *
 * The MACD line is the primary Decimal value; signal_line and histogram are
 * floats, histogram = value - signal_line in float arithmetic.
 *
 * @module @tickbase/indicators/macd
 */

import {
  IndicatorParameterError,
  createIndicatorValue,
  type Candle,
  type IndicatorValue,
  type MacdMetadata,
} from '@tickbase/contracts';
import { emaSeries } from './ema.js';
import { guardedCompute } from './guard.js';
import { validatePeriod } from './params.js';
import { at, closes } from './series.js';
import type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';

export type MacdParams = {
  readonly fast: number;
  readonly slow: number;
  readonly signal: number;
};

function computeMacd(candles: readonly Candle[], params: MacdParams, name: string): IndicatorValue<MacdMetadata>[] {
  const { fast, slow, signal } = params;
  const series = closes(candles);
  const fastEma = emaSeries(series, fast);
  const slowEma = emaSeries(series, slow);

  // slowEma[k] and fastEma[k + slow - fast] both belong to candles[k + slow - 1]
  const macdLine = slowEma.map((slowValue, k) => at(fastEma, k + slow - fast).minus(slowValue));
  const signalLine = emaSeries(macdLine, signal);

  return signalLine.map((signalValue, k) => {
    const macd = at(macdLine, k + signal - 1);
    const signal_line = signalValue.toNumber();
    return createIndicatorValue<MacdMetadata>(at(candles, k + slow + signal - 2).timestamp, name, macd, {
      signal_line,
      histogram: macd.toNumber() - signal_line,
    });
  });
}

export const macdDefinition: IndicatorDefinition<MacdParams> = {
  parseParams: (params) => {
    const fast = validatePeriod(params, 'fast', 'MACD');
    const slow = validatePeriod(params, 'slow', 'MACD');
    const signal = validatePeriod(params, 'signal', 'MACD');
    if (fast >= slow) {
      throw new IndicatorParameterError(`fast period (${fast}) must be less than slow period (${slow})`, {
        parameter: 'fast',
        indicator: 'MACD',
      });
    }
    return { fast, slow, signal };
  },
  nameFor: ({ fast, slow, signal }) => `MACD_${fast}_${slow}_${signal}`,
  requiredPeriods: ({ slow, signal }) => slow + signal - 1,
  computeValues: (candles, params, name) => computeMacd(candles, params, name),
};

export class MACDIndicator implements Indicator {
  readonly name: string;
  readonly params: MacdParams;

  constructor(fast = 12, slow = 26, signal = 9) {
    this.params = macdDefinition.parseParams({ fast, slow, signal });
    this.name = macdDefinition.nameFor(this.params);
  }

  requiredPeriods(params: IndicatorParams = this.params): number {
    return macdDefinition.requiredPeriods(macdDefinition.parseParams(params));
  }

  compute(candles: readonly Candle[], params: IndicatorParams = this.params): IndicatorValue[] {
    return guardedCompute(macdDefinition, candles, params);
  }
}

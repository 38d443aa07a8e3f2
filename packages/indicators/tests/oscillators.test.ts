/**
 * @fileoverview Tests for RSI, MACD, Bollinger Bands and ATR.
 */

import { describe, it, expect } from 'vitest';
import { InsufficientDataError, IndicatorParameterError } from '@tickbase/contracts';
import { ATRIndicator } from '../src/atr.js';
import { BollingerBandsIndicator } from '../src/bollinger.js';
import { MACDIndicator } from '../src/macd.js';
import { RSIIndicator } from '../src/rsi.js';
import { SMAIndicator } from '../src/sma.js';
import { candle, candlesFromCloses, dayAt, numbers, wavyCandles } from './fixtures.js';

const range = <T,>(count: number, map: (i: number) => T) => Array.from({ length: count }, (_, i) => map(i));

describe('RSIIndicator', () => {
  it('should need period + 1 candles', () => {
    expect(new RSIIndicator().name).toBe('RSI_14');
    expect(new RSIIndicator().requiredPeriods()).toBe(15);
    expect(() => new RSIIndicator().compute(candlesFromCloses(range(14, (i) => 100 + i)))).toThrow(
      'RSI_14 requires at least 15 candles, but only 14 provided'
    );
  });

  it('should be 100 throughout a strictly rising series', () => {
    const values = new RSIIndicator(14).compute(candlesFromCloses(range(20, (i) => 100 + i)));

    expect(values).toHaveLength(6);
    expect(values.every((v) => v.value.equals(100))).toBe(true);
    expect(values[0]?.timestamp).toEqual(dayAt(14));
  });

  it('should be 0 throughout a strictly falling series', () => {
    const values = new RSIIndicator(14).compute(candlesFromCloses(range(20, (i) => 200 - i)));

    expect(values.every((v) => v.value.isZero())).toBe(true);
  });

  it('should be 100 on a flat run', () => {
    const values = new RSIIndicator(3).compute(candlesFromCloses([5, 5, 5, 5, 5]));

    expect(numbers(values)).toEqual([100, 100]);
  });

  it('should use Wilder smoothing after the seed', () => {
    // changes +2, -1, +2; seed gain 1, loss 0.5; then gain 1.5, loss 0.25
    const values = new RSIIndicator(2).compute(candlesFromCloses([10, 12, 11, 13]));

    expect(values.map((v) => v.value.toString())).toEqual([
      '66.66666666666666666666666667',
      '85.71428571428571428571428571',
    ]);
    expect(values.map((v) => v.timestamp)).toEqual([dayAt(2), dayAt(3)]);
  });

  it('should stay within [0, 100]', () => {
    const values = new RSIIndicator(5).compute(wavyCandles(60));

    expect(values).toHaveLength(55);
    for (const value of values) {
      expect(value.value.greaterThanOrEqualTo(0)).toBe(true);
      expect(value.value.lessThanOrEqualTo(100)).toBe(true);
    }
  });
});

describe('MACDIndicator', () => {
  it('should encode all three periods in its name', () => {
    expect(new MACDIndicator().name).toBe('MACD_12_26_9');
    expect(new MACDIndicator(8, 17, 5).name).toBe('MACD_8_17_5');
  });

  it('should need slow + signal - 1 candles', () => {
    expect(new MACDIndicator().requiredPeriods()).toBe(34);
    expect(new MACDIndicator().requiredPeriods({ fast: 8, slow: 17, signal: 5 })).toBe(21);
  });

  it('should emit one value per candle from slow + signal - 2 on', () => {
    const candles = candlesFromCloses(range(40, (i) => 100 + i));
    const values = new MACDIndicator().compute(candles);

    expect(values).toHaveLength(7);
    expect(values.map((v) => v.timestamp)).toEqual(range(7, (i) => dayAt(33 + i)));
    expect(values.every((v) => v.value.greaterThan(0))).toBe(true);
  });

  it('should be negative in a downtrend', () => {
    const values = new MACDIndicator().compute(candlesFromCloses(range(40, (i) => 200 - i)));

    expect(values.every((v) => v.value.lessThan(0))).toBe(true);
  });

  it('should be zero everywhere for a constant series', () => {
    const values = new MACDIndicator().compute(candlesFromCloses(range(45, () => 123.45)));

    expect(values).toHaveLength(12);
    for (const value of values) {
      expect(value.value.isZero()).toBe(true);
      expect(value.metadata).toEqual({ signal_line: 0, histogram: 0 });
    }
  });

  it('should report histogram as value minus signal line', () => {
    const values = new MACDIndicator(3, 6, 4).compute(wavyCandles(50));

    expect(values).toHaveLength(42);
    for (const value of values) {
      const signal = value.metadata?.['signal_line'];
      expect(typeof signal).toBe('number');
      expect(value.metadata?.['histogram']).toBe(value.value.toNumber() - (signal ?? Number.NaN));
    }
  });

  it('should reject fast >= slow', () => {
    expect(() => new MACDIndicator(26, 12, 9)).toThrow('fast period (26) must be less than slow period (12)');
    expect(() => new MACDIndicator().compute(wavyCandles(40), { fast: 26, slow: 26, signal: 9 })).toThrow(
      IndicatorParameterError
    );
  });

  it('should name a missing parameter', () => {
    expect(() => new MACDIndicator().compute(wavyCandles(40), { slow: 26, signal: 9 })).toThrow(
      'Missing required parameter: fast'
    );
    expect(() => new MACDIndicator().compute(wavyCandles(40), { fast: 12, slow: 26 })).toThrow(
      'Missing required parameter: signal'
    );
  });

  it('should report insufficient data with counts', () => {
    try {
      new MACDIndicator().compute(wavyCandles(33));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientDataError);
      if (error instanceof InsufficientDataError) {
        expect(error.message).toBe('MACD_12_26_9 requires at least 34 candles, but only 33 provided');
        expect(error.required).toBe(34);
        expect(error.received).toBe(33);
      }
    }
  });
});

describe('BollingerBandsIndicator', () => {
  it('should encode period and multiplier in its name', () => {
    expect(new BollingerBandsIndicator().name).toBe('BB_20_2.0');
    expect(new BollingerBandsIndicator(10, 2.5).name).toBe('BB_10_2.5');
  });

  it('should compute bands from the population standard deviation', () => {
    // mean 5, population sigma 2
    const values = new BollingerBandsIndicator(8, 2).compute(candlesFromCloses([2, 4, 4, 4, 5, 5, 7, 9]));

    expect(values).toHaveLength(1);
    expect(values[0]?.value.toNumber()).toBe(5);
    expect(values[0]?.metadata).toEqual({ upper_band: 9, lower_band: 1, bandwidth: 4 });
  });

  it('should accept stdDev as an alias for std_dev', () => {
    const values = new BollingerBandsIndicator().compute(candlesFromCloses([2, 4, 4, 4, 5, 5, 7, 9]), {
      period: 8,
      stdDev: 1,
    });

    expect(values[0]?.indicatorName).toBe('BB_8_1.0');
    expect(values[0]?.metadata).toEqual({ upper_band: 7, lower_band: 3, bandwidth: 2 });
  });

  it('should match the SMA pointwise', () => {
    const candles = wavyCandles(40);
    const bands = new BollingerBandsIndicator(20, 2).compute(candles);
    const sma = new SMAIndicator(20).compute(candles);

    expect(bands.map((v) => v.value.toString())).toEqual(sma.map((v) => v.value.toString()));
    expect(bands.map((v) => v.timestamp)).toEqual(sma.map((v) => v.timestamp));
  });

  it('should order lower < middle < upper when the window varies', () => {
    for (const value of new BollingerBandsIndicator(20, 2).compute(wavyCandles(40))) {
      const middle = value.value.toNumber();
      expect(value.metadata?.['lower_band']).toBeLessThan(middle);
      expect(value.metadata?.['upper_band']).toBeGreaterThan(middle);
    }
  });

  it('should collapse the bands for a constant window', () => {
    const values = new BollingerBandsIndicator(5, 2).compute(candlesFromCloses([7, 7, 7, 7, 7]));

    expect(values[0]?.metadata).toEqual({ upper_band: 7, lower_band: 7, bandwidth: 0 });
  });

  it('should validate std_dev', () => {
    const candles = wavyCandles(25);
    const bb = new BollingerBandsIndicator();

    expect(() => bb.compute(candles, { period: 20 })).toThrow('Missing required parameter: std_dev');
    expect(() => bb.compute(candles, { period: 20, std_dev: -1 })).toThrow('std_dev must be positive, got -1');
    expect(() => bb.compute(candles, { period: 20, std_dev: '2' })).toThrow(
      'std_dev must be a finite number, got string'
    );
    expect(() => bb.compute(candles, { std_dev: 2 })).toThrow('Missing required parameter: period');
  });
});

describe('ATRIndicator', () => {
  it('should need period + 1 candles', () => {
    expect(new ATRIndicator().name).toBe('ATR_14');
    expect(new ATRIndicator().requiredPeriods()).toBe(15);
  });

  it('should seed with the mean true range and then smooth', () => {
    const candles = [
      candle(0, 12, 10, 11),
      candle(1, 13, 11, 12),
      candle(2, 15, 12, 14),
      candle(3, 14, 13, 13),
      candle(4, 20, 19, 19.5),
    ];

    const values = new ATRIndicator(2).compute(candles);

    expect(numbers(values)).toEqual([2.5, 1.75, 4.375]);
    expect(values.map((v) => v.metadata)).toEqual([{ true_range: 3 }, { true_range: 1 }, { true_range: 7 }]);
    expect(values.map((v) => v.timestamp)).toEqual([dayAt(2), dayAt(3), dayAt(4)]);
  });

  it('should be zero for constant OHLC', () => {
    const values = new ATRIndicator(14).compute(candlesFromCloses(range(20, () => 42)));

    expect(values).toHaveLength(6);
    expect(values.every((v) => v.value.isZero())).toBe(true);
  });

  it('should never be negative', () => {
    for (const value of new ATRIndicator(5).compute(wavyCandles(50))) {
      expect(value.value.greaterThanOrEqualTo(0)).toBe(true);
    }
  });
});

/**
 * @fileoverview Candle builders shared by the indicator tests.
 */

import { Candle } from '@tickbase/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;
const START = Date.UTC(2024, 0, 1);

export function dayAt(index: number): Date {
  return new Date(START + index * DAY_MS);
}

/** Flat candles (open = high = low = close) at consecutive days. */
export function candlesFromCloses(closes: readonly (number | string)[]): Candle[] {
  return closes.map(
    (close, i) => new Candle({ timestamp: dayAt(i), open: close, high: close, low: close, close, volume: 1000 })
  );
}

export function candle(index: number, high: number, low: number, close: number): Candle {
  return new Candle({ timestamp: dayAt(index), open: close, high, low, close, volume: 1000 });
}

/** Deterministic zig-zag around an upward drift, with real ranges. */
export function wavyCandles(count: number): Candle[] {
  return Array.from({ length: count }, (_, i) => {
    const close = 100 + i * 0.5 + (i % 3 === 0 ? 2 : i % 3 === 1 ? -1.5 : 0.25);
    return candle(i, close + 1 + (i % 4) * 0.25, close - 1 - (i % 5) * 0.2, close);
  });
}

export function numbers(values: readonly { value: { toNumber(): number } }[]): number[] {
  return values.map((v) => v.value.toNumber());
}

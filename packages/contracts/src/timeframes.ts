/**
 * @fileoverview Timeframe tags and their alignment quanta.
 *
 * Timeframe strings are the bucket-width tags attached to a candle series.
 * The engine treats them as opaque strings except where alignment rules
 * apply, so unknown values are tolerated rather than rejected.
 *
 * @module @tickbase/contracts/timeframes
 */

export enum Timeframe {
  M1 = '1m',
  M5 = '5m',
  M15 = '15m',
  M30 = '30m',
  H1 = '1h',
  H4 = '4h',
  D1 = '1D',
  W1 = '1W',
  MN1 = '1M',
}

// null: calendar buckets have no minute alignment rule
const ALIGNMENT_MINUTES: Readonly<Record<Timeframe, number | null>> = {
  [Timeframe.M1]: 1,
  [Timeframe.M5]: 5,
  [Timeframe.M15]: 15,
  [Timeframe.M30]: 30,
  [Timeframe.H1]: 60,
  [Timeframe.H4]: 240,
  [Timeframe.D1]: null,
  [Timeframe.W1]: null,
  [Timeframe.MN1]: null,
};

const KNOWN: ReadonlySet<string> = new Set(Object.values(Timeframe));

/**
 * @example
 * ```typescript
 * isValidTimeframe('5m')  // true
 * isValidTimeframe('1d')  // false, daily is '1D'
 * ```
 */
export function isValidTimeframe(value: string): value is Timeframe {
  return KNOWN.has(value);
}

/**
 * Minute quantum a timeframe's timestamps align to, or null for daily,
 * weekly, monthly and unrecognized timeframes.
 *
 * @example
 * ```typescript
 * alignmentMinutes('4h')  // 240
 * alignmentMinutes('1D')  // null
 * alignmentMinutes('7m')  // null
 * ```
 */
export function alignmentMinutes(timeframe: string): number | null {
  return isValidTimeframe(timeframe) ? ALIGNMENT_MINUTES[timeframe] : null;
}

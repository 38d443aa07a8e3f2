/**
 * @fileoverview The canonical OHLCV candle.
 *
 * @module @tickbase/contracts/candle
 */

import { Decimal, maxDecimal, toDecimal, formatDecimal, type DecimalLike } from './decimal.js';
import { CandleInvariantError } from './errors.js';
import { isValidDate, toUtcDate, type TimestampLike } from './time.js';
import { Timeframe } from './timeframes.js';

/**
 * Raw, unvalidated candle as handed over by a data provider or read from a
 * fixture. A {@link Candle} satisfies this shape too.
 *
 * @example
 * ```typescript
 * const raw: CandleInput = {
 *   timestamp: '2024-01-15T14:30:00Z',
 *   open: '150.00',
 *   high: '155.00',
 *   low: '149.00',
 *   close: '154.00',
 *   volume: 1000000,
 *   timeframe: '5m'
 * };
 * ```
 */
export interface CandleInput {
  readonly timestamp: TimestampLike;
  readonly open: DecimalLike;
  readonly high: DecimalLike;
  readonly low: DecimalLike;
  readonly close: DecimalLike;
  readonly volume: number;
  /** Defaults to '1D' when omitted. */
  readonly timeframe?: string;
}

/** JSON-safe candle representation; prices are plain decimal strings. */
export interface CandleJSON {
  timestamp: string;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: number;
  timeframe: string;
}

/**
 * One open-high-low-close-volume observation for a fixed time bucket.
 *
 * Immutable. Construction throws {@link CandleInvariantError} unless every
 * invariant holds, so any Candle reachable elsewhere in the system is valid.
 * `timestamp` returns a new Date on each read.
 *
 * @invariant low <= open <= high
 * @invariant low <= close <= high
 * @invariant low <= high
 * @invariant volume >= 0 and finite
 *
 * @example
 * ```typescript
 * const candle = new Candle({
 *   timestamp: new Date('2024-01-15T00:00:00Z'),
 *   open: '150', high: '155', low: '149', close: '154',
 *   volume: 1_000_000
 * });
 * candle.typicalPrice().toString(); // '152.6666666666666666666666667'
 * ```
 */
export class Candle implements CandleInput {
  private readonly epochMs: number;
  readonly open: Decimal;
  readonly high: Decimal;
  readonly low: Decimal;
  readonly close: Decimal;
  readonly volume: number;
  readonly timeframe: string;

  constructor(input: CandleInput) {
    const violations: string[] = [];

    const timestamp = toUtcDate(input.timestamp);
    if (!isValidDate(timestamp)) {
      violations.push(`timestamp (${String(input.timestamp)}) is not a valid date`);
    }

    const open = parsePrice('open', input.open, violations);
    const high = parsePrice('high', input.high, violations);
    const low = parsePrice('low', input.low, violations);
    const close = parsePrice('close', input.close, violations);

    if (open && high && low && close) {
      if (low.greaterThan(high)) {
        violations.push(`low (${low}) is greater than high (${high})`);
      }
      if (open.lessThan(low) || open.greaterThan(high)) {
        violations.push(`open (${open}) is outside [${low}, ${high}]`);
      }
      if (close.lessThan(low) || close.greaterThan(high)) {
        violations.push(`close (${close}) is outside [${low}, ${high}]`);
      }
    }

    if (!Number.isFinite(input.volume) || input.volume < 0) {
      violations.push(`volume (${input.volume}) must be a non-negative finite number`);
    }

    if (violations.length > 0 || !open || !high || !low || !close) {
      throw new CandleInvariantError(violations, {
        timestamp: String(input.timestamp),
        timeframe: input.timeframe,
      });
    }

    this.epochMs = timestamp.getTime();
    this.open = open;
    this.high = high;
    this.low = low;
    this.close = close;
    this.volume = input.volume;
    this.timeframe = input.timeframe ?? Timeframe.D1;

    Object.freeze(this);
  }

  get timestamp(): Date {
    return new Date(this.epochMs);
  }

  /** (high + low + close) / 3 */
  typicalPrice(): Decimal {
    return this.high.plus(this.low).plus(this.close).dividedBy(3);
  }

  /**
   * True range against the previous candle's close; high - low when there is
   * no previous close.
   */
  trueRange(prevClose?: DecimalLike): Decimal {
    const range = this.high.minus(this.low);
    if (prevClose === undefined) {
      return range;
    }
    const previous = toDecimal(prevClose);
    return maxDecimal(range, this.high.minus(previous).abs(), this.low.minus(previous).abs());
  }

  toJSON(): CandleJSON {
    return {
      timestamp: this.timestamp.toISOString(),
      open: formatDecimal(this.open),
      high: formatDecimal(this.high),
      low: formatDecimal(this.low),
      close: formatDecimal(this.close),
      volume: this.volume,
      timeframe: this.timeframe,
    };
  }
}

function parsePrice(field: string, value: DecimalLike, violations: string[]): Decimal | null {
  try {
    const parsed = toDecimal(value);
    if (!parsed.isFinite()) {
      violations.push(`${field} (${String(value)}) is not a finite number`);
      return null;
    }
    return parsed;
  } catch {
    violations.push(`${field} (${String(value)}) is not a number`);
    return null;
  }
}

/**
 * Returns a copy sorted by timestamp ascending. Input order is never trusted.
 */
export function sortCandles<T extends { readonly timestamp: Date }>(candles: readonly T[]): T[] {
  return [...candles].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

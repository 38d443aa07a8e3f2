/**
 * @fileoverview Fixed-point arithmetic used for every primary price and
 * indicator value.
 *
 * @module @tickbase/contracts/decimal
 */

import { Decimal as DecimalJs } from 'decimal.js';

/**
 * Decimal constructor configured with 28 significant digits and banker's
 * rounding. Arithmetic on an instance uses the configuration of the
 * constructor that created it, so every value entering the engine is
 * re-wrapped through this constructor first.
 */
export const Decimal = DecimalJs.clone({
  precision: 28,
  rounding: DecimalJs.ROUND_HALF_EVEN,
});

export type Decimal = DecimalJs;

/** Anything the Decimal constructor accepts. */
export type DecimalLike = DecimalJs.Value;

export const ZERO: Decimal = new Decimal(0);

/**
 * Wraps a value in the engine's Decimal constructor.
 *
 * @throws {Error} If the value cannot be parsed as a number
 */
export function toDecimal(value: DecimalLike): Decimal {
  return new Decimal(value);
}

export function sumDecimals(values: readonly Decimal[]): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

export function meanDecimals(values: readonly Decimal[]): Decimal {
  if (values.length === 0) {
    throw new Error('Cannot take the mean of an empty series');
  }
  return sumDecimals(values).dividedBy(values.length);
}

export function maxDecimal(first: Decimal, ...rest: Decimal[]): Decimal {
  let max = first;
  for (const value of rest) {
    if (value.greaterThan(max)) {
      max = value;
    }
  }
  return max;
}

/**
 * Renders a decimal in plain (non-exponential) notation, suitable for
 * NUMERIC columns and JSON payloads.
 */
export function formatDecimal(value: Decimal): string {
  return value.toFixed();
}

/**
 * @fileoverview Validation result types.
 *
 * @module @tickbase/validation/types
 */

/**
 * Category of a validation failure.
 */
export enum ValidationErrorType {
  OHLC_INVALID = 'ohlc_invalid',
  VOLUME_NEGATIVE = 'volume_negative',
  TIMESTAMP_FUTURE = 'timestamp_future',
  TIMEFRAME_MISALIGNMENT = 'timeframe_misalignment',
  /** A field is missing, has the wrong type or does not parse. */
  MALFORMED_VALUE = 'malformed_value',
}

export interface ValidationError {
  readonly errorType: ValidationErrorType;
  readonly message: string;
  /** Offending field; 'low,high' when the pair itself is inverted */
  readonly field?: string;
  readonly value?: unknown;
}

/**
 * Outcome of one or more checks. Every applicable check runs and errors
 * accumulate in the order the checks ran.
 *
 * @invariant isValid === (errors.length === 0)
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
}

export interface ValidateCandleOptions {
  /** Timeframe to check alignment against; falls back to the candle's own, then '1D'. */
  timeframe?: string;
  /** @default false */
  allowFuture?: boolean;
  /** Reference "now" for the future-timestamp check. @default new Date() */
  now?: Date;
}

export function validationResult(errors: readonly ValidationError[]): ValidationResult {
  return { isValid: errors.length === 0, errors };
}

export function validationSuccess(): ValidationResult {
  return validationResult([]);
}

export function mergeResults(...results: ValidationResult[]): ValidationResult {
  return validationResult(results.flatMap((result) => result.errors));
}

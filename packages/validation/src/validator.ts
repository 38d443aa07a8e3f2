/**
 * @fileoverview Candle validation rules.
 *
 * Unlike the Candle constructor, which throws, these checks describe what is
 * wrong with a raw candle so a batch can be filtered and the rejects reported.
 * Valid inputs are guaranteed to construct a Candle without throwing.
 *
 * @module @tickbase/validation/validator
 */

import {
  Decimal,
  Timeframe,
  alignmentMinutes,
  isValidDate,
  toDecimal,
  toUtcDate,
  type CandleInput,
  type DecimalLike,
  type TimestampLike,
} from '@tickbase/contracts';
import {
  ValidationErrorType,
  mergeResults,
  validationResult,
  validationSuccess,
  type ValidateCandleOptions,
  type ValidationError,
  type ValidationResult,
} from './types.js';

/**
 * Checks the OHLC ordering clauses, reporting each violated one:
 * low <= high, low <= open <= high and low <= close <= high.
 *
 * @throws {Error} If a price cannot be parsed; use {@link validateCandle} for raw input
 *
 * @example
 * ```typescript
 * validateOhlc('10', '9', '11', '10').errors.map((e) => e.field);
 * // ['low,high', 'open', 'close']
 * ```
 */
export function validateOhlc(
  open: DecimalLike,
  high: DecimalLike,
  low: DecimalLike,
  close: DecimalLike
): ValidationResult {
  const o = toDecimal(open);
  const h = toDecimal(high);
  const l = toDecimal(low);
  const c = toDecimal(close);
  const errors: ValidationError[] = [];

  if (l.greaterThan(h)) {
    errors.push({
      errorType: ValidationErrorType.OHLC_INVALID,
      message: `Low (${l}) must be less than or equal to High (${h})`,
      field: 'low,high',
      value: { low: l.toNumber(), high: h.toNumber() },
    });
  }

  if (o.lessThan(l) || o.greaterThan(h)) {
    errors.push({
      errorType: ValidationErrorType.OHLC_INVALID,
      message: `Open (${o}) must be between Low (${l}) and High (${h})`,
      field: 'open',
      value: o.toNumber(),
    });
  }

  if (c.lessThan(l) || c.greaterThan(h)) {
    errors.push({
      errorType: ValidationErrorType.OHLC_INVALID,
      message: `Close (${c}) must be between Low (${l}) and High (${h})`,
      field: 'close',
      value: c.toNumber(),
    });
  }

  return validationResult(errors);
}

export function validateVolume(volume: number): ValidationResult {
  if (volume < 0) {
    return validationResult([
      {
        errorType: ValidationErrorType.VOLUME_NEGATIVE,
        message: `Volume (${volume}) must be non-negative`,
        field: 'volume',
        value: volume,
      },
    ]);
  }
  return validationSuccess();
}

/**
 * Fails when the timestamp is strictly after `now`, unless `allowFuture`.
 * Naive timestamp strings are read as UTC.
 */
export function validateTimestamp(
  timestamp: TimestampLike,
  allowFuture = false,
  now: Date = new Date()
): ValidationResult {
  const date = toUtcDate(timestamp);
  if (!isValidDate(date)) {
    return validationResult([malformedTimestamp(timestamp)]);
  }

  if (!allowFuture && date.getTime() > now.getTime()) {
    return validationResult([
      {
        errorType: ValidationErrorType.TIMESTAMP_FUTURE,
        message: `Timestamp (${date.toISOString()}) cannot be in the future (now: ${now.toISOString()})`,
        field: 'timestamp',
        value: date.toISOString(),
      },
    ]);
  }

  return validationSuccess();
}

/**
 * Checks that an intraday timestamp sits on its timeframe's minute grid
 * (UTC minute divisible by the quantum). Hourly and 4-hourly timestamps must
 * also have zero seconds. Daily, weekly, monthly and unrecognized timeframes
 * always pass.
 *
 * @example
 * ```typescript
 * validateTimeframeAlignment('2024-01-15T10:15:00Z', '15m').isValid // true
 * validateTimeframeAlignment('2024-01-15T10:07:00Z', '5m').isValid  // false
 * ```
 */
export function validateTimeframeAlignment(timestamp: TimestampLike, timeframe: string): ValidationResult {
  const quantum = alignmentMinutes(timeframe);
  if (quantum === null) {
    return validationSuccess();
  }

  const date = toUtcDate(timestamp);
  if (!isValidDate(date)) {
    return validationResult([malformedTimestamp(timestamp)]);
  }

  const minute = date.getUTCMinutes();
  if (minute % quantum !== 0) {
    return validationResult([
      {
        errorType: ValidationErrorType.TIMEFRAME_MISALIGNMENT,
        message: `Timestamp minute (${minute}) does not align with timeframe ${timeframe} (must be divisible by ${quantum})`,
        field: 'timestamp',
        value: date.toISOString(),
      },
    ]);
  }

  const second = date.getUTCSeconds();
  if (quantum >= 60 && second !== 0) {
    return validationResult([
      {
        errorType: ValidationErrorType.TIMEFRAME_MISALIGNMENT,
        message: `Timestamp for ${timeframe} timeframe must have zero seconds (got ${second})`,
        field: 'timestamp',
        value: date.toISOString(),
      },
    ]);
  }

  return validationSuccess();
}

/**
 * Runs every check against a raw candle and unions the errors.
 *
 * Unparseable prices, a non-finite volume or an invalid timestamp are reported
 * as {@link ValidationErrorType.MALFORMED_VALUE}; checks that depend on a
 * malformed field are skipped, the others still run.
 */
export function validateCandle(input: CandleInput, options: ValidateCandleOptions = {}): ValidationResult {
  const { allowFuture = false, now = new Date() } = options;
  const timeframe = options.timeframe ?? input.timeframe ?? Timeframe.D1;
  const results: ValidationResult[] = [];
  const malformed: ValidationError[] = [];

  const open = parsePrice('open', input.open, malformed);
  const high = parsePrice('high', input.high, malformed);
  const low = parsePrice('low', input.low, malformed);
  const close = parsePrice('close', input.close, malformed);
  if (open && high && low && close) {
    results.push(validateOhlc(open, high, low, close));
  }

  if (!Number.isFinite(input.volume)) {
    malformed.push({
      errorType: ValidationErrorType.MALFORMED_VALUE,
      message: `Volume (${String(input.volume)}) is not a finite number`,
      field: 'volume',
      value: input.volume,
    });
  } else {
    results.push(validateVolume(input.volume));
  }

  const timestamp = toUtcDate(input.timestamp);
  if (!isValidDate(timestamp)) {
    malformed.push(malformedTimestamp(input.timestamp));
  } else {
    results.push(validateTimestamp(timestamp, allowFuture, now));
    results.push(validateTimeframeAlignment(timestamp, timeframe));
  }

  return mergeResults(validationResult(malformed), ...results);
}

const REQUIRED_FIELDS = ['open', 'high', 'low', 'close', 'volume', 'timestamp'] as const;

/**
 * Validates an untyped record (parsed JSON, a database row) with keys
 * open/high/low/close/volume/timestamp and optional timeframe.
 *
 * @example
 * ```typescript
 * validateCandleRecord({
 *   open: '150.00', high: '155.00', low: '149.00', close: '154.00',
 *   volume: 1000000, timestamp: '2024-01-15T10:00:00', timeframe: '1D'
 * }).isValid // true
 * ```
 */
export function validateCandleRecord(
  record: Readonly<Record<string, unknown>>,
  options: ValidateCandleOptions = {}
): ValidationResult {
  const missing: ValidationError[] = REQUIRED_FIELDS.filter((field) => record[field] === undefined || record[field] === null).map(
    (field) => ({
      errorType: ValidationErrorType.MALFORMED_VALUE,
      message: `Missing required field: ${field}`,
      field,
    })
  );
  if (missing.length > 0) {
    return validationResult(missing);
  }

  const { open, high, low, close, volume, timestamp, timeframe } = record;
  const typeErrors: ValidationError[] = [];

  const checkPrice = (field: string, value: unknown): DecimalLike => {
    if (isDecimalLike(value)) {
      return value;
    }
    typeErrors.push(wrongType(field, value, 'a number or numeric string'));
    return Number.NaN;
  };

  const input: CandleInput = {
    open: checkPrice('open', open),
    high: checkPrice('high', high),
    low: checkPrice('low', low),
    close: checkPrice('close', close),
    volume: typeof volume === 'number' ? volume : Number.NaN,
    timestamp: isTimestampLike(timestamp) ? timestamp : Number.NaN,
    timeframe: typeof timeframe === 'string' ? timeframe : undefined,
  };

  if (typeof volume !== 'number') {
    typeErrors.push(wrongType('volume', volume, 'a number'));
  }
  if (!isTimestampLike(timestamp)) {
    typeErrors.push(wrongType('timestamp', timestamp, 'a date, string or epoch milliseconds'));
  }
  if (timeframe !== undefined && typeof timeframe !== 'string') {
    typeErrors.push(wrongType('timeframe', timeframe, 'a string'));
  }

  if (typeErrors.length > 0) {
    return validationResult(typeErrors);
  }
  return validateCandle(input, options);
}

/**
 * The validation rules grouped under one name.
 */
export const CandleValidator = {
  validateOhlc,
  validateVolume,
  validateTimestamp,
  validateTimeframeAlignment,
  validateCandle,
  validateCandleRecord,
} as const;

function parsePrice(field: string, value: DecimalLike, errors: ValidationError[]): Decimal | null {
  let parsed: Decimal;
  try {
    parsed = toDecimal(value);
  } catch {
    errors.push(malformedPrice(field, value));
    return null;
  }
  if (!parsed.isFinite()) {
    errors.push(malformedPrice(field, value));
    return null;
  }
  return parsed;
}

function malformedPrice(field: string, value: DecimalLike): ValidationError {
  return {
    errorType: ValidationErrorType.MALFORMED_VALUE,
    message: `${capitalize(field)} (${String(value)}) is not a finite number`,
    field,
    value: String(value),
  };
}

function malformedTimestamp(value: TimestampLike): ValidationError {
  return {
    errorType: ValidationErrorType.MALFORMED_VALUE,
    message: `Timestamp (${String(value)}) is not a valid date`,
    field: 'timestamp',
    value: String(value),
  };
}

function wrongType(field: string, value: unknown, expected: string): ValidationError {
  return {
    errorType: ValidationErrorType.MALFORMED_VALUE,
    message: `Field ${field} must be ${expected}, got ${typeof value}`,
    field,
    value,
  };
}

function isDecimalLike(value: unknown): value is DecimalLike {
  return typeof value === 'string' || typeof value === 'number' || Decimal.isDecimal(value);
}

function isTimestampLike(value: unknown): value is TimestampLike {
  return typeof value === 'string' || typeof value === 'number' || value instanceof Date;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

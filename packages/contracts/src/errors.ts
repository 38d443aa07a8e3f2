/**
 * @fileoverview Error taxonomy for tickbase.
 *
 * Every failure the engine raises as an exception extends TickbaseError and
 * carries a machine-readable code plus a structured data payload. Conditions
 * that are absorbed into result objects (a single invalid candle, a single
 * failed provider) are data, not errors, and do not appear here.
 *
 * @module @tickbase/contracts/errors
 */

/**
 * Base error class for all tickbase errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is an ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new TickbaseError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class TickbaseError extends Error {
  /** Machine-readable error code, e.g. 'INSUFFICIENT_DATA'. */
  readonly code: string;

  /** Structured context for debugging and retry decisions. */
  readonly data: Readonly<Record<string, unknown>>;

  /** ISO 8601 creation time. */
  readonly timestamp: string;

  constructor(code: string, message: string, data: Record<string, unknown> = {}) {
    super(message);
    this.name = 'TickbaseError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Thrown when a Candle would be constructed in violation of its OHLCV
 * invariants. A Candle instance never exists in an invalid state.
 */
export class CandleInvariantError extends TickbaseError {
  readonly violations: readonly string[];

  constructor(violations: readonly string[], data: Record<string, unknown> = {}) {
    super('CANDLE_INVARIANT', `Invalid candle data: ${violations.join('; ')}`, {
      ...data,
      violations,
    });
    this.name = 'CandleInvariantError';
    this.violations = violations;
  }
}

/**
 * Thrown when an indicator is configured with bad parameters. Callers should
 * reconfigure rather than retry.
 *
 * @example
 * ```typescript
 * throw new IndicatorParameterError('period must be positive, got 0', {
 *   indicator: 'SMA_0',
 *   parameter: 'period',
 * });
 * ```
 */
export class IndicatorParameterError extends TickbaseError {
  constructor(message: string, data: { parameter: string; indicator?: string; [key: string]: unknown }) {
    super('INDICATOR_PARAMETER', message, data);
    this.name = 'IndicatorParameterError';
  }
}

/**
 * Thrown when fewer candles are supplied than an indicator's warm-up needs.
 * Callers should retry with more history.
 */
export class InsufficientDataError extends TickbaseError {
  readonly required: number;
  readonly received: number;

  constructor(
    message: string,
    data: { indicator: string; required: number; received: number; [key: string]: unknown }
  ) {
    super('INSUFFICIENT_DATA', message, data);
    this.name = 'InsufficientDataError';
    this.required = data.required;
    this.received = data.received;
  }
}

/**
 * Thrown when an indicator name is registered twice.
 */
export class DuplicateIndicatorError extends TickbaseError {
  constructor(indicator: string) {
    super('DUPLICATE_INDICATOR', `Indicator '${indicator}' is already registered`, { indicator });
    this.name = 'DuplicateIndicatorError';
  }
}

/**
 * Thrown by a data provider whose fetch failed in a way it chose to raise
 * instead of returning a failure result. The ingestion fallback treats it
 * like any other failed attempt.
 */
export class ProviderFetchError extends TickbaseError {
  constructor(
    message: string,
    data: { provider: string; symbol?: string; statusCode?: number; [key: string]: unknown }
  ) {
    super('PROVIDER_FETCH', message, data);
    this.name = 'ProviderFetchError';
  }
}

/**
 * Thrown by repositories when the storage layer rejects an operation. The
 * enclosing transaction has already been rolled back when this surfaces.
 */
export class StorageError extends TickbaseError {
  constructor(message: string, data: { operation: string; cause?: string; [key: string]: unknown }) {
    super('STORAGE', message, data);
    this.name = 'StorageError';
  }
}

/**
 * Thrown when configuration fails validation.
 */
export class ConfigurationError extends TickbaseError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('CONFIGURATION', `Configuration validation failed:\n${issues.join('\n')}`, { issues });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isTickbaseError(error: unknown): error is TickbaseError {
  return error instanceof TickbaseError;
}

/**
 * Type guard for InsufficientDataError.
 *
 * @example
 * ```typescript
 * catch (err) {
 *   if (isInsufficientDataError(err)) {
 *     await loadMoreHistory(err.required - err.received);
 *   }
 * }
 * ```
 */
export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isIndicatorParameterError(error: unknown): error is IndicatorParameterError {
  return error instanceof IndicatorParameterError;
}

/**
 * Extracts a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

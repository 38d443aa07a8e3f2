/**
 * @fileoverview Main entry point for @tickbase/contracts.
 *
 * Shared value types, timeframe utilities and the error taxonomy used by every
 * other tickbase package.
 *
 * @module @tickbase/contracts
 */

// Decimal arithmetic
export {
  Decimal,
  ZERO,
  toDecimal,
  sumDecimals,
  meanDecimals,
  maxDecimal,
  formatDecimal,
} from './decimal.js';
export type { DecimalLike } from './decimal.js';

// Time
export { toUtcDate, isValidDate } from './time.js';
export type { TimestampLike } from './time.js';

// Timeframes
export { Timeframe, isValidTimeframe, alignmentMinutes } from './timeframes.js';

// Candles
export { Candle, sortCandles } from './candle.js';
export type { CandleInput, CandleJSON } from './candle.js';

// Indicator values
export { createIndicatorValue } from './indicator.js';
export type {
  IndicatorValue,
  IndicatorMetadata,
  MacdMetadata,
  BollingerMetadata,
  AtrMetadata,
} from './indicator.js';

// Error classes and guards
export {
  TickbaseError,
  CandleInvariantError,
  IndicatorParameterError,
  InsufficientDataError,
  DuplicateIndicatorError,
  ProviderFetchError,
  StorageError,
  ConfigurationError,
  isTickbaseError,
  isInsufficientDataError,
  isIndicatorParameterError,
  errorMessage,
} from './errors.js';

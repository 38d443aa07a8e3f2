/**
 * @fileoverview Public API exports for @tickbase/validation.
 */

export {
  CandleValidator,
  validateOhlc,
  validateVolume,
  validateTimestamp,
  validateTimeframeAlignment,
  validateCandle,
  validateCandleRecord,
} from './validator.js';

export { ValidationErrorType, validationResult, validationSuccess, mergeResults } from './types.js';
export type { ValidationError, ValidationResult, ValidateCandleOptions } from './types.js';

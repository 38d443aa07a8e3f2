/**
 * @fileoverview Parameter validation shared by all indicators.
 *
 * @module @tickbase/indicators/params
 */

import { IndicatorParameterError } from '@tickbase/contracts';
import type { IndicatorParams } from './types.js';

/**
 * Reads a period-like parameter: present, an integer (booleans and numeric
 * strings are rejected) and at least 1.
 *
 * @example
 * ```typescript
 * validatePeriod({ period: 14 });            // 14
 * validatePeriod({});                        // throws 'Missing required parameter: period'
 * validatePeriod({ period: '14' });          // throws 'period must be an integer, got string'
 * validatePeriod({ fast: 0 }, 'fast');       // throws 'fast must be positive, got 0'
 * ```
 */
export function validatePeriod(params: IndicatorParams, parameter = 'period', indicator?: string): number {
  const value = params[parameter];

  if (value === undefined || value === null) {
    throw new IndicatorParameterError(`Missing required parameter: ${parameter}`, { parameter, indicator });
  }

  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new IndicatorParameterError(`${parameter} must be an integer, got ${describe(value)}`, {
      parameter,
      indicator,
    });
  }

  if (value < 1) {
    throw new IndicatorParameterError(`${parameter} must be positive, got ${value}`, { parameter, indicator });
  }

  return value;
}

/**
 * Reads a finite, strictly positive number. The first of `names` present in
 * params wins, so aliases such as `std_dev`/`stdDev` share one rule.
 */
export function validatePositiveNumber(
  params: IndicatorParams,
  names: readonly [string, ...string[]],
  indicator?: string
): number {
  const [parameter] = names;
  const value = names.map((name) => params[name]).find((candidate) => candidate !== undefined && candidate !== null);

  if (value === undefined || value === null) {
    throw new IndicatorParameterError(`Missing required parameter: ${parameter}`, { parameter, indicator });
  }

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new IndicatorParameterError(`${parameter} must be a finite number, got ${describe(value)}`, {
      parameter,
      indicator,
    });
  }

  if (value <= 0) {
    throw new IndicatorParameterError(`${parameter} must be positive, got ${value}`, { parameter, indicator });
  }

  return value;
}

function describe(value: unknown): string {
  return typeof value === 'number' ? String(value) : typeof value;
}

/**
 * @fileoverview The validate, check, sort, delegate sequence every indicator
 * runs before its numeric core.
 *
 * @module @tickbase/indicators/guard
 */

import { InsufficientDataError, sortCandles, type Candle, type IndicatorValue } from '@tickbase/contracts';
import type { IndicatorDefinition, IndicatorParams } from './types.js';

/**
 * Runs an indicator definition against a candle batch.
 *
 * 1. parses params (throws IndicatorParameterError)
 * 2. throws InsufficientDataError when the batch is shorter than the warm-up
 * 3. sorts a copy by timestamp ascending; input order is never trusted
 * 4. delegates to the numeric core
 */
export function guardedCompute<P extends IndicatorParams>(
  definition: IndicatorDefinition<P>,
  candles: readonly Candle[],
  params: IndicatorParams
): IndicatorValue[] {
  const parsed = definition.parseParams(params);
  const name = definition.nameFor(parsed);
  const required = definition.requiredPeriods(parsed);

  if (candles.length < required) {
    throw new InsufficientDataError(
      `${name} requires at least ${required} candles, but only ${candles.length} provided`,
      { indicator: name, required, received: candles.length }
    );
  }

  return definition.computeValues(sortCandles(candles), parsed, name);
}

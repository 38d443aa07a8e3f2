/**
 * @fileoverview Public API exports for @tickbase/indicators.
 */

export { SMAIndicator, smaDefinition, computeSma } from './sma.js';
export { EMAIndicator, emaDefinition, emaSeries } from './ema.js';
export { RSIIndicator, rsiDefinition } from './rsi.js';
export { MACDIndicator, macdDefinition } from './macd.js';
export { BollingerBandsIndicator, bollingerDefinition } from './bollinger.js';
export { ATRIndicator, atrDefinition } from './atr.js';
export { IndicatorRegistry, createDefaultRegistry } from './registry.js';
export { guardedCompute } from './guard.js';
export { validatePeriod, validatePositiveNumber } from './params.js';

export type { Indicator, IndicatorDefinition, IndicatorParams } from './types.js';
export type { PeriodParams } from './sma.js';
export type { MacdParams } from './macd.js';
export type { BollingerParams } from './bollinger.js';

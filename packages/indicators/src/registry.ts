/**
 * @fileoverview Name-keyed indicator catalog.
 *
 * @module @tickbase/indicators/registry
 */

import { DuplicateIndicatorError } from '@tickbase/contracts';
import { ATRIndicator } from './atr.js';
import { BollingerBandsIndicator } from './bollinger.js';
import { EMAIndicator } from './ema.js';
import { MACDIndicator } from './macd.js';
import { RSIIndicator } from './rsi.js';
import { SMAIndicator } from './sma.js';
import type { Indicator } from './types.js';

/**
 * Maps indicator names to instances. Construct one explicitly and pass it to
 * whatever resolves indicators by name; there is no global registry.
 *
 * @example
 * ```typescript
 * const registry = new IndicatorRegistry();
 * registry.register(new SMAIndicator(20));
 * registry.get('SMA_20')?.compute(candles);
 * registry.get('SMA_21'); // undefined
 * ```
 */
export class IndicatorRegistry {
  private readonly indicators = new Map<string, Indicator>();

  /**
   * @throws {DuplicateIndicatorError} If an indicator with the same name is registered
   */
  register(indicator: Indicator): void {
    if (this.indicators.has(indicator.name)) {
      throw new DuplicateIndicatorError(indicator.name);
    }
    this.indicators.set(indicator.name, indicator);
  }

  get(name: string): Indicator | undefined {
    return this.indicators.get(name);
  }

  has(name: string): boolean {
    return this.indicators.has(name);
  }

  /** Names in registration order. */
  listAll(): string[] {
    return [...this.indicators.keys()];
  }

  clear(): void {
    this.indicators.clear();
  }

  get size(): number {
    return this.indicators.size;
  }
}

/**
 * Registry holding the standard indicator set: SMA 20/50/200, EMA 12/26,
 * RSI 14, MACD 12/26/9, Bollinger 20/2 and ATR 14.
 */
export function createDefaultRegistry(): IndicatorRegistry {
  const registry = new IndicatorRegistry();
  const defaults: Indicator[] = [
    new SMAIndicator(20),
    new SMAIndicator(50),
    new SMAIndicator(200),
    new EMAIndicator(12),
    new EMAIndicator(26),
    new RSIIndicator(14),
    new MACDIndicator(12, 26, 9),
    new BollingerBandsIndicator(20, 2),
    new ATRIndicator(14),
  ];
  for (const indicator of defaults) {
    registry.register(indicator);
  }
  return registry;
}

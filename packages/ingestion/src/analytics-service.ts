/**
 * @fileoverview Computes registered indicators over stored candle history
 * and persists the results.
 *
 * @module @tickbase/ingestion/analytics-service
 */

import {
  errorMessage,
  isIndicatorParameterError,
  isInsufficientDataError,
  type Candle,
  type IndicatorValue,
} from '@tickbase/contracts';
import type { IndicatorRegistry } from '@tickbase/indicators';
import { createChildLogger, createSilentLogger, getRunId, startTimer, withRunContext, type Logger } from '@tickbase/logger';
import type { CandleQuery, UpsertCounts } from '@tickbase/price-store';

export interface CandleHistory {
  getCandles(query: CandleQuery): Promise<Candle[]>;
}

export interface IndicatorValueStore {
  upsertValues(instrumentId: number, timeframe: string, values: readonly IndicatorValue[]): Promise<UpsertCounts>;
}

/** Per-indicator result of {@link AnalyticsService.computeIndicators}. */
export interface IndicatorOutcome {
  readonly name: string;
  readonly success: boolean;
  /** Values written (inserted + updated). */
  readonly stored: number;
  readonly error?: string;
}

export interface AnalyticsServiceOptions {
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const analytics = new AnalyticsService(createDefaultRegistry(), prices, indicatorValues);
 * const outcomes = await analytics.computeIndicators(1, '1D', ['SMA_20', 'RSI_14']);
 * ```
 */
export class AnalyticsService {
  private readonly logger: Logger;

  constructor(
    private readonly registry: IndicatorRegistry,
    private readonly history: CandleHistory,
    private readonly values: IndicatorValueStore,
    options: AnalyticsServiceOptions = {}
  ) {
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), { component: 'analytics' });
  }

  /**
   * Runs each named indicator (all registered ones by default) over the full
   * stored history of one series.
   *
   * An unknown name, bad parameters or too little history fail that
   * indicator only. Storage errors propagate.
   *
   * @throws {StorageError} If history cannot be read or values cannot be written
   */
  async computeIndicators(
    instrumentId: number,
    timeframe: string,
    names: readonly string[] = this.registry.listAll()
  ): Promise<IndicatorOutcome[]> {
    return withRunContext(
      async () => {
        const candles = await this.history.getCandles({ instrumentId, timeframe });
        const outcomes: IndicatorOutcome[] = [];

        for (const name of names) {
          const indicator = this.registry.get(name);
          if (!indicator) {
            outcomes.push({ name, success: false, stored: 0, error: `Unknown indicator: ${name}` });
            continue;
          }

          const timer = startTimer();
          let computed: IndicatorValue[];
          try {
            computed = indicator.compute(candles);
          } catch (error) {
            if (!isInsufficientDataError(error) && !isIndicatorParameterError(error)) {
              throw error;
            }
            const message = errorMessage(error);
            this.logger.warn('Indicator skipped', { indicator: name, instrument_id: instrumentId, error: message });
            outcomes.push({ name, success: false, stored: 0, error: message });
            continue;
          }

          const counts = await this.values.upsertValues(instrumentId, timeframe, computed);
          const stored = counts.inserted + counts.updated;
          this.logger.info('Indicator computed', {
            indicator: name,
            instrument_id: instrumentId,
            values: stored,
            duration_ms: timer.stop(),
          });
          outcomes.push({ name, success: true, stored });
        }

        return outcomes;
      },
      getRunId(),
      { instrument_id: instrumentId, timeframe }
    );
  }
}

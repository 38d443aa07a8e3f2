/**
 * @fileoverview Fetch, validate and store pipeline for candle history.
 *
 * @module @tickbase/ingestion/ingestion-service
 */

import { Candle, Timeframe, errorMessage, type CandleInput } from '@tickbase/contracts';
import {
  annotateRun,
  createChildLogger,
  createSilentLogger,
  getRunId,
  startTimer,
  withRunContext,
  type Logger,
} from '@tickbase/logger';
import type { UpsertCounts } from '@tickbase/price-store';
import { validateCandle } from '@tickbase/validation';
import { computeBackoffDelay, isRateLimited, sleepSeconds, type Sleeper } from './backoff.js';
import { fetchFailure, type DataProvider, type FetchResult } from './provider.js';

/**
 * Outcome of one ingestion run.
 *
 * @invariant candlesStored === candlesInserted + candlesUpdated
 * @invariant candlesValidated + validationErrors === candlesFetched
 */
export interface IngestionResult {
  readonly success: boolean;
  readonly candlesFetched: number;
  readonly candlesValidated: number;
  readonly candlesStored: number;
  readonly candlesInserted: number;
  readonly candlesUpdated: number;
  readonly validationErrors: number;
  readonly providerUsed?: string;
  readonly errorMessage?: string;
}

/**
 * Where validated candles go. PriceRepository satisfies it.
 */
export interface CandleStore {
  upsertCandles(instrumentId: number, timeframe: string, candles: readonly Candle[]): Promise<UpsertCounts>;
}

export interface IngestionServiceOptions {
  /** Attempts per provider, rate-limit retries included. @default 3 */
  maxRetries?: number;
  /** Seconds. @default 1 */
  baseDelay?: number;
  /** Seconds. @default 60 */
  maxDelay?: number;
  /** @default false */
  allowFutureTimestamps?: boolean;
  logger?: Logger;
  /** Replaces the real timer, e.g. to record delays in tests. */
  sleep?: Sleeper;
  /** Clock for the future-timestamp check. */
  now?: () => Date;
}

interface Progress {
  candlesFetched?: number;
  candlesValidated?: number;
  validationErrors?: number;
  providerUsed?: string;
}

function failureResult(message: string, progress: Progress = {}): IngestionResult {
  return {
    success: false,
    candlesFetched: progress.candlesFetched ?? 0,
    candlesValidated: progress.candlesValidated ?? 0,
    candlesStored: 0,
    candlesInserted: 0,
    candlesUpdated: 0,
    validationErrors: progress.validationErrors ?? 0,
    ...(progress.providerUsed === undefined ? {} : { providerUsed: progress.providerUsed }),
    errorMessage: message,
  };
}

/**
 * Pulls candles from an ordered list of providers, drops the ones that fail
 * validation and upserts the rest.
 *
 * Runs never reject for fetch, validation or storage problems; those come
 * back as a failed {@link IngestionResult}.
 *
 * @example
 * ```typescript
 * const service = new IngestionService([primary, backup], new PriceRepository(db), { logger });
 * const result = await service.ingestEod(1, 'AAPL', new Date('2024-01-01'), new Date('2024-01-31'));
 * if (!result.success) logger.error(result.errorMessage);
 * ```
 */
export class IngestionService {
  private readonly providers: readonly DataProvider[];
  private readonly maxRetries: number;
  private readonly baseDelay: number;
  private readonly maxDelay: number;
  private readonly allowFuture: boolean;
  private readonly logger: Logger;
  private readonly sleep: Sleeper;
  private readonly now: () => Date;

  constructor(
    providers: readonly DataProvider[],
    private readonly store: CandleStore,
    options: IngestionServiceOptions = {}
  ) {
    if (providers.length === 0) {
      throw new Error('At least one data provider must be provided');
    }

    this.providers = [...providers];
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelay = options.baseDelay ?? 1;
    this.maxDelay = options.maxDelay ?? 60;
    this.allowFuture = options.allowFutureTimestamps ?? false;
    this.logger = createChildLogger(options.logger ?? createSilentLogger(), { component: 'ingestion' });
    this.sleep = options.sleep ?? sleepSeconds;
    this.now = options.now ?? (() => new Date());

    if (!Number.isInteger(this.maxRetries) || this.maxRetries < 1) {
      throw new Error(`maxRetries must be a positive integer, got ${this.maxRetries}`);
    }

    this.logger.info('Initialized IngestionService', {
      provider_names: this.providers.map((provider) => provider.name),
      max_retries: this.maxRetries,
      base_delay: this.baseDelay,
      max_delay: this.maxDelay,
    });
  }

  /**
   * Ingests end-of-day history for [startDate, endDate].
   */
  async ingestEod(
    instrumentId: number,
    symbol: string,
    startDate: Date,
    endDate: Date,
    timeframe: string = Timeframe.D1
  ): Promise<IngestionResult> {
    this.logger.info('Starting EOD ingestion', {
      instrument_id: instrumentId,
      symbol,
      timeframe,
      start: startDate.toISOString(),
      end: endDate.toISOString(),
    });

    return this.ingest(instrumentId, symbol, timeframe, (provider) =>
      provider.fetchEodData(symbol, startDate, endDate)
    );
  }

  /**
   * Ingests intraday history for [start, end]; timestamps must align with
   * the timeframe to be stored.
   */
  async ingestIntraday(
    instrumentId: number,
    symbol: string,
    timeframe: string,
    start: Date,
    end: Date
  ): Promise<IngestionResult> {
    this.logger.info('Starting intraday ingestion', {
      instrument_id: instrumentId,
      symbol,
      timeframe,
      start: start.toISOString(),
      end: end.toISOString(),
    });

    return this.ingest(instrumentId, symbol, timeframe, (provider) =>
      provider.fetchIntradayData(symbol, timeframe, start, end)
    );
  }

  private async ingest(
    instrumentId: number,
    symbol: string,
    timeframe: string,
    fetch: (provider: DataProvider) => Promise<FetchResult>
  ): Promise<IngestionResult> {
    return withRunContext(
      async () => {
        const timer = startTimer();

        const fetched = await this.fetchWithFallback(fetch);
        if (!fetched.success) {
          const message = fetched.errorMessage ?? 'All providers failed';
          this.logger.error('Fetch failed', { error: message });
          return failureResult(message);
        }

        const providerUsed = fetched.providerName;
        annotateRun({ provider: providerUsed });
        const candlesFetched = fetched.candles.length;
        const valid = this.validateCandles(fetched.candles, timeframe);
        const validationErrors = candlesFetched - valid.length;
        const progress: Progress = {
          candlesFetched,
          candlesValidated: valid.length,
          validationErrors,
          ...(providerUsed === undefined ? {} : { providerUsed }),
        };

        if (valid.length === 0) {
          const message = `No valid candles after validation (all ${candlesFetched} failed)`;
          this.logger.error(message, { candles_fetched: candlesFetched });
          return failureResult(message, progress);
        }

        let counts: UpsertCounts;
        try {
          counts = await this.store.upsertCandles(instrumentId, timeframe, valid);
        } catch (error) {
          const message = `Failed to store candles: ${errorMessage(error)}`;
          this.logger.error(message, { candles: valid.length });
          return failureResult(message, progress);
        }

        const result: IngestionResult = {
          success: true,
          candlesFetched,
          candlesValidated: valid.length,
          candlesStored: counts.inserted + counts.updated,
          candlesInserted: counts.inserted,
          candlesUpdated: counts.updated,
          validationErrors,
          ...(providerUsed === undefined ? {} : { providerUsed }),
        };

        this.logger.info('Ingestion complete', {
          candles_fetched: result.candlesFetched,
          candles_validated: result.candlesValidated,
          candles_inserted: result.candlesInserted,
          candles_updated: result.candlesUpdated,
          validation_errors: result.validationErrors,
          provider: providerUsed,
          duration_ms: timer.stop(),
        });

        return result;
      },
      getRunId(),
      { instrument_id: instrumentId, symbol, timeframe }
    );
  }

  /**
   * Tries providers in order. Rate-limited failures back off and retry the
   * same provider while attempts remain; anything else moves on.
   */
  private async fetchWithFallback(fetch: (provider: DataProvider) => Promise<FetchResult>): Promise<FetchResult> {
    let lastError: string | undefined;

    for (const [index, provider] of this.providers.entries()) {
      this.logger.info('Fetching from provider', {
        provider: provider.name,
        provider_index: index,
        total_providers: this.providers.length,
      });

      for (let attempt = 0; attempt < this.maxRetries; attempt++) {
        const timer = startTimer();
        let result: FetchResult;
        try {
          result = await fetch(provider);
        } catch (error) {
          lastError = errorMessage(error);
          this.logger.error('Provider threw while fetching', {
            provider: provider.name,
            attempt,
            error: lastError,
          });
          break;
        }

        if (result.success) {
          this.logger.info('Fetched candles', {
            provider: provider.name,
            attempt,
            candles: result.candles.length,
            duration_ms: timer.stop(),
          });
          return { ...result, providerName: provider.name };
        }

        lastError = result.errorMessage ?? `Provider ${provider.name} returned no data`;

        if (isRateLimited(result.errorMessage) && attempt < this.maxRetries - 1) {
          const delay = computeBackoffDelay(attempt, this.baseDelay, this.maxDelay);
          this.logger.warn('Rate limited, backing off', {
            provider: provider.name,
            attempt,
            max_retries: this.maxRetries,
            delay_seconds: delay,
            error: lastError,
          });
          await this.sleep(delay);
          continue;
        }

        this.logger.warn('Provider fetch failed', { provider: provider.name, attempt, error: lastError });
        break;
      }
    }

    this.logger.error('All data providers failed', {
      total_providers: this.providers.length,
      last_error: lastError,
    });
    return fetchFailure(`All providers failed. Last error: ${lastError ?? 'unknown error'}`);
  }

  private validateCandles(inputs: readonly CandleInput[], timeframe: string): Candle[] {
    const now = this.now();
    const valid: Candle[] = [];

    for (const input of inputs) {
      const result = validateCandle(input, { timeframe, allowFuture: this.allowFuture, now });
      if (!result.isValid) {
        this.logger.warn('Candle failed validation', {
          timestamp: String(input.timestamp),
          timeframe,
          errors: result.errors.map((error) => `${error.errorType}: ${error.message}`),
        });
        continue;
      }
      valid.push(new Candle({ ...input, timeframe }));
    }

    this.logger.info('Validation complete', {
      timeframe,
      total: inputs.length,
      valid: valid.length,
      invalid: inputs.length - valid.length,
    });

    return valid;
  }
}

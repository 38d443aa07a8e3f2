/**
 * @fileoverview Data provider contract.
 *
 * @module @tickbase/ingestion/provider
 */

import type { CandleInput } from '@tickbase/contracts';

/**
 * Outcome of one provider fetch. Candles are raw and unvalidated.
 *
 * @invariant success === true implies errorMessage is undefined
 */
export interface FetchResult {
  readonly success: boolean;
  readonly candles: readonly CandleInput[];
  readonly errorMessage?: string;
  readonly providerName?: string;
}

/**
 * A source of OHLCV history. Providers should report failures through a
 * failed {@link FetchResult}; a thrown error is tolerated and treated the
 * same way by the ingestion fallback, except that it is never retried.
 *
 * A failure message mentioning "rate limit", "too many requests" or "429"
 * makes the caller back off and retry the same provider.
 */
export interface DataProvider {
  readonly name: string;

  /** Daily candles with timestamps in [startDate, endDate]. */
  fetchEodData(symbol: string, startDate: Date, endDate: Date): Promise<FetchResult>;

  /** Intraday candles of the given timeframe with timestamps in [start, end]. */
  fetchIntradayData(symbol: string, timeframe: string, start: Date, end: Date): Promise<FetchResult>;
}

export function fetchSuccess(candles: readonly CandleInput[], providerName: string): FetchResult {
  return { success: true, candles, providerName };
}

export function fetchFailure(errorMessage: string, providerName?: string): FetchResult {
  return providerName === undefined
    ? { success: false, candles: [], errorMessage }
    : { success: false, candles: [], errorMessage, providerName };
}

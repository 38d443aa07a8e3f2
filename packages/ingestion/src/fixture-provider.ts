/**
 * @fileoverview Data provider backed by JSON files on disk.
 *
 * @module @tickbase/ingestion/fixture-provider
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import {
  ProviderFetchError,
  Timeframe,
  errorMessage,
  isValidDate,
  toUtcDate,
  type CandleInput,
} from '@tickbase/contracts';
import { createSilentLogger, type Logger } from '@tickbase/logger';
import { fetchFailure, fetchSuccess, type DataProvider, type FetchResult } from './provider.js';

const numeric = z.union([z.number(), z.string()]);

const fixtureCandleSchema = z.object({
  timestamp: z.union([z.string(), z.number()]),
  open: numeric,
  high: numeric,
  low: numeric,
  close: numeric,
  volume: z.number(),
  timeframe: z.string().optional(),
});

const fixtureFileSchema = z.array(fixtureCandleSchema);

export interface FixtureProviderOptions {
  /** Directory holding `<SYMBOL>.<timeframe>.json` files. */
  fixturesPath: string;
  /** @default 'fixture' */
  name?: string;
  logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Serves candles from `<fixturesPath>/<SYMBOL>.<timeframe>.json`, each file a
 * JSON array of raw candles. Candles are returned as stored, without
 * validation; only the date range is applied. A missing file is a failed
 * result; any other read error throws {@link ProviderFetchError}.
 *
 * @example
 * ```typescript
 * // fixtures/AAPL.1D.json, fixtures/AAPL.5m.json
 * const provider = new FixtureProvider({ fixturesPath: './fixtures' });
 * const result = await provider.fetchEodData('AAPL', new Date('2024-01-01'), new Date('2024-01-31'));
 * ```
 */
export class FixtureProvider implements DataProvider {
  readonly name: string;
  private readonly fixturesPath: string;
  private readonly logger: Logger;

  constructor(options: FixtureProviderOptions) {
    this.fixturesPath = options.fixturesPath;
    this.name = options.name ?? 'fixture';
    this.logger = options.logger ?? createSilentLogger();
  }

  async fetchEodData(symbol: string, startDate: Date, endDate: Date): Promise<FetchResult> {
    return this.load(symbol, Timeframe.D1, startDate, endDate);
  }

  async fetchIntradayData(symbol: string, timeframe: string, start: Date, end: Date): Promise<FetchResult> {
    return this.load(symbol, timeframe, start, end);
  }

  private async load(symbol: string, timeframe: string, start: Date, end: Date): Promise<FetchResult> {
    const file = join(this.fixturesPath, `${symbol.toUpperCase()}.${timeframe}.json`);

    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return fetchFailure(`No data returned for symbol ${symbol}`, this.name);
      }
      throw new ProviderFetchError(`Failed to read fixture ${file}: ${errorMessage(error)}`, {
        provider: this.name,
        symbol,
      });
    }

    let candles: CandleInput[];
    try {
      const data: unknown = JSON.parse(text);
      candles = fixtureFileSchema.parse(data);
    } catch (error) {
      return fetchFailure(`Invalid fixture ${file}: ${errorMessage(error)}`, this.name);
    }

    // Unparseable timestamps are kept so validation can count them
    const inRange = candles.filter((candle) => {
      const timestamp = toUtcDate(candle.timestamp);
      if (!isValidDate(timestamp)) {
        return true;
      }
      return timestamp.getTime() >= start.getTime() && timestamp.getTime() <= end.getTime();
    });

    if (inRange.length === 0) {
      return fetchFailure(`No data returned for symbol ${symbol}`, this.name);
    }

    this.logger.debug('Fixture provider returning candles', {
      provider: this.name,
      symbol,
      timeframe,
      count: inRange.length,
    });

    return fetchSuccess(inRange, this.name);
  }
}

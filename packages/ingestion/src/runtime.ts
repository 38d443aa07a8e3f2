/**
 * @fileoverview Wires configuration, storage and services together.
 *
 * @module @tickbase/ingestion/runtime
 */

import { ConfigurationError } from '@tickbase/contracts';
import { connect, type DbConnection } from '@tickbase/db-simple';
import { createDefaultRegistry, type IndicatorRegistry } from '@tickbase/indicators';
import { logDuration, type Logger } from '@tickbase/logger';
import {
  IndicatorValueRepository,
  InstrumentRepository,
  PatternRepository,
  PriceRepository,
  migratePriceStore,
} from '@tickbase/price-store';
import { AnalyticsService } from './analytics-service.js';
import { createConfiguredLogger, type Config } from './config.js';
import { FixtureProvider } from './fixture-provider.js';
import { IngestionService } from './ingestion-service.js';
import type { DataProvider } from './provider.js';

export interface Runtime {
  readonly config: Config;
  readonly logger: Logger;
  readonly db: DbConnection;
  readonly registry: IndicatorRegistry;
  readonly instruments: InstrumentRepository;
  readonly prices: PriceRepository;
  readonly indicatorValues: IndicatorValueRepository;
  readonly patterns: PatternRepository;
  readonly ingestion: IngestionService;
  readonly analytics: AnalyticsService;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  logger?: Logger;
  /** Used instead of the providers named in the configuration. */
  providers?: readonly DataProvider[];
}

/**
 * Builds the providers named in `ingestion.providers`.
 *
 * @throws {ConfigurationError} For an unknown provider name
 */
export function resolveProviders(config: Config, logger: Logger): DataProvider[] {
  const unknown = config.ingestion.providers.filter((name) => name !== 'fixture');
  if (unknown.length > 0) {
    throw new ConfigurationError(unknown.map((name) => `ingestion.providers: unknown provider '${name}'`));
  }
  return config.ingestion.providers.map(
    (name) => new FixtureProvider({ fixturesPath: config.fixtures.path, name, logger })
  );
}

/**
 * Connects to the configured database, applies migrations and builds the
 * repositories and services on top of it.
 *
 * @example
 * ```typescript
 * const runtime = await createRuntime(loadConfig());
 * try {
 *   const aapl = await runtime.instruments.create({ symbol: 'AAPL', instrumentType: 'equity' });
 *   await runtime.ingestion.ingestEod(aapl.instrumentId, 'AAPL', start, end);
 *   await runtime.analytics.computeIndicators(aapl.instrumentId, '1D');
 * } finally {
 *   await runtime.close();
 * }
 * ```
 */
export async function createRuntime(config: Config, options: RuntimeOptions = {}): Promise<Runtime> {
  const logger = options.logger ?? createConfiguredLogger(config);
  const providers = options.providers ?? resolveProviders(config, logger);

  const db = await connect(config.database.url, { logger });
  try {
    await logDuration(logger, 'Price store migrated', { db: db.dbType }, () => migratePriceStore(db, { logger }));
  } catch (error) {
    await db.close();
    throw error;
  }

  const registry = createDefaultRegistry();
  const instruments = new InstrumentRepository(db);
  const prices = new PriceRepository(db);
  const indicatorValues = new IndicatorValueRepository(db);
  const patterns = new PatternRepository(db);

  const ingestion = new IngestionService(providers, prices, {
    maxRetries: config.ingestion.maxRetries,
    baseDelay: config.ingestion.baseDelay,
    maxDelay: config.ingestion.maxDelay,
    allowFutureTimestamps: config.ingestion.allowFutureTimestamps,
    logger,
  });
  const analytics = new AnalyticsService(registry, prices, indicatorValues, { logger });

  return {
    config,
    logger,
    db,
    registry,
    instruments,
    prices,
    indicatorValues,
    patterns,
    ingestion,
    analytics,
    close: () => db.close(),
  };
}

/**
 * @fileoverview Main entry point for @tickbase/ingestion.
 *
 * @module @tickbase/ingestion
 */

export { IngestionService } from './ingestion-service.js';
export type { IngestionResult, IngestionServiceOptions, CandleStore } from './ingestion-service.js';

export { AnalyticsService } from './analytics-service.js';
export type {
  AnalyticsServiceOptions,
  CandleHistory,
  IndicatorOutcome,
  IndicatorValueStore,
} from './analytics-service.js';

export { fetchSuccess, fetchFailure } from './provider.js';
export type { DataProvider, FetchResult } from './provider.js';

export { computeBackoffDelay, isRateLimited, sleepSeconds } from './backoff.js';
export type { Sleeper } from './backoff.js';

export { FixtureProvider } from './fixture-provider.js';
export type { FixtureProviderOptions } from './fixture-provider.js';

export { configSchema, envMapping, loadConfig, createConfiguredLogger } from './config.js';
export type { Config } from './config.js';

export { createRuntime, resolveProviders } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';

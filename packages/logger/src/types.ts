/**
 * @fileoverview Type definitions for @tickbase/logger.
 */

import type { Logger as WinstonLogger } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Where and how a logger writes. Sinks are additive: console, file and
 * stream may all be active at once.
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * JSON lines when true, colorized single lines otherwise.
   * @default true when NODE_ENV is "production"
   */
  json?: boolean;

  filePath?: string;

  /** @default true */
  console?: boolean;

  /** Receives the same formatted lines as the other sinks. */
  stream?: NodeJS.WritableStream;
}

/**
 * Fields a child logger stamps on every entry. Keys are snake_case to match
 * the fields ingestion and analytics log (`instrument_id`, `duration_ms`).
 */
export interface ChildLoggerContext {
  component?: string;
  symbol?: string;
  timeframe?: string;
  provider?: string;
  instrument_id?: number;
  [key: string]: unknown;
}

/** winston's logger, re-exported so callers depend on this package only. */
export type Logger = WinstonLogger;

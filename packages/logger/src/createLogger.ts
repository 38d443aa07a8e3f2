/**
 * @fileoverview Logger factory for tickbase.
 * Creates winston loggers with structured fields, sensitive-field redaction and
 * console, file or stream transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

type LogFormat = ReturnType<typeof format.combine>;

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Ingestion complete', { symbol: 'AAPL', candles_stored: 20 });
 * ```
 *
 * @example
 * ```typescript
 * // Capture output in memory
 * const lines: string[] = [];
 * const stream = new Writable({
 *   write(chunk, _encoding, callback) { lines.push(String(chunk)); callback(); }
 * });
 * const logger = createLogger({ level: 'debug', json: true, console: false, stream });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const json = config.json ?? process.env['NODE_ENV'] === 'production';
  // redaction must run before anything else sees the entry
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  return winston.createLogger({
    level: config.level,
    format: logFormat,
    transports: buildTransports(config, logFormat),
    exitOnError: false,
  });
}

function buildTransports(config: LoggerConfig, logFormat: LogFormat): winston.transport[] {
  const { level, filePath, stream } = config;
  const transports: winston.transport[] = [];

  if (config.console ?? true) {
    transports.push(new winston.transports.Console({ level, format: logFormat }));
  }
  if (filePath) {
    transports.push(new winston.transports.File({ filename: filePath, level, format: logFormat }));
  }
  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level, format: logFormat }));
  }

  return transports;
}

/**
 * Logger that discards everything. Library classes default to it when no
 * logger is injected.
 */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    level: 'error',
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}

/**
 * Creates a child logger that repeats `context` on every entry.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'ingestion', provider: 'fixture' });
 * providerLogger.warn('Rate limited, backing off', { attempt: 0, delay_ms: 1000 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}

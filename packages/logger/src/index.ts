/**
 * @fileoverview Public API exports for @tickbase/logger.
 */

// Core logger creation
export { createLogger, createSilentLogger, createChildLogger } from './createLogger.js';

// Formats
export { redactPII, standardFields, prettyPrint, isSensitiveFieldName } from './formats.js';

// Run context management
export { getRunContext, getRunId, withRunContext, annotateRun } from './run-context.js';

// Performance timing utilities
export { startTimer, logDuration } from './perf-timer.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RunContext } from './run-context.js';
export type { PerfTimer, Clock } from './perf-timer.js';

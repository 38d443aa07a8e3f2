/**
 * @fileoverview Custom winston formats: sensitive-field redaction, standard
 * fields with run id injection, and pretty-print output.
 */

import { format } from 'winston';
import { getRunContext } from './run-context.js';

/**
 * Field names whose values never reach a transport. Matched case-insensitively
 * against every key at any depth of plain-object metadata.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
  /credential/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Returns a copy of a value with sensitive keys replaced. Class instances
 * (Dates, Decimals, Errors) pass through untouched so their own JSON
 * serialization still applies.
 */
function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactValue(item));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return copy;
}

/**
 * Winston format that redacts sensitive fields from log metadata. Applied
 * first in the chain so later formats only ever see redacted values.
 *
 * @example
 * ```typescript
 * logger.info('Connecting', { host: 'db', password: 'test-secret' });
 * // {"host":"db","level":"info","message":"Connecting","password":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(redacted[key]);
  }

  return redacted;
});

/**
 * Adds an ISO timestamp, unpacks Error stacks and copies the active run
 * context (`run_id` and any run fields) onto the entry. Fields the entry
 * already sets win.
 */
export const standardFields = format.combine(
  format.timestamp(),
  format.errors({ stack: true }),
  format((info) => {
    const context = getRunContext();
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        if (info[key] === undefined) {
          info[key] = value;
        }
      }
    }
    return info;
  })()
);

/**
 * Human-readable output for development.
 *
 * @example
 * ```typescript
 * // [2024-01-15T12:34:56.789Z] info: Ingestion complete symbol=AAPL run_id=3f2a... candles_stored=20
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, timeframe, run_id, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (timeframe) context.push(`timeframe=${String(timeframe)}`);
    if (run_id) context.push(`run_id=${String(run_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return stack ? `${baseMsg}\n${String(stack)}` : baseMsg;
  })
);

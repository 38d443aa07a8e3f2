/**
 * @fileoverview UTC timestamp coercion.
 *
 * @module @tickbase/contracts/time
 */

const ZONE_DESIGNATOR = /(Z|[+-]\d{2}:?\d{2})$/i;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;

/** Raw timestamp shapes accepted from providers and callers. */
export type TimestampLike = Date | string | number;

/**
 * Converts a timestamp to a Date, reading naive date-time strings as UTC.
 *
 * `2024-01-15T10:00:00` and `2024-01-15 10:00:00` both become
 * `2024-01-15T10:00:00.000Z`; strings with an offset or `Z` keep it.
 * Numbers are epoch milliseconds. The result may be an invalid Date; use
 * {@link isValidDate} before trusting it.
 *
 * @example
 * ```typescript
 * toUtcDate('2024-01-15T10:00:00').toISOString() // '2024-01-15T10:00:00.000Z'
 * ```
 */
export function toUtcDate(value: TimestampLike): Date {
  if (value instanceof Date) {
    return new Date(value.getTime());
  }

  if (typeof value === 'number') {
    return new Date(value);
  }

  const trimmed = value.trim();
  if (DATE_TIME.test(trimmed) && !ZONE_DESIGNATOR.test(trimmed)) {
    return new Date(`${trimmed.replace(' ', 'T')}Z`);
  }

  return new Date(trimmed);
}

export function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}

/**
 * Column readers for result rows.
 *
 * The two drivers hand back different JS types for the same column:
 * better-sqlite3 returns INTEGER as number, pg returns BIGINT and NUMERIC as
 * strings and JSONB already parsed.
 */

import type { IndicatorMetadata } from '@tickbase/contracts'
import type { Row } from '@tickbase/db-simple'

function columnError(column: string, value: unknown, expected: string): Error {
  return new Error(`Column ${column} must be ${expected}, got ${typeof value}`)
}

export function readNumber(row: Row, column: string): number {
  const value = row[column]
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    if (Number.isFinite(parsed)) return parsed
  }
  throw columnError(column, value, 'numeric')
}

export function readString(row: Row, column: string): string {
  const value = row[column]
  if (typeof value === 'string') return value
  throw columnError(column, value, 'a string')
}

/**
 * Reads a NUMERIC/TEXT decimal column as its exact string form.
 */
export function readDecimalText(row: Row, column: string): string {
  const value = row[column]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  throw columnError(column, value, 'a decimal')
}

export function readDate(row: Row, column: string): Date {
  return new Date(readNumber(row, column))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Reads a JSON/JSONB object column; null stays undefined.
 */
export function readJsonObject(row: Row, column: string): Record<string, unknown> | undefined {
  const raw = row[column]
  if (raw === null || raw === undefined) return undefined

  const value: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw
  if (!isPlainObject(value)) {
    throw columnError(column, value, 'a JSON object')
  }
  return value
}

/**
 * Reads an indicator metadata column, where every entry is a float.
 */
export function readMetadata(row: Row, column: string): IndicatorMetadata | undefined {
  const value = readJsonObject(row, column)
  if (value === undefined) return undefined

  const metadata: Record<string, number> = {}
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'number') {
      throw new Error(`Metadata entry ${key} must be a number, got ${typeof entry}`)
    }
    metadata[key] = entry
  }
  return metadata
}

/**
 * Splits a batch into slices of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ')
}

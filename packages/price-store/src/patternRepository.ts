/**
 * Detected chart patterns.
 */

import { Decimal, StorageError, errorMessage, formatDecimal, toDecimal } from '@tickbase/contracts'
import type { DbConnection, Row } from '@tickbase/db-simple'
import { readDate, readDecimalText, readJsonObject, readNumber, readString } from './rows.js'
import { withStorageError } from './storageError.js'
import type { NewPattern, Pattern } from './types.js'

const COLUMNS =
  'pattern_id, instrument_id, timeframe, pattern_type, start_timestamp, end_timestamp, confidence, metadata, created_at'

const MAX_CONFIDENCE = 100

function toPattern(row: Row): Pattern {
  const pattern: Pattern = {
    patternId: readNumber(row, 'pattern_id'),
    instrumentId: readNumber(row, 'instrument_id'),
    timeframe: readString(row, 'timeframe'),
    patternType: readString(row, 'pattern_type'),
    start: readDate(row, 'start_timestamp'),
    confidence: toDecimal(readDecimalText(row, 'confidence')),
    createdAt: readDate(row, 'created_at'),
  }
  if (row['end_timestamp'] !== null && row['end_timestamp'] !== undefined) {
    pattern.end = readDate(row, 'end_timestamp')
  }
  const metadata = readJsonObject(row, 'metadata')
  if (metadata !== undefined) {
    pattern.metadata = metadata
  }
  return pattern
}

/**
 * Confidence rounded to the column's two decimal places.
 *
 * @throws StorageError if it is not a number in [0, 100]
 */
function parseConfidence(input: NewPattern): Decimal {
  let confidence: Decimal
  try {
    confidence = toDecimal(input.confidence).toDecimalPlaces(2, Decimal.ROUND_HALF_UP)
  } catch (error) {
    throw new StorageError(`Invalid pattern confidence: ${errorMessage(error)}`, {
      operation: 'createPattern',
      confidence: String(input.confidence),
    })
  }
  if (confidence.isNaN() || confidence.lessThan(0) || confidence.greaterThan(MAX_CONFIDENCE)) {
    throw new StorageError(`Pattern confidence must be between 0 and ${MAX_CONFIDENCE}, got ${confidence.toString()}`, {
      operation: 'createPattern',
      confidence: confidence.toString(),
    })
  }
  return confidence
}

/**
 * Patterns keyed by an autoincrement id. Deleting the instrument removes its
 * patterns.
 */
export class PatternRepository {
  constructor(private readonly db: DbConnection) {}

  /**
   * @throws StorageError if confidence is outside [0, 100], if end precedes
   * start, or if the instrument does not exist
   */
  async create(input: NewPattern): Promise<Pattern> {
    const confidence = parseConfidence(input)
    if (input.end !== undefined && input.end.getTime() < input.start.getTime()) {
      throw new StorageError('Pattern end must not precede its start', {
        operation: 'createPattern',
        start: input.start.toISOString(),
        end: input.end.toISOString(),
      })
    }

    return withStorageError(
      'createPattern',
      async () => {
        const rows = await this.db.query(
          `INSERT INTO patterns
             (instrument_id, timeframe, pattern_type, start_timestamp, end_timestamp, confidence, metadata, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)
           RETURNING ${COLUMNS}`,
          [
            input.instrumentId,
            input.timeframe,
            input.patternType,
            input.start.getTime(),
            input.end === undefined ? null : input.end.getTime(),
            formatDecimal(confidence),
            input.metadata === undefined ? null : JSON.stringify(input.metadata),
            Date.now(),
          ]
        )
        const row = rows[0]
        if (!row) {
          throw new Error('Insert returned no row')
        }
        return toPattern(row)
      },
      { instrumentId: input.instrumentId, timeframe: input.timeframe, patternType: input.patternType }
    )
  }

  /**
   * Patterns of an instrument in ascending start order, optionally for one
   * timeframe.
   */
  async findByInstrument(instrumentId: number, timeframe?: string): Promise<Pattern[]> {
    return withStorageError(
      'findPatterns',
      async () => {
        const conditions = ['instrument_id = ?']
        const params: unknown[] = [instrumentId]
        if (timeframe !== undefined) {
          conditions.push('timeframe = ?')
          params.push(timeframe)
        }
        const rows = await this.db.query(
          `SELECT ${COLUMNS} FROM patterns
           WHERE ${conditions.join(' AND ')}
           ORDER BY start_timestamp ASC, pattern_id ASC`,
          params
        )
        return rows.map(toPattern)
      },
      { instrumentId, timeframe }
    )
  }

  /**
   * Patterns with no end yet.
   */
  async findOngoing(instrumentId: number): Promise<Pattern[]> {
    return withStorageError(
      'findOngoingPatterns',
      async () => {
        const rows = await this.db.query(
          `SELECT ${COLUMNS} FROM patterns
           WHERE instrument_id = ? AND end_timestamp IS NULL
           ORDER BY start_timestamp ASC, pattern_id ASC`,
          [instrumentId]
        )
        return rows.map(toPattern)
      },
      { instrumentId }
    )
  }
}

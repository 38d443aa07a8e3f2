/**
 * Persistence for computed indicator values.
 */

import { createIndicatorValue, formatDecimal, toDecimal, type IndicatorValue } from '@tickbase/contracts'
import type { DbConnection, Row } from '@tickbase/db-simple'
import { chunk, placeholders, readDate, readDecimalText, readMetadata, readNumber, readString } from './rows.js'
import { withStorageError } from './storageError.js'
import type { IndicatorValueQuery, UpsertCounts } from './types.js'
import { UPSERT_CHUNK_SIZE } from './priceRepository.js'

function keyOf(timestamp: number, indicatorName: string): string {
  return `${timestamp}|${indicatorName}`
}

function toIndicatorValue(row: Row): IndicatorValue {
  return createIndicatorValue(
    readDate(row, 'timestamp'),
    readString(row, 'indicator_name'),
    toDecimal(readDecimalText(row, 'value')),
    readMetadata(row, 'metadata')
  )
}

/**
 * Indicator values keyed by (instrument_id, timestamp, timeframe,
 * indicator_name). Recomputing an indicator overwrites its earlier output.
 */
export class IndicatorValueRepository {
  constructor(private readonly db: DbConnection) {}

  /**
   * @throws StorageError
   */
  async upsertValues(
    instrumentId: number,
    timeframe: string,
    values: readonly IndicatorValue[]
  ): Promise<UpsertCounts> {
    const byKey = new Map<string, IndicatorValue>()
    for (const value of values) {
      byKey.set(keyOf(value.timestamp.getTime(), value.indicatorName), value)
    }

    if (byKey.size === 0) {
      return { inserted: 0, updated: 0 }
    }

    const batch = [...byKey.values()]

    return withStorageError(
      'upsertIndicatorValues',
      () =>
        this.db.transaction(async (tx) => {
          const counts: UpsertCounts = { inserted: 0, updated: 0 }

          for (const slice of chunk(batch, UPSERT_CHUNK_SIZE)) {
            const timestamps = [...new Set(slice.map((value) => value.timestamp.getTime()))]

            const existingRows = await tx.query(
              `SELECT timestamp, indicator_name FROM indicators
               WHERE instrument_id = ? AND timeframe = ? AND timestamp IN (${placeholders(timestamps.length)})`,
              [instrumentId, timeframe, ...timestamps]
            )
            const existing = new Set(
              existingRows.map((row) => keyOf(readNumber(row, 'timestamp'), readString(row, 'indicator_name')))
            )

            const rows = slice.map(() => '(?, ?, ?, ?, ?, ?)').join(', ')
            const params = slice.flatMap((value) => [
              instrumentId,
              value.timestamp.getTime(),
              timeframe,
              value.indicatorName,
              formatDecimal(value.value),
              value.metadata === undefined ? null : JSON.stringify(value.metadata),
            ])

            await tx.exec(
              `INSERT INTO indicators (instrument_id, timestamp, timeframe, indicator_name, value, metadata)
               VALUES ${rows}
               ON CONFLICT (instrument_id, timestamp, timeframe, indicator_name)
               DO UPDATE SET
                 value = excluded.value,
                 metadata = excluded.metadata`,
              params
            )

            const updated = slice.filter((value) =>
              existing.has(keyOf(value.timestamp.getTime(), value.indicatorName))
            ).length
            counts.updated += updated
            counts.inserted += slice.length - updated
          }

          return counts
        }),
      { instrumentId, timeframe, values: batch.length }
    )
  }

  /**
   * Values of one indicator series in ascending timestamp order.
   */
  async getValues(query: IndicatorValueQuery): Promise<IndicatorValue[]> {
    return withStorageError(
      'getIndicatorValues',
      async () => {
        const conditions = ['instrument_id = ?', 'timeframe = ?', 'indicator_name = ?']
        const params: unknown[] = [query.instrumentId, query.timeframe, query.indicatorName]

        if (query.start) {
          conditions.push('timestamp >= ?')
          params.push(query.start.getTime())
        }
        if (query.end) {
          conditions.push('timestamp <= ?')
          params.push(query.end.getTime())
        }

        const rows = await this.db.query(
          `SELECT timestamp, indicator_name, value, metadata
           FROM indicators
           WHERE ${conditions.join(' AND ')}
           ORDER BY timestamp ASC`,
          params
        )
        return rows.map(toIndicatorValue)
      },
      { instrumentId: query.instrumentId, timeframe: query.timeframe, indicatorName: query.indicatorName }
    )
  }
}

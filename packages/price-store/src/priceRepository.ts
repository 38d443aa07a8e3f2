/**
 * Persistence for OHLCV candles.
 *
 * Candles are keyed by (instrument_id, timestamp, timeframe). Writing the
 * same batch twice leaves the table unchanged, so ingestion runs can be
 * replayed safely.
 */

import { Candle, formatDecimal } from '@tickbase/contracts'
import type { DbConnection, Row } from '@tickbase/db-simple'
import { chunk, placeholders, readDate, readDecimalText, readNumber, readString } from './rows.js'
import { withStorageError } from './storageError.js'
import type { CandleQuery, UpsertCounts } from './types.js'

/** Rows per INSERT statement. */
export const UPSERT_CHUNK_SIZE = 500

function toCandle(row: Row): Candle {
  return new Candle({
    timestamp: readDate(row, 'timestamp'),
    open: readDecimalText(row, 'open'),
    high: readDecimalText(row, 'high'),
    low: readDecimalText(row, 'low'),
    close: readDecimalText(row, 'close'),
    volume: readNumber(row, 'volume'),
    timeframe: readString(row, 'timeframe'),
  })
}

/**
 * Example:
 * ```typescript
 * const prices = new PriceRepository(db)
 * const { inserted, updated } = await prices.upsertCandles(1, '1D', candles)
 * const history = await prices.getCandles({ instrumentId: 1, timeframe: '1D' })
 * ```
 */
export class PriceRepository {
  constructor(private readonly db: DbConnection) {}

  /**
   * Inserts new candles and overwrites existing ones in a single transaction.
   *
   * Duplicate timestamps within the batch collapse to the last occurrence.
   * Any failure rolls back the whole batch.
   *
   * @throws StorageError
   */
  async upsertCandles(instrumentId: number, timeframe: string, candles: readonly Candle[]): Promise<UpsertCounts> {
    const byTimestamp = new Map<number, Candle>()
    for (const candle of candles) {
      byTimestamp.set(candle.timestamp.getTime(), candle)
    }

    if (byTimestamp.size === 0) {
      return { inserted: 0, updated: 0 }
    }

    const batch = [...byTimestamp.entries()]

    return withStorageError(
      'upsertCandles',
      () =>
        this.db.transaction(async (tx) => {
          const counts: UpsertCounts = { inserted: 0, updated: 0 }

          for (const slice of chunk(batch, UPSERT_CHUNK_SIZE)) {
            const timestamps = slice.map(([timestamp]) => timestamp)

            const existingRows = await tx.query(
              `SELECT timestamp FROM prices
               WHERE instrument_id = ? AND timeframe = ? AND timestamp IN (${placeholders(timestamps.length)})`,
              [instrumentId, timeframe, ...timestamps]
            )
            const existing = new Set(existingRows.map((row) => readNumber(row, 'timestamp')))

            const values = slice.map(() => '(?, ?, ?, ?, ?, ?, ?, ?)').join(', ')
            const params = slice.flatMap(([timestamp, candle]) => [
              instrumentId,
              timestamp,
              timeframe,
              formatDecimal(candle.open),
              formatDecimal(candle.high),
              formatDecimal(candle.low),
              formatDecimal(candle.close),
              candle.volume,
            ])

            await tx.exec(
              `INSERT INTO prices (instrument_id, timestamp, timeframe, open, high, low, close, volume)
               VALUES ${values}
               ON CONFLICT (instrument_id, timestamp, timeframe)
               DO UPDATE SET
                 open = excluded.open,
                 high = excluded.high,
                 low = excluded.low,
                 close = excluded.close,
                 volume = excluded.volume`,
              params
            )

            const updated = timestamps.filter((timestamp) => existing.has(timestamp)).length
            counts.updated += updated
            counts.inserted += slice.length - updated
          }

          return counts
        }),
      { instrumentId, timeframe, candles: batch.length }
    )
  }

  /**
   * Candles of one series in ascending timestamp order.
   */
  async getCandles(query: CandleQuery): Promise<Candle[]> {
    return withStorageError(
      'getCandles',
      async () => {
        const conditions = ['instrument_id = ?', 'timeframe = ?']
        const params: unknown[] = [query.instrumentId, query.timeframe]

        if (query.start) {
          conditions.push('timestamp >= ?')
          params.push(query.start.getTime())
        }
        if (query.end) {
          conditions.push('timestamp <= ?')
          params.push(query.end.getTime())
        }

        let sql = `SELECT timestamp, timeframe, open, high, low, close, volume
                   FROM prices
                   WHERE ${conditions.join(' AND ')}`

        if (query.limit === undefined) {
          sql += ' ORDER BY timestamp ASC'
          const rows = await this.db.query(sql, params)
          return rows.map(toCandle)
        }

        // Newest first so LIMIT keeps the tail, then restore ascending order
        sql += ' ORDER BY timestamp DESC LIMIT ?'
        params.push(query.limit)
        const rows = await this.db.query(sql, params)
        return rows.map(toCandle).reverse()
      },
      { instrumentId: query.instrumentId, timeframe: query.timeframe }
    )
  }

  async getLatest(instrumentId: number, timeframe: string): Promise<Candle | null> {
    const [latest] = await this.getCandles({ instrumentId, timeframe, limit: 1 })
    return latest ?? null
  }
}

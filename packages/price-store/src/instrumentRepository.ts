/**
 * Instrument catalog.
 */

import type { DbConnection, Row } from '@tickbase/db-simple'
import { readDate, readJsonObject, readNumber, readString } from './rows.js'
import { withStorageError } from './storageError.js'
import { INSTRUMENT_TYPES, type Instrument, type InstrumentType, type NewInstrument } from './types.js'

const COLUMNS = 'instrument_id, symbol, instrument_type, metadata, created_at, updated_at'

function readInstrumentType(row: Row): InstrumentType {
  const value = readString(row, 'instrument_type')
  const instrumentType = INSTRUMENT_TYPES.find((type) => type === value)
  if (!instrumentType) {
    throw new Error(`Unknown instrument type: ${value}`)
  }
  return instrumentType
}

function toInstrument(row: Row): Instrument {
  const instrument: Instrument = {
    instrumentId: readNumber(row, 'instrument_id'),
    symbol: readString(row, 'symbol'),
    instrumentType: readInstrumentType(row),
    createdAt: readDate(row, 'created_at'),
    updatedAt: readDate(row, 'updated_at'),
  }
  const metadata = readJsonObject(row, 'metadata')
  if (metadata !== undefined) {
    instrument.metadata = metadata
  }
  return instrument
}

/**
 * Stores instruments. Deleting one removes its prices, indicator values
 * and patterns through ON DELETE CASCADE.
 *
 * Example:
 * ```typescript
 * const instruments = new InstrumentRepository(db)
 * const aapl = await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })
 * await instruments.findBySymbol('AAPL') // same instrument
 * ```
 */
export class InstrumentRepository {
  constructor(private readonly db: DbConnection) {}

  /**
   * @throws StorageError if (symbol, instrumentType) already exists
   */
  async create(input: NewInstrument): Promise<Instrument> {
    return withStorageError(
      'createInstrument',
      async () => {
        const now = Date.now()
        const rows = await this.db.query(
          `INSERT INTO instruments (symbol, instrument_type, metadata, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)
           RETURNING ${COLUMNS}`,
          [
            input.symbol,
            input.instrumentType,
            input.metadata === undefined ? null : JSON.stringify(input.metadata),
            now,
            now,
          ]
        )
        const row = rows[0]
        if (!row) {
          throw new Error('Insert returned no row')
        }
        return toInstrument(row)
      },
      { symbol: input.symbol, instrumentType: input.instrumentType }
    )
  }

  async findById(instrumentId: number): Promise<Instrument | null> {
    return withStorageError(
      'findInstrument',
      async () => {
        const rows = await this.db.query(`SELECT ${COLUMNS} FROM instruments WHERE instrument_id = ?`, [instrumentId])
        const row = rows[0]
        return row ? toInstrument(row) : null
      },
      { instrumentId }
    )
  }

  async findBySymbol(symbol: string, instrumentType: InstrumentType = 'equity'): Promise<Instrument | null> {
    return withStorageError(
      'findInstrument',
      async () => {
        const rows = await this.db.query(
          `SELECT ${COLUMNS} FROM instruments WHERE symbol = ? AND instrument_type = ?`,
          [symbol, instrumentType]
        )
        const row = rows[0]
        return row ? toInstrument(row) : null
      },
      { symbol, instrumentType }
    )
  }

  async list(): Promise<Instrument[]> {
    return withStorageError('listInstruments', async () => {
      const rows = await this.db.query(`SELECT ${COLUMNS} FROM instruments ORDER BY instrument_id`)
      return rows.map(toInstrument)
    })
  }

  /**
   * @returns true if the instrument existed
   */
  async delete(instrumentId: number): Promise<boolean> {
    return withStorageError(
      'deleteInstrument',
      async () => {
        const rows = await this.db.query('DELETE FROM instruments WHERE instrument_id = ? RETURNING instrument_id', [
          instrumentId,
        ])
        return rows.length > 0
      },
      { instrumentId }
    )
  }
}

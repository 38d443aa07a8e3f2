/**
 * Types for the price store.
 */

import type { Decimal, DecimalLike } from '@tickbase/contracts'

export type InstrumentType = 'equity' | 'option' | 'future'

export const INSTRUMENT_TYPES: readonly InstrumentType[] = ['equity', 'option', 'future']

/**
 * A tradable instrument. Unique on (symbol, instrumentType).
 */
export interface Instrument {
  instrumentId: number
  symbol: string
  instrumentType: InstrumentType
  metadata?: Record<string, unknown>
  createdAt: Date
  updatedAt: Date
}

export interface NewInstrument {
  symbol: string
  instrumentType: InstrumentType
  metadata?: Record<string, unknown>
}

/**
 * Candle range query. Both bounds are inclusive and optional.
 */
export interface CandleQuery {
  instrumentId: number
  timeframe: string
  start?: Date
  end?: Date
  /** Keeps the most recent `limit` candles of the range. */
  limit?: number
}

export interface IndicatorValueQuery {
  instrumentId: number
  timeframe: string
  indicatorName: string
  start?: Date
  end?: Date
}

/**
 * Outcome of an upsert batch. inserted + updated equals the number of
 * distinct keys written.
 */
export interface UpsertCounts {
  inserted: number
  updated: number
}


/**
 * A chart pattern detected on an instrument. An ongoing pattern has no end.
 */
export interface Pattern {
  patternId: number
  instrumentId: number
  timeframe: string
  patternType: string
  start: Date
  end?: Date
  /** 0 to 100, two decimal places. */
  confidence: Decimal
  metadata?: Record<string, unknown>
  createdAt: Date
}

export interface NewPattern {
  instrumentId: number
  timeframe: string
  patternType: string
  start: Date
  end?: Date
  confidence: DecimalLike
  metadata?: Record<string, unknown>
}

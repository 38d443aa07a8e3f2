/**
 * @tickbase/price-store
 *
 * Schema and repositories for instruments, candles, indicator values and
 * detected patterns
 */

export { InstrumentRepository } from './instrumentRepository.js'
export { PriceRepository, UPSERT_CHUNK_SIZE } from './priceRepository.js'
export { IndicatorValueRepository } from './indicatorValueRepository.js'
export { PatternRepository } from './patternRepository.js'
export { migratePriceStore, migrationsDir } from './migrations.js'
export { withStorageError } from './storageError.js'
export {
  INSTRUMENT_TYPES,
  type Instrument,
  type InstrumentType,
  type NewInstrument,
  type CandleQuery,
  type IndicatorValueQuery,
  type UpsertCounts,
  type Pattern,
  type NewPattern,
} from './types.js'

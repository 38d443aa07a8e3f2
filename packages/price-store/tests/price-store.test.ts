/**
 * Price store tests against an in-memory SQLite database
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Candle, StorageError, createIndicatorValue, toDecimal } from '@tickbase/contracts'
import { connect, type DbConnection } from '@tickbase/db-simple'
import {
  IndicatorValueRepository,
  InstrumentRepository,
  PatternRepository,
  PriceRepository,
  migratePriceStore,
  type Instrument,
  type NewPattern,
} from '../src/index.js'

function dayAt(day: number): Date {
  return new Date(Date.UTC(2024, 0, 1 + day))
}

function candleAt(day: number, close: string, timeframe = '1D'): Candle {
  const price = toDecimal(close)
  return new Candle({
    timestamp: dayAt(day),
    open: close,
    high: price.plus(1),
    low: price.minus(1),
    close,
    volume: 1000 + day,
    timeframe,
  })
}

function closesOf(candles: readonly Candle[]): string[] {
  return candles.map((candle) => candle.close.toString())
}

let db: DbConnection
let instruments: InstrumentRepository
let prices: PriceRepository
let indicators: IndicatorValueRepository
let patterns: PatternRepository

beforeEach(async () => {
  db = await connect('sqlite::memory:')
  await migratePriceStore(db)
  instruments = new InstrumentRepository(db)
  prices = new PriceRepository(db)
  indicators = new IndicatorValueRepository(db)
  patterns = new PatternRepository(db)
})

afterEach(async () => {
  await db.close()
})

describe('migratePriceStore', () => {
  it('should not reapply migrations', async () => {
    expect(await migratePriceStore(db)).toEqual([])
  })
})

describe('InstrumentRepository', () => {
  it('should create and look up instruments', async () => {
    const created = await instruments.create({
      symbol: 'AAPL',
      instrumentType: 'equity',
      metadata: { exchange: 'NASDAQ' },
    })

    expect(created.instrumentId).toBe(1)
    expect(created.metadata).toEqual({ exchange: 'NASDAQ' })
    expect(created.createdAt).toBeInstanceOf(Date)

    expect(await instruments.findById(created.instrumentId)).toEqual(created)
    expect(await instruments.findBySymbol('AAPL')).toEqual(created)
    expect(await instruments.findBySymbol('AAPL', 'option')).toBeNull()
    expect(await instruments.findById(42)).toBeNull()
  })

  it('should omit metadata when none was given', async () => {
    const created = await instruments.create({ symbol: 'ES', instrumentType: 'future' })

    expect('metadata' in created).toBe(false)
  })

  it('should allow one symbol under several instrument types', async () => {
    await instruments.create({ symbol: 'SPY', instrumentType: 'equity' })
    await instruments.create({ symbol: 'SPY', instrumentType: 'option' })

    const all = await instruments.list()
    expect(all.map((i) => `${i.symbol}:${i.instrumentType}`)).toEqual(['SPY:equity', 'SPY:option'])
  })

  it('should reject a duplicate symbol and type', async () => {
    await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })

    await expect(instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })).rejects.toBeInstanceOf(
      StorageError
    )
  })

  it('should report whether a delete removed anything', async () => {
    const created = await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })

    expect(await instruments.delete(created.instrumentId)).toBe(true)
    expect(await instruments.delete(created.instrumentId)).toBe(false)
  })
})

describe('PriceRepository', () => {
  let instrument: Instrument

  beforeEach(async () => {
    instrument = await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })
  })

  it('should insert new candles and count them', async () => {
    const counts = await prices.upsertCandles(instrument.instrumentId, '1D', [
      candleAt(0, '100'),
      candleAt(1, '101'),
      candleAt(2, '102'),
    ])

    expect(counts).toEqual({ inserted: 3, updated: 0 })
  })

  it('should be idempotent when the same batch is written twice', async () => {
    const batch = [candleAt(0, '100'), candleAt(1, '101'), candleAt(2, '102')]

    await prices.upsertCandles(instrument.instrumentId, '1D', batch)
    const second = await prices.upsertCandles(instrument.instrumentId, '1D', batch)

    expect(second).toEqual({ inserted: 0, updated: 3 })
    const stored = await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D' })
    expect(stored).toHaveLength(3)
    expect(stored.map((c) => c.toJSON())).toEqual(batch.map((c) => c.toJSON()))
  })

  it('should overwrite a corrected candle', async () => {
    await prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '100'), candleAt(1, '101')])

    const counts = await prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(1, '105'), candleAt(2, '106')])

    expect(counts).toEqual({ inserted: 1, updated: 1 })
    const stored = await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D' })
    expect(closesOf(stored)).toEqual(['100', '105', '106'])
  })

  it('should keep the last occurrence of a duplicated timestamp', async () => {
    const counts = await prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '100'), candleAt(0, '110')])

    expect(counts).toEqual({ inserted: 1, updated: 0 })
    const latest = await prices.getLatest(instrument.instrumentId, '1D')
    expect(latest?.close.toString()).toBe('110')
  })

  it('should store prices without losing precision', async () => {
    await prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '150.123456789012')])

    const [stored] = await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D' })
    expect(stored?.close.toString()).toBe('150.123456789012')
    expect(stored?.high.toString()).toBe('151.123456789012')
    expect(stored?.volume).toBe(1000)
  })

  it('should keep timeframes apart', async () => {
    await prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '100')])
    const counts = await prices.upsertCandles(instrument.instrumentId, '1h', [candleAt(0, '100', '1h')])

    expect(counts).toEqual({ inserted: 1, updated: 0 })
    const hourly = await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1h' })
    expect(hourly.map((c) => c.timeframe)).toEqual(['1h'])
  })

  it('should filter by an inclusive range and return ascending order', async () => {
    await prices.upsertCandles(instrument.instrumentId, '1D', [
      candleAt(3, '103'),
      candleAt(0, '100'),
      candleAt(2, '102'),
      candleAt(1, '101'),
    ])

    const range = await prices.getCandles({
      instrumentId: instrument.instrumentId,
      timeframe: '1D',
      start: dayAt(1),
      end: dayAt(2),
    })
    expect(closesOf(range)).toEqual(['101', '102'])

    const tail = await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D', limit: 2 })
    expect(closesOf(tail)).toEqual(['102', '103'])

    expect((await prices.getLatest(instrument.instrumentId, '1D'))?.timestamp).toEqual(dayAt(3))
  })

  it('should return null for the latest candle of an empty series', async () => {
    expect(await prices.getLatest(instrument.instrumentId, '1D')).toBeNull()
  })

  it('should write batches larger than one chunk', async () => {
    const batch = Array.from({ length: 1200 }, (_, i) => candleAt(i, String(100 + (i % 7))))

    expect(await prices.upsertCandles(instrument.instrumentId, '1D', batch)).toEqual({ inserted: 1200, updated: 0 })
    expect(await prices.upsertCandles(instrument.instrumentId, '1D', batch)).toEqual({ inserted: 0, updated: 1200 })
  })

  it('should do nothing for an empty batch', async () => {
    expect(await prices.upsertCandles(instrument.instrumentId, '1D', [])).toEqual({ inserted: 0, updated: 0 })
  })

  it('should complete concurrent writes for different instruments', async () => {
    const msft = await instruments.create({ symbol: 'MSFT', instrumentType: 'equity' })

    const counts = await Promise.all([
      prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '100'), candleAt(1, '101'), candleAt(2, '102')]),
      prices.upsertCandles(msft.instrumentId, '1D', [candleAt(0, '300'), candleAt(1, '301'), candleAt(2, '302')]),
    ])

    expect(counts).toEqual([
      { inserted: 3, updated: 0 },
      { inserted: 3, updated: 0 },
    ])
    expect(closesOf(await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D' }))).toEqual([
      '100',
      '101',
      '102',
    ])
    expect(closesOf(await prices.getCandles({ instrumentId: msft.instrumentId, timeframe: '1D' }))).toEqual([
      '300',
      '301',
      '302',
    ])
  })

  it('should let the later of two concurrent writes to the same keys win', async () => {
    const counts = await Promise.all([
      prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '100'), candleAt(1, '101')]),
      prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '200'), candleAt(1, '201')]),
    ])

    expect(counts).toEqual([
      { inserted: 2, updated: 0 },
      { inserted: 0, updated: 2 },
    ])
    expect(closesOf(await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D' }))).toEqual([
      '200',
      '201',
    ])
  })

  it('should roll back and raise StorageError when the write fails', async () => {
    const write = prices.upsertCandles(999, '1D', [candleAt(0, '100')])

    await expect(write).rejects.toBeInstanceOf(StorageError)
    await expect(write).rejects.toThrow('upsertCandles failed: FOREIGN KEY constraint failed')
    expect(await prices.getCandles({ instrumentId: 999, timeframe: '1D' })).toEqual([])
  })
})

describe('IndicatorValueRepository', () => {
  let instrument: Instrument

  beforeEach(async () => {
    instrument = await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })
  })

  it('should store values with and without metadata', async () => {
    const values = [
      createIndicatorValue(dayAt(0), 'ATR_14', toDecimal('1.5'), { true_range: 2.25 }),
      createIndicatorValue(dayAt(1), 'ATR_14', toDecimal('1.625'), { true_range: 1 }),
    ]

    expect(await indicators.upsertValues(instrument.instrumentId, '1D', values)).toEqual({ inserted: 2, updated: 0 })

    const stored = await indicators.getValues({
      instrumentId: instrument.instrumentId,
      timeframe: '1D',
      indicatorName: 'ATR_14',
    })
    expect(stored.map((v) => v.value.toString())).toEqual(['1.5', '1.625'])
    expect(stored.map((v) => v.metadata)).toEqual([{ true_range: 2.25 }, { true_range: 1 }])

    await indicators.upsertValues(instrument.instrumentId, '1D', [
      createIndicatorValue(dayAt(0), 'SMA_20', toDecimal('100.05')),
    ])
    const [sma] = await indicators.getValues({
      instrumentId: instrument.instrumentId,
      timeframe: '1D',
      indicatorName: 'SMA_20',
    })
    expect(sma?.value.toString()).toBe('100.05')
    expect(sma?.metadata).toBeUndefined()
  })

  it('should overwrite values on recomputation', async () => {
    await indicators.upsertValues(instrument.instrumentId, '1D', [
      createIndicatorValue(dayAt(0), 'SMA_2', toDecimal('10')),
      createIndicatorValue(dayAt(0), 'EMA_2', toDecimal('11')),
    ])

    const counts = await indicators.upsertValues(instrument.instrumentId, '1D', [
      createIndicatorValue(dayAt(0), 'SMA_2', toDecimal('12')),
      createIndicatorValue(dayAt(1), 'SMA_2', toDecimal('13')),
    ])

    expect(counts).toEqual({ inserted: 1, updated: 1 })
    const sma = await indicators.getValues({
      instrumentId: instrument.instrumentId,
      timeframe: '1D',
      indicatorName: 'SMA_2',
      start: dayAt(0),
      end: dayAt(1),
    })
    expect(sma.map((v) => v.value.toString())).toEqual(['12', '13'])
  })
})

describe('PatternRepository', () => {
  let aapl: Instrument

  function patternOf(patternType: string, fields: Partial<NewPattern> = {}): NewPattern {
    return { instrumentId: aapl.instrumentId, timeframe: '1D', patternType, start: dayAt(0), confidence: 50, ...fields }
  }

  beforeEach(async () => {
    aapl = await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })
  })

  it('should store a pattern and read it back', async () => {
    const created = await patterns.create({
      instrumentId: aapl.instrumentId,
      timeframe: '1D',
      patternType: 'head_and_shoulders',
      start: dayAt(0),
      end: dayAt(4),
      confidence: '85.125',
      metadata: { neckline: 101.5 },
    })

    expect(created.confidence.toString()).toBe('85.13')
    expect(created.end).toEqual(dayAt(4))

    const found = await patterns.findByInstrument(aapl.instrumentId)
    expect(found).toEqual([created])
    expect(found[0]?.metadata).toEqual({ neckline: 101.5 })
  })

  it('should filter by timeframe and order by start', async () => {
    await patterns.create(patternOf('flag', { start: dayAt(3) }))
    await patterns.create(patternOf('wedge', { start: dayAt(2), timeframe: '1h' }))
    await patterns.create(patternOf('triangle', { start: dayAt(1) }))

    const daily = await patterns.findByInstrument(aapl.instrumentId, '1D')
    expect(daily.map((p) => p.patternType)).toEqual(['triangle', 'flag'])

    const all = await patterns.findByInstrument(aapl.instrumentId)
    expect(all.map((p) => p.patternType)).toEqual(['triangle', 'wedge', 'flag'])
  })

  it('should list only patterns without an end as ongoing', async () => {
    await patterns.create(patternOf('flag', { end: dayAt(2) }))
    await patterns.create(patternOf('cup', { start: dayAt(1) }))

    const ongoing = await patterns.findOngoing(aapl.instrumentId)
    expect(ongoing.map((p) => p.patternType)).toEqual(['cup'])
    expect(ongoing[0]?.end).toBeUndefined()
  })

  it('should accept a pattern that starts and ends at the same time', async () => {
    const created = await patterns.create({
      instrumentId: aapl.instrumentId,
      timeframe: '1D',
      patternType: 'doji',
      start: dayAt(1),
      end: dayAt(1),
      confidence: 0,
    })

    expect(created.confidence.toString()).toBe('0')
  })

  it.each([['-0.01'], ['100.01'], ['not a number']])('should reject confidence %s', async (confidence) => {
    await expect(patterns.create(patternOf('flag', { confidence }))).rejects.toThrow(StorageError)
    expect(await patterns.findByInstrument(aapl.instrumentId)).toEqual([])
  })

  it('should reject an end before the start', async () => {
    const backwards = patternOf('flag', { start: dayAt(2), end: dayAt(1) })

    await expect(patterns.create(backwards)).rejects.toThrow('Pattern end must not precede its start')
  })

  it('should reject a pattern for an unknown instrument', async () => {
    await expect(patterns.create(patternOf('flag', { instrumentId: 9999 }))).rejects.toThrow(/^createPattern failed: /)
  })
})

describe('cascade delete', () => {
  it('should remove prices, indicator values and patterns with their instrument', async () => {
    const instrument = await instruments.create({ symbol: 'AAPL', instrumentType: 'equity' })
    await prices.upsertCandles(instrument.instrumentId, '1D', [candleAt(0, '100')])
    await indicators.upsertValues(instrument.instrumentId, '1D', [
      createIndicatorValue(dayAt(0), 'SMA_1', toDecimal('100')),
    ])
    await patterns.create({
      instrumentId: instrument.instrumentId,
      timeframe: '1D',
      patternType: 'flag',
      start: dayAt(0),
      confidence: 50,
    })

    await instruments.delete(instrument.instrumentId)

    expect(await prices.getCandles({ instrumentId: instrument.instrumentId, timeframe: '1D' })).toEqual([])
    expect(
      await indicators.getValues({ instrumentId: instrument.instrumentId, timeframe: '1D', indicatorName: 'SMA_1' })
    ).toEqual([])
    expect(await patterns.findByInstrument(instrument.instrumentId)).toEqual([])
  })
})

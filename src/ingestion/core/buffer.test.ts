import { describe, it, expect } from 'vitest'
import { MemorySink } from '@/test/utils/memory-sink'
import { BatchBuffer } from './buffer'
import { SinkError } from './errors'
import { DecimalContext } from './precision'
import { SchemaRegistry } from './registry'

const ITEMS_SCHEMA = { type: 'object', properties: { id: { type: 'integer' } } }

async function setup(options: { batchSize?: number; sink?: MemorySink; keys?: string[] } = {}) {
  const sink = options.sink ?? new MemorySink()
  const registry = new SchemaRegistry({ sink, decimal: new DecimalContext() })
  await registry.declareSchema('items', ITEMS_SCHEMA, options.keys ?? ['id'])
  const buffer = new BatchBuffer({ registry, batchSize: options.batchSize ?? 10 })
  return { sink, registry, buffer }
}

describe('BatchBuffer', () => {
  it('stages records until flushed', async () => {
    const { sink, buffer } = await setup()

    await buffer.stage('items', { id: 1 })
    await buffer.stage('items', { id: 2 })

    expect(buffer.rowCount('items')).toBe(2)
    expect([...buffer.seenKeys('items')]).toEqual(['1', '2'])
    expect(sink.loads).toEqual([])

    const result = await buffer.flush('items')

    expect(result).toMatchObject({ stream: 'items', rowCount: 2 })
    expect(sink.loads).toEqual([
      { stream: 'items', rowCount: 2, lines: ['{"id":1}', '{"id":2}'] },
    ])
    expect(buffer.rowCount('items')).toBe(0)
    expect(buffer.seenKeys('items').size).toBe(0)
  })

  it('does nothing when flushing an empty batch', async () => {
    const { sink, buffer } = await setup()

    expect(await buffer.flush('items')).toBeNull()
    expect(sink.loads).toEqual([])
  })

  it('closes the batch on a repeated primary key', async () => {
    const { sink, buffer } = await setup()

    expect(await buffer.stage('items', { id: 1 })).toBeNull()
    const forced = await buffer.stage('items', { id: 1 })

    expect(forced).toMatchObject({ stream: 'items', rowCount: 1 })
    expect(sink.loadSizes()).toEqual([1])
    expect(buffer.rowCount('items')).toBe(1)
    expect([...buffer.seenKeys('items')]).toEqual(['1'])
  })

  it('never deduplicates streams without a key', async () => {
    const { sink, buffer } = await setup({ keys: [] })

    await buffer.stage('items', { id: 1 })
    await buffer.stage('items', { id: 1 })

    expect(buffer.rowCount('items')).toBe(2)
    expect(buffer.seenKeys('items').size).toBe(0)
    expect(sink.loads).toEqual([])
  })

  it('flushes at the batch size threshold', async () => {
    const { sink, buffer } = await setup({ batchSize: 2 })

    await buffer.stage('items', { id: 1 })
    expect(await buffer.maybeFlush('items')).toBeNull()

    await buffer.stage('items', { id: 2 })
    expect(await buffer.maybeFlush('items')).toMatchObject({ rowCount: 2 })
    expect(sink.loadSizes()).toEqual([2])
  })

  it('flushes every stream in declaration order', async () => {
    const { sink, registry, buffer } = await setup()
    await registry.declareSchema('orders', { type: 'object' }, [])

    await buffer.stage('orders', { total: 5 })
    await buffer.stage('items', { id: 1 })

    const results = await buffer.flushAll()

    expect(results.map((result) => result.stream)).toEqual(['items', 'orders'])
    expect(sink.loads.map((load) => load.stream)).toEqual(['items', 'orders'])
  })

  it('tracks load statistics', async () => {
    const { buffer } = await setup()

    await buffer.stage('items', { id: 1 })
    await buffer.flush('items')
    await buffer.stage('items', { id: 2 })
    await buffer.stage('items', { id: 3 })
    await buffer.flush('items')

    expect(buffer.stats()).toEqual({ items: { flushes: 2, rowsLoaded: 3 } })
  })

  it('discards staged rows on reset', async () => {
    const { sink, buffer } = await setup()

    await buffer.stage('items', { id: 1 })
    await buffer.reset('items')

    expect(buffer.rowCount('items')).toBe(0)
    expect(await buffer.flush('items')).toBeNull()
    expect(sink.loads).toEqual([])
  })

  it('wraps bulk load failures and keeps the batch', async () => {
    const sink = new MemorySink({ failBulkLoad: new Error('connection reset') })
    const { buffer } = await setup({ sink })

    await buffer.stage('items', { id: 1 })

    await expect(buffer.flush('items')).rejects.toThrow(
      new SinkError('Bulk load failed for stream items: connection reset'),
    )
    expect(buffer.rowCount('items')).toBe(1)
    await buffer.dispose()
  })
})

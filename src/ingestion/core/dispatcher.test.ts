import { describe, it, expect } from 'vitest'
import { MemorySink } from '@/test/utils/memory-sink'
import { BatchBuffer } from './buffer'
import { PendingCheckpoint } from './checkpoint'
import { ProtocolDispatcher } from './dispatcher'
import { ProtocolError, SinkError, ValidationError } from './errors'
import { DecimalContext } from './precision'
import { SchemaRegistry } from './registry'
import type { SchemaMessage } from './types'

const USERS: SchemaMessage = {
  type: 'SCHEMA',
  stream: 'users',
  schema: { type: 'object', properties: { id: { type: 'integer' } } },
  keyProperties: ['id'],
}

function setup(sink = new MemorySink(), batchSize = 100) {
  const registry = new SchemaRegistry({ sink, decimal: new DecimalContext() })
  const buffer = new BatchBuffer({ registry, batchSize })
  const checkpoint = new PendingCheckpoint()
  const dispatcher = new ProtocolDispatcher({ registry, buffer, checkpoint })
  return { sink, registry, buffer, checkpoint, dispatcher }
}

function record(stream: string, data: Record<string, unknown>) {
  return {
    type: 'RECORD' as const,
    stream,
    record: data,
    version: null,
    timeExtracted: null,
  }
}

describe('ProtocolDispatcher', () => {
  it('declares, validates and stages', async () => {
    const { buffer, dispatcher } = setup()

    expect(await dispatcher.dispatch(USERS)).toEqual({ ok: true })
    expect(await dispatcher.dispatch(record('users', { id: 1 }))).toEqual({ ok: true })

    expect(buffer.rowCount('users')).toBe(1)
    expect(dispatcher.counts).toEqual({
      schemas: 1,
      records: 1,
      states: 0,
      activateVersions: 0,
    })
  })

  it('flushes once the batch is full', async () => {
    const { sink, dispatcher } = setup(new MemorySink(), 2)
    await dispatcher.dispatch(USERS)

    for (const id of [1, 2, 3]) {
      await dispatcher.dispatch(record('users', { id }))
    }

    expect(sink.loadSizes()).toEqual([2])
  })

  it('returns a failed step for a record before its schema', async () => {
    const { dispatcher } = setup()

    const step = await dispatcher.dispatch(record('users', { id: 1 }))

    expect(step.ok).toBe(false)
    if (!step.ok) {
      expect(step.error).toBeInstanceOf(ProtocolError)
      expect(step.error.stream).toBe('users')
    }
  })

  it('returns a failed step for an invalid record and stages nothing', async () => {
    const { buffer, dispatcher } = setup()
    await dispatcher.dispatch(USERS)

    const step = await dispatcher.dispatch(record('users', { id: 'abc' }))

    expect(step.ok).toBe(false)
    if (!step.ok) expect(step.error).toBeInstanceOf(ValidationError)
    expect(buffer.rowCount('users')).toBe(0)
  })

  it('returns a failed step when the sink fails', async () => {
    const sink = new MemorySink({ failEnsure: new Error('read-only') })
    const { dispatcher } = setup(sink)

    const step = await dispatcher.dispatch(USERS)

    expect(step.ok).toBe(false)
    if (!step.ok) expect(step.error).toBeInstanceOf(SinkError)
  })

  it('loads rows staged under a schema before it is re-declared', async () => {
    const { sink, buffer, dispatcher } = setup()
    await dispatcher.dispatch(USERS)
    await dispatcher.dispatch(record('users', { id: 1 }))

    await dispatcher.dispatch({ ...USERS, keyProperties: [] })

    expect(sink.loads).toEqual([{ stream: 'users', rowCount: 1, lines: ['{"id":1}'] }])
    expect(buffer.rowCount('users')).toBe(0)
  })

  it('keeps the latest state without touching batches', async () => {
    const { sink, checkpoint, dispatcher } = setup()
    await dispatcher.dispatch(USERS)
    await dispatcher.dispatch(record('users', { id: 1 }))

    await dispatcher.dispatch({ type: 'STATE', value: { bookmark: 1 } })
    await dispatcher.dispatch({ type: 'STATE', value: { bookmark: 2 } })

    expect(checkpoint.get()).toEqual({ bookmark: 2 })
    expect(sink.loads).toEqual([])
  })

  it('accepts ACTIVATE_VERSION as a no-op', async () => {
    const { sink, dispatcher } = setup()

    const step = await dispatcher.dispatch({
      type: 'ACTIVATE_VERSION',
      stream: 'users',
      version: 2,
    })

    expect(step).toEqual({ ok: true })
    expect(sink.opened).toEqual([])
    expect(dispatcher.counts.activateVersions).toBe(1)
  })
})

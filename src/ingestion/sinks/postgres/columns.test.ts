import { describe, it, expect } from 'vitest'
import { columnType, columnsForSchema, tableNameForStream } from './columns'

describe('tableNameForStream', () => {
  it('lowercases and replaces characters Postgres would need quoted', () => {
    expect(tableNameForStream('public-Orders.v2')).toBe('public_orders_v2')
  })
})

describe('columnType', () => {
  it.each([
    [{ type: 'integer' }, 'bigint'],
    [{ type: ['null', 'number'] }, 'numeric'],
    [{ type: 'boolean' }, 'boolean'],
    [{ type: 'string' }, 'character varying'],
    [{ type: ['null', 'string'], format: 'date-time' }, 'timestamp with time zone'],
    [{ type: 'object' }, 'jsonb'],
    [{ type: ['array', 'null'] }, 'jsonb'],
    [{}, 'character varying'],
  ])('maps %j to %s', (property, expected) => {
    expect(columnType(property)).toBe(expected)
  })
})

describe('columnsForSchema', () => {
  it('keeps property order and lowercases names', () => {
    const columns = columnsForSchema({
      type: 'object',
      properties: {
        Id: { type: 'integer' },
        updatedAt: { type: 'string', format: 'date-time' },
      },
    })

    expect(columns).toEqual([
      { name: 'id', property: 'Id', type: 'bigint' },
      { name: 'updatedat', property: 'updatedAt', type: 'timestamp with time zone' },
    ])
  })

  it('returns no columns for a schema without properties', () => {
    expect(columnsForSchema({ type: 'object' })).toEqual([])
  })
})

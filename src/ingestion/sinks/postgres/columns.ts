/**
 * Column mapping from stream schemas to Postgres tables.
 */

import type { JsonObject, JsonSchema } from '../../core/types'

export interface ColumnDefinition {
  /** Column name in the destination table */
  name: string
  /** Property name in the record */
  property: string
  /** Postgres column type */
  type: string
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Declared JSON types of a property, without "null".
 */
function declaredTypes(property: JsonObject): string[] {
  const type = property.type
  const types = Array.isArray(type) ? type : [type]
  return types.filter(
    (entry): entry is string => typeof entry === 'string' && entry !== 'null',
  )
}

export function tableNameForStream(stream: string): string {
  return stream.toLowerCase().replace(/[^a-z0-9_]/g, '_')
}

export function columnNameForProperty(property: string): string {
  return property.toLowerCase()
}

export function columnType(property: unknown): string {
  if (!isObject(property)) return 'character varying'

  const types = declaredTypes(property)
  if (types.includes('object') || types.includes('array')) return 'jsonb'
  if (types.includes('string') && property.format === 'date-time') {
    return 'timestamp with time zone'
  }
  if (types.includes('number')) return 'numeric'
  if (types.includes('integer')) return 'bigint'
  if (types.includes('boolean')) return 'boolean'
  return 'character varying'
}

/**
 * One column per top-level schema property, in declaration order.
 */
export function columnsForSchema(schema: JsonSchema): ColumnDefinition[] {
  const properties = schema.properties
  if (!isObject(properties)) return []

  return Object.entries(properties).map(([property, definition]) => ({
    name: columnNameForProperty(property),
    property,
    type: columnType(definition),
  }))
}

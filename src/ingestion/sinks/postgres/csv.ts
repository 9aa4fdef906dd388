/**
 * CSV serialization for `COPY ... FROM STDIN WITH (FORMAT csv)`.
 *
 * An empty unquoted field loads as NULL; every other value is quoted so
 * that an empty string stays an empty string.
 */

import { numberText, stringifyJson } from '../../core/json'
import type { StreamRecord } from '../../core/types'
import type { ColumnDefinition } from './columns'

export function toCsvField(value: unknown): string {
  if (value === null || value === undefined) return ''

  const text =
    numberText(value) ??
    (typeof value === 'object' ? stringifyJson(value) : String(value))
  return `"${text.replace(/"/g, '""')}"`
}

export function recordToCsvLine(
  record: StreamRecord,
  columns: readonly ColumnDefinition[],
): string {
  return columns.map((column) => toCsvField(record[column.property])).join(',')
}

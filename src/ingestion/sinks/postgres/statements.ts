/**
 * SQL statements for the Postgres sink, built with drizzle's `sql` tag so
 * identifiers are always quoted and values always bound.
 */

import { sql, type SQL } from 'drizzle-orm'
import type { ColumnDefinition } from './columns'

export interface TableRef {
  schema: string
  table: string
}

function qualified(ref: TableRef): SQL {
  return sql`${sql.identifier(ref.schema)}.${sql.identifier(ref.table)}`
}

function identifierList(names: readonly string[], alias?: string): SQL {
  const prefix = alias ? `${alias}.` : ''
  return sql.join(
    names.map((name) => sql`${sql.raw(prefix)}${sql.identifier(name)}`),
    sql`, `,
  )
}

function keyMatch(keys: readonly string[], left: string, right: string): SQL {
  return sql.join(
    keys.map(
      (key) =>
        sql`${sql.raw(left)}.${sql.identifier(key)} = ${sql.raw(right)}.${sql.identifier(key)}`,
    ),
    sql` AND `,
  )
}

export function createSchemaStatement(schema: string): SQL {
  return sql`CREATE SCHEMA IF NOT EXISTS ${sql.identifier(schema)}`
}

export function existingColumnsStatement(ref: TableRef): SQL {
  return sql`SELECT column_name FROM information_schema.columns WHERE table_schema = ${ref.schema} AND table_name = ${ref.table}`
}

export function createTableStatement(
  ref: TableRef,
  columns: readonly ColumnDefinition[],
  keyColumns: readonly string[],
): SQL {
  const definitions = columns.map(
    (column) => sql`${sql.identifier(column.name)} ${sql.raw(column.type)}`,
  )
  if (keyColumns.length > 0) {
    definitions.push(sql`PRIMARY KEY (${identifierList(keyColumns)})`)
  }
  return sql`CREATE TABLE IF NOT EXISTS ${qualified(ref)} (${sql.join(definitions, sql`, `)})`
}

export function addColumnStatement(ref: TableRef, column: ColumnDefinition): SQL {
  return sql`ALTER TABLE ${qualified(ref)} ADD COLUMN ${sql.identifier(column.name)} ${sql.raw(column.type)}`
}

/**
 * Temp table shaped like the target, gone when the transaction ends.
 */
export function createTempTableStatement(temp: string, ref: TableRef): SQL {
  return sql`CREATE TEMP TABLE ${sql.identifier(temp)} (LIKE ${qualified(ref)}) ON COMMIT DROP`
}

export function copyFromStdinStatement(
  temp: string,
  columns: readonly ColumnDefinition[],
): SQL {
  const names = columns.map((column) => column.name)
  return sql`COPY ${sql.identifier(temp)} (${identifierList(names)}) FROM STDIN WITH (FORMAT csv)`
}

/**
 * Overwrite rows whose key is already present. Null when every column is
 * part of the key (nothing to update).
 */
export function updateFromTempStatement(
  ref: TableRef,
  temp: string,
  columns: readonly ColumnDefinition[],
  keyColumns: readonly string[],
): SQL | null {
  const updatable = columns.filter((column) => !keyColumns.includes(column.name))
  if (updatable.length === 0) return null

  const assignments = sql.join(
    updatable.map(
      (column) => sql`${sql.identifier(column.name)} = s.${sql.identifier(column.name)}`,
    ),
    sql`, `,
  )
  return sql`UPDATE ${qualified(ref)} AS t SET ${assignments} FROM ${sql.identifier(temp)} AS s WHERE ${keyMatch(keyColumns, 't', 's')}`
}

/**
 * Insert staged rows whose key is not in the table yet.
 */
export function insertMissingFromTempStatement(
  ref: TableRef,
  temp: string,
  columns: readonly ColumnDefinition[],
  keyColumns: readonly string[],
): SQL {
  const names = columns.map((column) => column.name)
  const [firstKey] = keyColumns
  if (firstKey === undefined) {
    throw new Error('insertMissingFromTempStatement needs at least one key column')
  }
  return sql`INSERT INTO ${qualified(ref)} (${identifierList(names)}) SELECT ${identifierList(names, 's')} FROM ${sql.identifier(temp)} AS s LEFT JOIN ${qualified(ref)} AS t ON ${keyMatch(keyColumns, 't', 's')} WHERE t.${sql.identifier(firstKey)} IS NULL`
}

export function insertAllFromTempStatement(
  ref: TableRef,
  temp: string,
  columns: readonly ColumnDefinition[],
): SQL {
  const names = columns.map((column) => column.name)
  return sql`INSERT INTO ${qualified(ref)} (${identifierList(names)}) SELECT ${identifierList(names)} FROM ${sql.identifier(temp)}`
}

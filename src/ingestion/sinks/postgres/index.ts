/**
 * Postgres Sink
 *
 * Creates and evolves one table per stream and bulk loads staged CSV blocks:
 * COPY into a temp table shaped like the target, then merge on the primary
 * key (update existing rows, insert missing ones).
 */

import type { TargetConfig } from '@/config/schemas'
import { createDb } from '@/db'
import { generatePrefixedId } from '@/utils/id'
import { createLogger, type Logger } from '@/utils/logger'
import { ValidationError } from '../../core/errors'
import { numberText, stringifyJson } from '../../core/json'
import type {
  SinkAdapter,
  StagedBlock,
  StreamDeclaration,
  StreamRecord,
  StreamSink,
} from '../../core/types'
import {
  columnNameForProperty,
  columnsForSchema,
  tableNameForStream,
  type ColumnDefinition,
} from './columns'
import { recordToCsvLine } from './csv'
import { PostgresExecutor, type SqlExecutor } from './executor'
import {
  addColumnStatement,
  copyFromStdinStatement,
  createSchemaStatement,
  createTableStatement,
  createTempTableStatement,
  existingColumnsStatement,
  insertAllFromTempStatement,
  insertMissingFromTempStatement,
  updateFromTempStatement,
  type TableRef,
} from './statements'

function keyValueToString(value: unknown): string {
  const exact = numberText(value)
  if (exact !== undefined) return exact
  return typeof value === 'object' ? stringifyJson(value) : String(value)
}

export class PostgresStreamSink implements StreamSink {
  readonly ref: TableRef
  readonly columns: ColumnDefinition[]
  readonly keyColumns: string[]
  private readonly executor: SqlExecutor
  private readonly declaration: StreamDeclaration
  private readonly log: Logger

  constructor(executor: SqlExecutor, schemaName: string, declaration: StreamDeclaration) {
    this.executor = executor
    this.declaration = declaration
    this.ref = { schema: schemaName, table: tableNameForStream(declaration.stream) }
    this.columns = columnsForSchema(declaration.schema)
    this.keyColumns = declaration.keyProperties.map(columnNameForProperty)
    this.log = createLogger('sink').child({ stream: declaration.stream, table: this.ref.table })
  }

  async ensureSchema(): Promise<void> {
    await this.executor.run(createSchemaStatement(this.ref.schema))

    const existing = await this.executor.query(existingColumnsStatement(this.ref))

    if (existing.length === 0) {
      await this.executor.run(createTableStatement(this.ref, this.columns, this.keyColumns))
      this.log.info('Created table', { columns: this.columns.length })
      return
    }

    const present = new Set(existing.map((row) => String(row.column_name)))
    for (const column of this.columns) {
      if (present.has(column.name)) continue
      await this.executor.run(addColumnStatement(this.ref, column))
      this.log.info('Added column', { column: column.name, type: column.type })
    }
  }

  primaryKeyString(record: StreamRecord, keyProperties: readonly string[]): string {
    return keyProperties
      .map((property) => {
        const value = record[property]
        if (value === undefined || value === null) {
          throw new ValidationError(
            `Record for stream ${this.declaration.stream} is missing key property ${property}`,
            [],
            { stream: this.declaration.stream },
          )
        }
        return keyValueToString(value)
      })
      .join(',')
  }

  serializeRecord(record: StreamRecord): string {
    return recordToCsvLine(record, this.columns)
  }

  /**
   * Merge the block in one transaction, so a failed load leaves the table
   * as it was.
   */
  async bulkLoad(block: StagedBlock, rowCount: number): Promise<void> {
    const temp = generatePrefixedId('tmp')

    await this.executor.transaction(async (tx) => {
      await tx.run(createTempTableStatement(temp, this.ref))
      await tx.copyFrom(copyFromStdinStatement(temp, this.columns), block.createReadStream())

      if (this.keyColumns.length > 0) {
        const update = updateFromTempStatement(this.ref, temp, this.columns, this.keyColumns)
        if (update) {
          await tx.run(update)
        }
        await tx.run(insertMissingFromTempStatement(this.ref, temp, this.columns, this.keyColumns))
      } else {
        await tx.run(insertAllFromTempStatement(this.ref, temp, this.columns))
      }
    })

    this.log.debug('Loaded rows', { rows: rowCount, bytes: block.byteLength })
  }
}

export interface PostgresSinkOptions {
  /** Destination schema (namespace) for stream tables */
  schema: string
}

export class PostgresSink implements SinkAdapter {
  private readonly executor: SqlExecutor
  private readonly schema: string

  constructor(executor: SqlExecutor, options: PostgresSinkOptions) {
    this.executor = executor
    this.schema = options.schema
  }

  /**
   * Connect using the target configuration.
   */
  static connect(config: TargetConfig): PostgresSink {
    const executor = new PostgresExecutor(createDb(config))
    return new PostgresSink(executor, { schema: config.postgres_schema })
  }

  open(declaration: StreamDeclaration): PostgresStreamSink {
    return new PostgresStreamSink(this.executor, this.schema, declaration)
  }

  async close(): Promise<void> {
    await this.executor.close()
  }
}

export * from './columns'
export * from './csv'
export * from './executor'
export * from './statements'

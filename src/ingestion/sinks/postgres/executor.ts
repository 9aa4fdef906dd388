/**
 * Statement execution for the Postgres sink.
 */

import type { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import type { SQL } from 'drizzle-orm'
import { PgDialect } from 'drizzle-orm/pg-core'
import { drizzle } from 'drizzle-orm/postgres-js'
import type { DatabaseConnection } from '@/db'

export interface SqlExecutor {
  query(statement: SQL): Promise<Record<string, unknown>[]>
  run(statement: SQL): Promise<void>
  /** Stream `source` into a `COPY ... FROM STDIN` statement */
  copyFrom(statement: SQL, source: Readable): Promise<void>
  /**
   * Run `work` in one transaction: committed when it resolves, rolled back
   * when it throws.
   */
  transaction(work: (tx: SqlExecutor) => Promise<void>): Promise<void>
  close(): Promise<void>
}

export class PostgresExecutor implements SqlExecutor {
  private readonly dialect = new PgDialect()
  private readonly connection: DatabaseConnection

  constructor(connection: DatabaseConnection) {
    this.connection = connection
  }

  async query(statement: SQL): Promise<Record<string, unknown>[]> {
    const rows = await this.connection.db.execute(statement)
    return [...rows]
  }

  async run(statement: SQL): Promise<void> {
    await this.connection.db.execute(statement)
  }

  async copyFrom(statement: SQL, source: Readable): Promise<void> {
    // COPY takes no bind parameters, so the rendered text is complete
    const { sql: text } = this.dialect.sqlToQuery(statement)
    const target = await this.connection.client.unsafe(text).writable()
    await pipeline(source, target)
  }

  async transaction(work: (tx: SqlExecutor) => Promise<void>): Promise<void> {
    await this.connection.client.begin(async (tx) => {
      await work(new PostgresExecutor({ client: tx, db: drizzle(tx) }))
    })
  }

  async close(): Promise<void> {
    await this.connection.client.end({ timeout: 5 })
  }
}

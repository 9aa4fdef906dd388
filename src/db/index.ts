import postgres from 'postgres'
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js'
import type { TargetConfig } from '@/config/schemas'

export type Database = PostgresJsDatabase

export interface DatabaseConnection {
  client: postgres.Sql
  db: Database
}

/**
 * Open a single-connection client. Temp tables live per session, so the
 * statement builder and COPY streaming must share one connection.
 */
export function createDb(config: TargetConfig): DatabaseConnection {
  const client = postgres({
    host: config.postgres_host,
    port: config.postgres_port,
    database: config.postgres_database,
    username: config.postgres_username,
    password: config.postgres_password,
    max: 1,
    onnotice: () => {},
  })

  return { client, db: drizzle(client) }
}

import { z } from 'zod'

export const DEFAULT_BATCH_SIZE = 100_000

/**
 * Settings the batching core reads.
 */
export const coreConfigSchema = z.object({
  batch_size: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
})

/**
 * Full target configuration: core settings plus the Postgres connection.
 */
export const targetConfigSchema = coreConfigSchema.extend({
  postgres_host: z.string().min(1).default('localhost'),
  postgres_port: z.number().int().min(1).max(65535).default(5432),
  postgres_database: z.string().min(1),
  postgres_username: z.string().min(1),
  postgres_password: z.string().optional(),
  postgres_schema: z.string().min(1).default('public'),
})

export type TargetConfig = z.infer<typeof targetConfigSchema>

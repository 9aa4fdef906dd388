import * as fs from 'node:fs/promises'
import { targetConfigSchema, type TargetConfig } from './schemas'

export function parseTargetConfig(raw: unknown): TargetConfig {
  const result = targetConfigSchema.safeParse(raw ?? {})

  if (!result.success) {
    throw new Error(`Target configuration validation failed: ${result.error.message}`)
  }

  return result.data
}

/**
 * Read and validate a JSON config file.
 */
export async function loadTargetConfig(configPath: string): Promise<TargetConfig> {
  const content = await fs.readFile(configPath, 'utf-8')

  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    throw new Error(`Config file ${configPath} is not valid JSON`, { cause: error })
  }

  return parseTargetConfig(raw)
}

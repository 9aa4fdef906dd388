import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { loadTargetConfig, parseTargetConfig } from './targetConfig'

describe('parseTargetConfig', () => {
  it('applies defaults', () => {
    expect(
      parseTargetConfig({ postgres_database: 'warehouse', postgres_username: 'loader' }),
    ).toEqual({
      batch_size: 100_000,
      postgres_host: 'localhost',
      postgres_port: 5432,
      postgres_database: 'warehouse',
      postgres_username: 'loader',
      postgres_schema: 'public',
    })
  })

  it('keeps explicit values', () => {
    const config = parseTargetConfig({
      batch_size: 500,
      postgres_host: 'db.internal',
      postgres_port: 6543,
      postgres_database: 'warehouse',
      postgres_username: 'loader',
      postgres_password: 'test-secret',
      postgres_schema: 'raw',
    })

    expect(config.batch_size).toBe(500)
    expect(config.postgres_password).toBe('test-secret')
    expect(config.postgres_schema).toBe('raw')
  })

  it('rejects a batch size that is not a positive integer', () => {
    const base = { postgres_database: 'warehouse', postgres_username: 'loader' }

    expect(() => parseTargetConfig({ ...base, batch_size: 0 })).toThrow(
      'Target configuration validation failed',
    )
    expect(() => parseTargetConfig({ ...base, batch_size: 1.5 })).toThrow(
      'Target configuration validation failed',
    )
  })

  it('requires the database and user', () => {
    expect(() => parseTargetConfig({})).toThrow('Target configuration validation failed')
    expect(() => parseTargetConfig(null)).toThrow('Target configuration validation failed')
  })
})

describe('loadTargetConfig', () => {
  let directory: string

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'))
  })

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true })
  })

  it('reads a JSON file', async () => {
    const file = path.join(directory, 'config.json')
    await fs.writeFile(
      file,
      JSON.stringify({ postgres_database: 'warehouse', postgres_username: 'loader', batch_size: 2 }),
    )

    const config = await loadTargetConfig(file)

    expect(config.batch_size).toBe(2)
    expect(config.postgres_database).toBe('warehouse')
  })

  it('reports invalid JSON with the file name', async () => {
    const file = path.join(directory, 'broken.json')
    await fs.writeFile(file, '{ not json')

    await expect(loadTargetConfig(file)).rejects.toThrow(`Config file ${file} is not valid JSON`)
  })

  it('fails for a missing file', async () => {
    await expect(loadTargetConfig(path.join(directory, 'absent.json'))).rejects.toThrow('ENOENT')
  })
})

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { StagingBlock } from './staging'

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file)
    return true
  } catch {
    return false
  }
}

describe('StagingBlock', () => {
  let directory: string

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'staging-test-'))
  })

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true })
  })

  it('stores appended lines in order', async () => {
    const block = new StagingBlock({ directory })

    await block.append('a,1')
    await block.append('b,2')
    await block.seal()

    expect(await block.readText()).toBe('a,1\nb,2\n')
    expect(block.byteLength).toBe(8)
    await block.dispose()
  })

  it('creates its file under the given directory', () => {
    const block = new StagingBlock({ directory })

    expect(path.dirname(block.path)).toBe(directory)
    expect(path.basename(block.path)).toMatch(/^stage_[0-9a-z]{21}\.csv$/)
  })

  it('leaves an empty file when sealed without data', async () => {
    const block = new StagingBlock({ directory })

    await block.seal()

    expect(await block.readText()).toBe('')
    await block.dispose()
  })

  it('spills large batches to disk before sealing', async () => {
    const block = new StagingBlock({ directory })
    const line = 'x'.repeat(1023)

    for (let i = 0; i < 1100; i++) {
      await block.append(line)
    }

    expect(await exists(block.path)).toBe(true)
    await block.seal()
    expect((await fs.stat(block.path)).size).toBe(1100 * 1024)
    await block.dispose()
  })

  it('refuses reads before sealing and writes after', async () => {
    const block = new StagingBlock({ directory })
    await block.append('a')

    await expect(block.readText()).rejects.toThrow('must be sealed before reading')
    expect(() => block.createReadStream()).toThrow('must be sealed before reading')

    await block.seal()
    await expect(block.append('b')).rejects.toThrow('is sealed')
    await block.dispose()
  })

  it('streams its contents', async () => {
    const block = new StagingBlock({ directory })
    await block.append('hello')
    await block.seal()

    const chunks: Buffer[] = []
    for await (const chunk of block.createReadStream()) {
      chunks.push(Buffer.from(chunk))
    }

    expect(Buffer.concat(chunks).toString('utf-8')).toBe('hello\n')
    await block.dispose()
  })

  it('removes its file on dispose', async () => {
    const block = new StagingBlock({ directory })
    await block.append('a')
    await block.seal()

    await block.dispose()

    expect(await exists(block.path)).toBe(false)
  })
})

/**
 * Staging Blocks
 *
 * Append-only scratch files holding the serialized records of the next
 * flush. Lines are buffered in memory and spilled to the temp file in
 * chunks; the file is removed once its batch is loaded or the run aborts.
 */

import { createReadStream } from 'node:fs'
import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import type { Readable } from 'node:stream'
import { generatePrefixedId } from '@/utils/id'
import type { StagedBlock } from './types'

/** Buffered bytes that trigger a write to disk */
const SPILL_THRESHOLD_BYTES = 1024 * 1024

export interface StagingOptions {
  /** Directory for staging files (default: OS temp dir) */
  directory?: string
}

export class StagingBlock implements StagedBlock {
  readonly path: string
  private handle: fs.FileHandle | null = null
  private pending: Buffer[] = []
  private pendingBytes = 0
  private written = 0
  private sealed = false

  constructor(options: StagingOptions = {}) {
    const directory = options.directory ?? os.tmpdir()
    this.path = path.join(directory, `${generatePrefixedId('stage')}.csv`)
  }

  get byteLength(): number {
    return this.written + this.pendingBytes
  }

  /**
   * Append one line; a newline is added.
   */
  async append(line: string): Promise<void> {
    if (this.sealed) {
      throw new Error(`Staging block ${this.path} is sealed`)
    }

    const chunk = Buffer.from(`${line}\n`, 'utf-8')
    this.pending.push(chunk)
    this.pendingBytes += chunk.byteLength

    if (this.pendingBytes >= SPILL_THRESHOLD_BYTES) {
      await this.spill()
    }
  }

  /**
   * Write out buffered lines and close the file. The block is read-only after.
   */
  async seal(): Promise<void> {
    if (this.sealed) return
    await this.spill()
    if (!this.handle) {
      // Nothing appended: leave an empty file so readers still find it
      await fs.writeFile(this.path, '')
    }
    await this.handle?.close()
    this.handle = null
    this.sealed = true
  }

  createReadStream(): Readable {
    if (!this.sealed) {
      throw new Error(`Staging block ${this.path} must be sealed before reading`)
    }
    return createReadStream(this.path)
  }

  async readText(): Promise<string> {
    if (!this.sealed) {
      throw new Error(`Staging block ${this.path} must be sealed before reading`)
    }
    return fs.readFile(this.path, 'utf-8')
  }

  /**
   * Close and delete the backing file.
   */
  async dispose(): Promise<void> {
    this.pending = []
    this.pendingBytes = 0
    await this.handle?.close()
    this.handle = null
    this.sealed = true
    await fs.rm(this.path, { force: true })
  }

  private async spill(): Promise<void> {
    if (this.pendingBytes === 0) return

    const data = Buffer.concat(this.pending, this.pendingBytes)
    this.pending = []
    this.pendingBytes = 0

    if (!this.handle) {
      this.handle = await fs.open(this.path, 'wx')
    }
    await this.handle.writeFile(data)
    this.written += data.byteLength
  }
}

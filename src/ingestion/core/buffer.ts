/**
 * Batch Buffer
 *
 * Per-stream staging of serialized records between flushes. A batch never
 * holds two rows with the same primary key: the sink's bulk load merges on
 * the key and cannot settle two conflicting rows in one load, so a repeated
 * key closes the current batch before the new row is staged.
 */

import { createLogger, measureTime, type Logger } from '@/utils/logger'
import { DEFAULT_BATCH_SIZE } from '@/config/schemas'
import { toSinkError } from './errors'
import type { SchemaRegistry } from './registry'
import { StagingBlock, type StagingOptions } from './staging'
import type { StreamLoadStats, StreamRecord } from './types'

interface Batch {
  rowCount: number
  seenKeys: Set<string>
  block: StagingBlock
}

export interface FlushResult {
  stream: string
  rowCount: number
  /** Bulk load duration in ms */
  duration: number
}

export interface BatchBufferOptions {
  registry: SchemaRegistry
  batchSize?: number
  staging?: StagingOptions
  logger?: Logger
}

export class BatchBuffer {
  readonly batchSize: number
  private readonly registry: SchemaRegistry
  private readonly staging: StagingOptions
  private readonly log: Logger
  private readonly batches = new Map<string, Batch>()
  private readonly loadStats = new Map<string, StreamLoadStats>()

  constructor(options: BatchBufferOptions) {
    this.registry = options.registry
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
    this.staging = options.staging ?? {}
    this.log = options.logger ?? createLogger('buffer')
  }

  /** Rows staged for `stream` since its last flush */
  rowCount(stream: string): number {
    return this.batches.get(stream)?.rowCount ?? 0
  }

  /** Primary keys staged for `stream` since its last flush */
  seenKeys(stream: string): ReadonlySet<string> {
    return this.batches.get(stream)?.seenKeys ?? new Set()
  }

  /**
   * Stage one validated record.
   *
   * @returns the flush forced by a repeated primary key, if one happened
   */
  async stage(stream: string, record: StreamRecord): Promise<FlushResult | null> {
    const { declaration, sink } = this.registry.require(stream)

    let key = ''
    if (declaration.keyProperties.length > 0) {
      try {
        key = sink.primaryKeyString(record, declaration.keyProperties)
      } catch (error) {
        throw toSinkError(error, 'Computing primary key', stream)
      }
    }

    let flushed: FlushResult | null = null
    if (key && this.batchFor(stream).seenKeys.has(key)) {
      this.log.debug('Repeated primary key, closing batch', { stream, key })
      flushed = await this.flush(stream)
    }

    let line: string
    try {
      line = sink.serializeRecord(record)
    } catch (error) {
      throw toSinkError(error, 'Serializing record', stream)
    }

    const batch = this.batchFor(stream)
    await batch.block.append(line)
    batch.rowCount += 1
    if (key) {
      batch.seenKeys.add(key)
    }

    return flushed
  }

  /**
   * Flush when the stream has reached `threshold` staged rows.
   */
  async maybeFlush(
    stream: string,
    threshold: number = this.batchSize,
  ): Promise<FlushResult | null> {
    if (this.rowCount(stream) < threshold) return null
    return this.flush(stream)
  }

  /**
   * Bulk load the stream's batch and start a fresh one. No-op when empty.
   */
  async flush(stream: string): Promise<FlushResult | null> {
    const batch = this.batches.get(stream)
    if (!batch || batch.rowCount === 0) return null

    const { sink } = this.registry.require(stream)
    await batch.block.seal()

    let duration: number
    try {
      const timed = await measureTime(() =>
        sink.bulkLoad(batch.block, batch.rowCount),
      )
      duration = timed.duration
    } catch (error) {
      throw toSinkError(error, 'Bulk load', stream)
    }

    // Row count, keys and block are replaced together
    this.batches.set(stream, this.freshBatch())
    await batch.block.dispose()

    const stats = this.loadStats.get(stream) ?? { flushes: 0, rowsLoaded: 0 }
    stats.flushes += 1
    stats.rowsLoaded += batch.rowCount
    this.loadStats.set(stream, stats)

    this.log.info('Flushed batch', { stream, rows: batch.rowCount, duration })

    return { stream, rowCount: batch.rowCount, duration }
  }

  /**
   * Drop whatever is staged for the stream and start a fresh batch.
   */
  async reset(stream: string): Promise<void> {
    const previous = this.batches.get(stream)
    this.batches.set(stream, this.freshBatch())
    await previous?.block.dispose()
  }

  /**
   * Flush every non-empty stream, in declaration order.
   */
  async flushAll(): Promise<FlushResult[]> {
    const results: FlushResult[] = []
    for (const stream of this.registry.streams()) {
      const result = await this.flush(stream)
      if (result) results.push(result)
    }
    return results
  }

  /**
   * Delete every staging file without loading it.
   */
  async dispose(): Promise<void> {
    const batches = [...this.batches.values()]
    this.batches.clear()
    for (const batch of batches) {
      await batch.block.dispose()
    }
  }

  stats(): Record<string, StreamLoadStats> {
    const result: Record<string, StreamLoadStats> = {}
    for (const [stream, stats] of this.loadStats) {
      result[stream] = { ...stats }
    }
    return result
  }

  private batchFor(stream: string): Batch {
    let batch = this.batches.get(stream)
    if (!batch) {
      batch = this.freshBatch()
      this.batches.set(stream, batch)
    }
    return batch
  }

  private freshBatch(): Batch {
    return {
      rowCount: 0,
      seenKeys: new Set(),
      block: new StagingBlock(this.staging),
    }
  }
}

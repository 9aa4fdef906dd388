/**
 * Pipeline
 *
 * The read loop: one line at a time, parse, dispatch, abort on the first
 * failed step. At end of input every non-empty batch is loaded and the
 * outstanding checkpoint is emitted.
 */

import { createLogger, type Logger } from '@/utils/logger'
import { DEFAULT_BATCH_SIZE } from '@/config/schemas'
import { BatchBuffer } from './buffer'
import { CheckpointEmitter, PendingCheckpoint } from './checkpoint'
import { ProtocolDispatcher } from './dispatcher'
import { parseMessage } from './messages'
import { DecimalContext } from './precision'
import { SchemaRegistry } from './registry'
import type { StagingOptions } from './staging'
import type { PersistSummary, SinkAdapter } from './types'

export interface PersistOptions {
  sink: SinkAdapter
  /** Row-count flush threshold per stream */
  batchSize?: number
  emitter?: CheckpointEmitter
  /** Shared precision context; a fresh one is created when omitted */
  decimal?: DecimalContext
  staging?: StagingOptions
  logger?: Logger
}

/**
 * Load a stream of protocol lines into the sink.
 *
 * @throws ProtocolError | ValidationError | SinkError on the first failure;
 *   staged rows are discarded and no checkpoint is emitted
 */
export async function persistLines(
  lines: AsyncIterable<string> | Iterable<string>,
  options: PersistOptions,
): Promise<PersistSummary> {
  const log = options.logger ?? createLogger('protocol')
  const decimal = options.decimal ?? new DecimalContext()
  const emitter = options.emitter ?? new CheckpointEmitter()
  const checkpoint = new PendingCheckpoint()

  const registry = new SchemaRegistry({ sink: options.sink, decimal })
  const buffer = new BatchBuffer({
    registry,
    batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    staging: options.staging,
  })
  const dispatcher = new ProtocolDispatcher({ registry, buffer, checkpoint })

  let messages = 0
  try {
    for await (const line of lines) {
      messages += 1

      const parsed = parseMessage(line)
      if (!parsed.ok) {
        log.error('Unable to parse line', { line, lineNumber: messages })
        throw parsed.error
      }

      const step = await dispatcher.dispatch(parsed.message)
      if (!step.ok) {
        log.error(
          'Aborting run',
          { lineNumber: messages, kind: step.error.kind, stream: step.error.stream },
          step.error,
        )
        throw step.error
      }
    }

    await buffer.flushAll()
    await emitter.emit(checkpoint.get())
  } finally {
    await buffer.dispose()
  }

  const summary: PersistSummary = {
    state: checkpoint.get(),
    messages,
    records: dispatcher.counts.records,
    streams: buffer.stats(),
  }

  log.info('Finished loading', {
    messages: summary.messages,
    records: summary.records,
    streams: summary.streams,
  })

  return summary
}

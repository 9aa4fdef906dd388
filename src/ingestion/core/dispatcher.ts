/**
 * Protocol Dispatcher
 *
 * Routes one message at a time to the registry and the batch buffer. Every
 * step of a message (validate, stage, maybe flush) finishes before the
 * dispatcher returns, which is what keeps batch boundaries deterministic.
 */

import { createLogger, type Logger } from '@/utils/logger'
import type { BatchBuffer } from './buffer'
import type { PendingCheckpoint } from './checkpoint'
import {
  ProtocolError,
  ValidationError,
  SinkError,
  STEP_OK,
  stepFailed,
  type StepResult,
} from './errors'
import type { SchemaRegistry } from './registry'
import type {
  ActivateVersionMessage,
  RecordMessage,
  SchemaMessage,
  StateMessage,
  TargetMessage,
} from './types'

export interface DispatcherOptions {
  registry: SchemaRegistry
  buffer: BatchBuffer
  checkpoint: PendingCheckpoint
  logger?: Logger
}

export interface DispatchCounters {
  schemas: number
  records: number
  states: number
  activateVersions: number
}

export class ProtocolDispatcher {
  private readonly registry: SchemaRegistry
  private readonly buffer: BatchBuffer
  private readonly checkpoint: PendingCheckpoint
  private readonly log: Logger
  private readonly counters: DispatchCounters = {
    schemas: 0,
    records: 0,
    states: 0,
    activateVersions: 0,
  }

  constructor(options: DispatcherOptions) {
    this.registry = options.registry
    this.buffer = options.buffer
    this.checkpoint = options.checkpoint
    this.log = options.logger ?? createLogger('protocol')
  }

  get counts(): Readonly<DispatchCounters> {
    return this.counters
  }

  /**
   * Handle one message. Classified failures come back as a failed step;
   * anything else is a bug and is thrown.
   */
  async dispatch(message: TargetMessage): Promise<StepResult> {
    try {
      switch (message.type) {
        case 'SCHEMA':
          await this.handleSchema(message)
          break
        case 'RECORD':
          await this.handleRecord(message)
          break
        case 'STATE':
          this.handleState(message)
          break
        case 'ACTIVATE_VERSION':
          this.handleActivateVersion(message)
          break
        default:
          return stepFailed(unknownKind(message))
      }
    } catch (error) {
      if (
        error instanceof ProtocolError ||
        error instanceof ValidationError ||
        error instanceof SinkError
      ) {
        return stepFailed(error)
      }
      throw error
    }

    return STEP_OK
  }

  /**
   * A repeated SCHEMA for a declared stream loads the rows staged under the
   * previous declaration before replacing it, instead of discarding them.
   * A checkpoint emitted later may cover those rows, so they must reach the
   * sink.
   */
  private async handleSchema(message: SchemaMessage): Promise<void> {
    if (this.registry.has(message.stream)) {
      await this.buffer.flush(message.stream)
    }

    await this.registry.declareSchema(
      message.stream,
      message.schema,
      message.keyProperties,
    )
    await this.buffer.reset(message.stream)
    this.counters.schemas += 1
  }

  private async handleRecord(message: RecordMessage): Promise<void> {
    this.registry.validate(message.stream, message.record)
    await this.buffer.stage(message.stream, message.record)
    await this.buffer.maybeFlush(message.stream)
    this.counters.records += 1
  }

  private handleState(message: StateMessage): void {
    this.log.debug('Setting state', { state: message.value })
    this.checkpoint.set(message.value)
    this.counters.states += 1
  }

  private handleActivateVersion(message: ActivateVersionMessage): void {
    this.log.debug('ACTIVATE_VERSION message', {
      stream: message.stream ?? undefined,
      version: message.version,
    })
    this.counters.activateVersions += 1
  }
}

function unknownKind(message: never): ProtocolError {
  const raw: unknown = message
  const type =
    typeof raw === 'object' && raw !== null && 'type' in raw ? String(raw.type) : 'unknown'
  return new ProtocolError(`Unknown message type ${type}`)
}

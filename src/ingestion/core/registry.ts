/**
 * Schema Registry
 *
 * Holds the latest declaration of every stream together with its compiled
 * validator and sink handle. Entries are replaced wholesale on each SCHEMA
 * message.
 */

import { createLogger, type Logger } from '@/utils/logger'
import { ProtocolError, ValidationError, toSinkError } from './errors'
import { calibrateNumericPrecision, type DecimalContext } from './precision'
import { compileRecordValidator, type RecordValidator } from './validator'
import type {
  JsonSchema,
  SinkAdapter,
  StreamDeclaration,
  StreamRecord,
  StreamSink,
} from './types'

export interface RegisteredStream {
  declaration: StreamDeclaration
  validator: RecordValidator
  sink: StreamSink
}

export interface SchemaRegistryOptions {
  sink: SinkAdapter
  decimal: DecimalContext
  logger?: Logger
}

export class SchemaRegistry {
  private readonly entries = new Map<string, RegisteredStream>()
  private readonly sink: SinkAdapter
  private readonly decimal: DecimalContext
  private readonly log: Logger

  constructor(options: SchemaRegistryOptions) {
    this.sink = options.sink
    this.decimal = options.decimal
    this.log = options.logger ?? createLogger('protocol')
  }

  /**
   * Register (or replace) a stream's schema.
   *
   * Calibrates decimal precision before compiling the validator, then asks
   * the sink to create or evolve the destination table.
   */
  async declareSchema(
    stream: string,
    schema: JsonSchema,
    keyProperties: readonly string[] | undefined,
  ): Promise<RegisteredStream> {
    if (keyProperties === undefined) {
      throw new ProtocolError(`key_properties field is required for stream ${stream}`, {
        stream,
      })
    }

    const precision = calibrateNumericPrecision(schema, this.decimal)

    let validator: RecordValidator
    try {
      validator = compileRecordValidator(schema, this.decimal)
    } catch (error) {
      throw new ProtocolError(`Schema for stream ${stream} cannot be compiled`, {
        stream,
        cause: error,
      })
    }

    const declaration: StreamDeclaration = {
      stream,
      schema,
      keyProperties: [...keyProperties],
    }

    let sink: StreamSink
    try {
      sink = this.sink.open(declaration)
      await sink.ensureSchema()
    } catch (error) {
      throw toSinkError(error, 'Ensuring destination schema', stream)
    }

    const entry: RegisteredStream = { declaration, validator, sink }
    this.entries.set(stream, entry)

    this.log.info('Declared stream schema', {
      stream,
      keyProperties: declaration.keyProperties,
      precision,
    })

    return entry
  }

  has(stream: string): boolean {
    return this.entries.has(stream)
  }

  get(stream: string): RegisteredStream | undefined {
    return this.entries.get(stream)
  }

  /**
   * Entry for a declared stream.
   * @throws ProtocolError when no SCHEMA has been seen for the stream
   */
  require(stream: string): RegisteredStream {
    const entry = this.entries.get(stream)
    if (!entry) {
      throw new ProtocolError(
        `A record for stream ${stream} was encountered before a corresponding schema`,
        { stream },
      )
    }
    return entry
  }

  /** Declared stream names, in first-declaration order */
  streams(): string[] {
    return [...this.entries.keys()]
  }

  /**
   * @throws ProtocolError for an undeclared stream
   * @throws ValidationError when the record does not match the schema
   */
  validate(stream: string, record: StreamRecord): void {
    const { validator } = this.require(stream)
    const outcome = validator(record)

    if (!outcome.valid) {
      throw new ValidationError(
        `Record for stream ${stream} does not match its schema: ${outcome.errors.join('; ')}`,
        outcome.errors,
        { stream },
      )
    }
  }
}

/**
 * Error taxonomy for the loader. Every kind is fatal to the run.
 */

export type TargetErrorKind = 'protocol' | 'validation' | 'sink'

export interface TargetErrorOptions {
  stream?: string
  cause?: unknown
}

export abstract class TargetError extends Error {
  abstract readonly kind: TargetErrorKind
  readonly stream: string | null

  constructor(message: string, options: TargetErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.stream = options.stream ?? null
  }
}

/**
 * Malformed or out-of-order message: unparseable line, missing field,
 * unknown message type, RECORD before SCHEMA.
 */
export class ProtocolError extends TargetError {
  readonly kind = 'protocol'

  constructor(message: string, options?: TargetErrorOptions) {
    super(message, options)
    this.name = 'ProtocolError'
  }
}

/**
 * A record that does not conform to its stream's schema.
 */
export class ValidationError extends TargetError {
  readonly kind = 'validation'
  readonly details: string[]

  constructor(message: string, details: string[] = [], options?: TargetErrorOptions) {
    super(message, options)
    this.name = 'ValidationError'
    this.details = details
  }
}

/**
 * Failure inside the sink adapter while ensuring a schema or bulk loading.
 */
export class SinkError extends TargetError {
  readonly kind = 'sink'

  constructor(message: string, options?: TargetErrorOptions) {
    super(message, options)
    this.name = 'SinkError'
  }
}

export function isTargetError(error: unknown): error is TargetError {
  return error instanceof TargetError
}

/**
 * Outcome of one dispatch step.
 */
export type StepResult =
  | { ok: true }
  | { ok: false; error: ProtocolError | ValidationError | SinkError }

export const STEP_OK: StepResult = { ok: true }

export function stepFailed(
  error: ProtocolError | ValidationError | SinkError,
): StepResult {
  return { ok: false, error }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Wrap an adapter failure, keeping errors that are already classified.
 */
export function toSinkError(
  error: unknown,
  action: string,
  stream: string,
): ProtocolError | ValidationError | SinkError {
  if (
    error instanceof ProtocolError ||
    error instanceof ValidationError ||
    error instanceof SinkError
  ) {
    return error
  }
  return new SinkError(`${action} failed for stream ${stream}: ${errorMessage(error)}`, {
    stream,
    cause: error,
  })
}

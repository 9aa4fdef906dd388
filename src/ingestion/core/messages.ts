/**
 * Protocol Messages
 *
 * Turns one input line into a tagged message. Kind-specific fields are
 * checked here, when the message is built, so the dispatcher only ever sees
 * complete messages.
 */

import { z } from 'zod'
import { ProtocolError } from './errors'
import { parseJson } from './json'
import type { MessageType, TargetMessage } from './types'

const MESSAGE_TYPES: readonly MessageType[] = [
  'SCHEMA',
  'RECORD',
  'STATE',
  'ACTIVATE_VERSION',
]

const jsonObject = z.record(z.unknown())

const schemaMessageSchema = z.object({
  stream: z.string({ required_error: "Line is missing required key 'stream'" }),
  schema: jsonObject,
  key_properties: z.array(z.string(), {
    required_error: 'key_properties field is required',
  }),
})

const recordMessageSchema = z.object({
  stream: z.string({ required_error: "Line is missing required key 'stream'" }),
  record: jsonObject,
  version: z.unknown(),
  time_extracted: z.unknown(),
})

const stateMessageSchema = z.object({
  value: z.unknown(),
})

// Informational only: fields of the wrong type are dropped
const activateVersionMessageSchema = z.object({
  stream: z.unknown(),
  version: z.unknown(),
})

export type ParseOutcome =
  | { ok: true; message: TargetMessage }
  | { ok: false; error: ProtocolError }

function isMessageType(value: unknown): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value)
}

function optionalVersion(value: unknown): number | null {
  return typeof value === 'number' && Number.isInteger(value) ? value : null
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ')
}

function invalid(message: string, line: string, cause?: unknown): ParseOutcome {
  return {
    ok: false,
    error: new ProtocolError(`${message}: ${line}`, { cause }),
  }
}

/**
 * Build a message from an already-decoded JSON value.
 */
export function toMessage(raw: unknown, line: string): ParseOutcome {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return invalid('Line is not a JSON object', line)
  }
  if (!('type' in raw)) {
    return invalid("Line is missing required key 'type'", line)
  }

  const type = raw.type
  if (!isMessageType(type)) {
    return invalid(`Unknown message type ${String(type)} in message`, line)
  }

  switch (type) {
    case 'SCHEMA': {
      const result = schemaMessageSchema.safeParse(raw)
      if (!result.success) return invalid(describeIssues(result.error), line)
      return {
        ok: true,
        message: {
          type,
          stream: result.data.stream,
          schema: result.data.schema,
          keyProperties: result.data.key_properties,
        },
      }
    }
    case 'RECORD': {
      const result = recordMessageSchema.safeParse(raw)
      if (!result.success) return invalid(describeIssues(result.error), line)
      return {
        ok: true,
        message: {
          type,
          stream: result.data.stream,
          record: result.data.record,
          version: optionalVersion(result.data.version),
          timeExtracted: optionalString(result.data.time_extracted),
        },
      }
    }
    case 'STATE': {
      const result = stateMessageSchema.safeParse(raw)
      if (!result.success) return invalid(describeIssues(result.error), line)
      return { ok: true, message: { type, value: result.data.value ?? null } }
    }
    case 'ACTIVATE_VERSION': {
      const result = activateVersionMessageSchema.safeParse(raw)
      if (!result.success) return invalid(describeIssues(result.error), line)
      return {
        ok: true,
        message: {
          type,
          stream: optionalString(result.data.stream),
          version: optionalVersion(result.data.version),
        },
      }
    }
  }
}

/**
 * Parse one input line.
 */
export function parseMessage(line: string): ParseOutcome {
  let raw: unknown
  try {
    raw = parseJson(line)
  } catch (error) {
    return invalid('Unable to parse line as JSON', line, error)
  }
  return toMessage(raw, line)
}

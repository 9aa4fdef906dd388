/**
 * Core Types
 *
 * Shared interfaces for the stream loader: protocol messages, stream
 * declarations and the sink adapter contract the batching core consumes.
 */

import type { Readable } from 'node:stream'

// ============================================================================
// JSON values
// ============================================================================

export type JsonObject = Record<string, unknown>

/**
 * A JSON-schema document as received on a SCHEMA message.
 */
export type JsonSchema = JsonObject

/**
 * One data row as received on a RECORD message.
 */
export type StreamRecord = JsonObject

// ============================================================================
// Protocol messages
// ============================================================================

export type MessageType = 'SCHEMA' | 'RECORD' | 'STATE' | 'ACTIVATE_VERSION'

export interface SchemaMessage {
  type: 'SCHEMA'
  stream: string
  schema: JsonSchema
  /** Ordered primary key field names; empty disables dedup */
  keyProperties: string[]
}

export interface RecordMessage {
  type: 'RECORD'
  stream: string
  record: StreamRecord
  /** Table version, when the tap uses versioned full-table syncs */
  version: number | null
  /** ISO timestamp the tap attached, if any */
  timeExtracted: string | null
}

export interface StateMessage {
  type: 'STATE'
  value: unknown
}

export interface ActivateVersionMessage {
  type: 'ACTIVATE_VERSION'
  stream: string | null
  version: number | null
}

export type TargetMessage =
  | SchemaMessage
  | RecordMessage
  | StateMessage
  | ActivateVersionMessage

// ============================================================================
// Streams and sinks
// ============================================================================

/**
 * A stream as last declared by a SCHEMA message.
 */
export interface StreamDeclaration {
  stream: string
  schema: JsonSchema
  keyProperties: readonly string[]
}

/**
 * A sealed staging block handed to the sink for loading.
 */
export interface StagedBlock {
  /** Path of the backing temp file */
  readonly path: string
  /** Bytes written so far */
  readonly byteLength: number
  /** Stream the block's bytes, one serialized record per line */
  createReadStream(): Readable
  /** Whole block as text */
  readText(): Promise<string>
}

/**
 * Sink handle bound to one stream declaration.
 */
export interface StreamSink {
  /**
   * Create or evolve the destination object to match the declaration.
   * Must be idempotent.
   */
  ensureSchema(): Promise<void>

  /**
   * Deterministic key string for a record, or '' when the stream has no key.
   */
  primaryKeyString(record: StreamRecord, keyProperties: readonly string[]): string

  /**
   * One self-contained line (no trailing newline) for the staging block.
   */
  serializeRecord(record: StreamRecord): string

  /**
   * Load every staged row. Upserts on the primary key where one is defined.
   */
  bulkLoad(block: StagedBlock, rowCount: number): Promise<void>
}

/**
 * The relational sink the loader writes into.
 */
export interface SinkAdapter {
  open(declaration: StreamDeclaration): StreamSink
  close(): Promise<void>
}

// ============================================================================
// Run summary
// ============================================================================

export interface StreamLoadStats {
  /** Completed bulk loads */
  flushes: number
  /** Rows handed to successful bulk loads */
  rowsLoaded: number
}

export interface PersistSummary {
  /** Checkpoint outstanding at end of input, if any */
  state: unknown
  /** Lines processed */
  messages: number
  /** RECORD messages staged */
  records: number
  streams: Record<string, StreamLoadStats>
}

/**
 * Checkpoints
 *
 * The latest STATE value is held until the end of input and emitted only
 * after every staged batch has been loaded, so an emitted checkpoint never
 * runs ahead of the rows in the sink.
 */

import type { Writable } from 'node:stream'
import { createLogger } from '@/utils/logger'
import { stringifyJson } from './json'

const log = createLogger('protocol')

/**
 * Last-write-wins holder for the outstanding checkpoint.
 */
export class PendingCheckpoint {
  private value: unknown = null

  set(value: unknown): void {
    this.value = value
  }

  get(): unknown {
    return this.value
  }
}

export class CheckpointEmitter {
  private readonly output: Writable

  constructor(output: Writable = process.stdout) {
    this.output = output
  }

  /**
   * Write the checkpoint as one JSON line. Resolves once the line has been
   * handed to the output. Empty checkpoints are not written.
   */
  async emit(value: unknown): Promise<boolean> {
    if (value === null || value === undefined) return false

    const line = stringifyJson(value)
    log.debug('Emitting state', { state: line })

    await new Promise<void>((resolve, reject) => {
      this.output.write(`${line}\n`, (error) => {
        if (error) reject(error)
        else resolve()
      })
    })

    return true
  }
}

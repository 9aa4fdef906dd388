/**
 * ID Generation Utilities
 *
 * Time-sortable, prefixed IDs for runs and scratch tables.
 * Lower-case base36 so the IDs are usable as unquoted SQL identifiers.
 *
 * Example: `run_0sl9x2k4mq7c1v8e3hfd1`
 */

import { webcrypto } from 'node:crypto'

const BASE36_ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz'

/**
 * Encode a Unix timestamp (seconds) as a 7-character base36 string.
 * Range: 0 to ~78 billion seconds, so the output stays sortable.
 */
export function encodeTimestampBase36(timestampSeconds: number): string {
  return Math.floor(timestampSeconds).toString(36).padStart(7, '0')
}

/**
 * Random base36 string of the given length.
 * Bytes >= 252 are rejected so every character is equally likely.
 */
export function generateRandomId(length = 14): string {
  let result = ''
  const bytes = new Uint8Array(length * 2)

  while (result.length < length) {
    webcrypto.getRandomValues(bytes)
    for (const byte of bytes) {
      if (byte >= 252) continue
      result += BASE36_ALPHABET[byte % 36]
      if (result.length === length) break
    }
  }

  return result
}

/**
 * Generate a prefixed, time-sortable ID like `run_0sl9x2k4mq7c1v8e3hfd1`.
 */
export function generatePrefixedId(prefix: string, randomLength = 14): string {
  const timestamp = encodeTimestampBase36(Date.now() / 1000)
  return `${prefix}_${timestamp}${generateRandomId(randomLength)}`
}

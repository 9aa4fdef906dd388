/**
 * Lossless JSON
 *
 * Input lines are decoded without rounding: numbers a double cannot hold
 * exactly (integers past 2^53, decimals with too many significant digits)
 * stay as LosslessNumber, carrying their original text.
 */

import {
  LosslessNumber,
  isLosslessNumber,
  isSafeNumber,
  parse,
  stringify,
} from 'lossless-json'

export type JsonNumber = number | LosslessNumber

function parseNumber(text: string): JsonNumber {
  return isSafeNumber(text) ? Number(text) : new LosslessNumber(text)
}

/**
 * @throws SyntaxError for malformed JSON
 */
export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber)
}

/**
 * Serialize, writing lossless numbers with their original digits.
 */
export function stringifyJson(value: unknown): string {
  const text = stringify(value)
  if (text === undefined) {
    throw new TypeError(`Value of type ${typeof value} cannot be written as JSON`)
  }
  return text
}

/**
 * Exact decimal text of a JSON number; undefined for anything else.
 */
export function numberText(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value)
  if (isLosslessNumber(value)) return value.value
  return undefined
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Deep copy with every lossless number turned into a plain number.
 */
export function toPlainNumbers(value: unknown): unknown {
  if (isLosslessNumber(value)) return Number(value.value)
  if (Array.isArray(value)) return value.map((item) => toPlainNumbers(item))
  if (!isPlainObject(value)) return value

  const copy: Record<string, unknown> = {}
  for (const [key, item] of Object.entries(value)) {
    copy[key] = toPlainNumbers(item)
  }
  return copy
}

/**
 * Exact text of the numbers rounded by {@link toNumericView}, keyed by
 * their container in the view and their key or index in it.
 */
export type ExactNumbers = WeakMap<object, Map<string | number, string>>

/**
 * Copy of `value` that schema validators can read: lossless numbers become
 * plain numbers, and their exact text is kept in the returned map.
 */
export function toNumericView(value: unknown): { view: unknown; exact: ExactNumbers } {
  const exact: ExactNumbers = new WeakMap()

  const remember = (container: object, key: string | number, text: string): void => {
    let entries = exact.get(container)
    if (!entries) {
      entries = new Map()
      exact.set(container, entries)
    }
    entries.set(key, text)
  }

  const copy = (item: unknown): unknown => {
    if (Array.isArray(item)) {
      const list: unknown[] = []
      item.forEach((entry, index) => {
        if (isLosslessNumber(entry)) remember(list, index, entry.value)
        list.push(copy(entry))
      })
      return list
    }
    if (isLosslessNumber(item)) return Number(item.value)
    if (!isPlainObject(item)) return item

    const object: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(item)) {
      if (isLosslessNumber(entry)) remember(object, key, entry.value)
      object[key] = copy(entry)
    }
    return object
  }

  return { view: copy(value), exact }
}

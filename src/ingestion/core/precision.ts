/**
 * Numeric Precision
 *
 * Each pipeline owns a DecimalContext: a private decimal.js constructor whose
 * precision only ever grows. SCHEMA messages raise it so that numbers bounded
 * by `multipleOf` / `minimum` / `maximum` keep every significant digit while
 * their records are validated.
 */

import Decimal from 'decimal.js'
import { createLogger } from '@/utils/logger'
import { numberText } from './json'
import type { JsonObject } from './types'

const log = createLogger('protocol')

/** Significant digits a fresh context starts with */
export const DEFAULT_DECIMAL_PRECISION = 28

export class DecimalContext {
  readonly Decimal: Decimal.Constructor

  constructor(precision: number = DEFAULT_DECIMAL_PRECISION) {
    this.Decimal = Decimal.clone({ precision })
  }

  get precision(): number {
    return this.Decimal.precision
  }

  /**
   * Raise precision to at least `precision`. Never lowers it.
   * @returns true when the precision changed
   */
  raise(precision: number): boolean {
    if (precision <= this.Decimal.precision) return false
    this.Decimal.set({ precision })
    return true
  }

  /**
   * Exact decimal for a JSON number: a plain number by its shortest
   * round-trip text, a string as written.
   */
  toDecimal(value: number | string): Decimal {
    return new this.Decimal(typeof value === 'number' ? String(value) : value)
  }
}

// ============================================================================
// Schema scan
// ============================================================================

export interface NumericPrecision {
  scale: number
  digits: number
  precision: number
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function declaresNumber(type: unknown): boolean {
  if (type === 'number') return true
  return Array.isArray(type) && type.includes('number')
}

/**
 * True for schema nodes typed `number` that bound their values.
 */
export function hasNumericConstraints(node: JsonObject): boolean {
  if (!declaresNumber(node.type)) return false
  return 'multipleOf' in node || 'minimum' in node || 'maximum' in node
}

/**
 * Order of magnitude of |value|: floor(log10) below 1, ceil(log10) from 1 up.
 * Computed on the decimal digits, so powers of ten come out exact.
 */
export function orderOfMagnitude(
  context: DecimalContext,
  value: number | string,
): number {
  const magnitude = context.toDecimal(value).abs()
  if (magnitude.isZero()) return 0

  // decimal.js keeps the exponent as floor(log10(|x|))
  const exponent = magnitude.e
  if (exponent < 0) return exponent

  const isPowerOfTen = magnitude.toExponential().startsWith('1e')
  return isPowerOfTen ? exponent : exponent + 1
}

function numericKeyword(node: JsonObject, key: string): string {
  return numberText(node[key]) ?? '1'
}

/**
 * Precision a constrained numeric schema node needs.
 */
export function requiredPrecision(
  context: DecimalContext,
  node: JsonObject,
): NumericPrecision {
  // 0 - x rather than -x, so a whole-number step gives 0 and not -0
  const scale = 0 - orderOfMagnitude(context, numericKeyword(node, 'multipleOf'))
  const digits = Math.max(
    orderOfMagnitude(context, numericKeyword(node, 'minimum')),
    orderOfMagnitude(context, numericKeyword(node, 'maximum')),
  )
  return { scale, digits, precision: digits + scale }
}

/**
 * Walk a schema and raise the context's precision for every constrained
 * numeric field found.
 *
 * @returns the context precision after the walk
 */
export function calibrateNumericPrecision(
  schema: unknown,
  context: DecimalContext,
): number {
  if (Array.isArray(schema)) {
    for (const item of schema) {
      calibrateNumericPrecision(item, context)
    }
  } else if (isObject(schema)) {
    if (hasNumericConstraints(schema)) {
      const { precision } = requiredPrecision(context, schema)
      if (context.raise(precision)) {
        log.debug('Raised decimal precision', { precision })
      }
    } else {
      for (const value of Object.values(schema)) {
        calibrateNumericPrecision(value, context)
      }
    }
  }

  return context.precision
}

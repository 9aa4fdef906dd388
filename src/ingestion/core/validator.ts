/**
 * Record Validator
 *
 * Compiles a stream's JSON schema (draft-04 semantics, formats enforced).
 * Numeric bounds are not left to binary floating point: they are lifted out
 * of the schema into a `decimalBounds` keyword that compares exact decimals
 * under the pipeline's DecimalContext. Records are validated through a
 * numeric view (see json.ts); the keyword reads the exact digits of numbers
 * the view had to round.
 */

import Ajv04 from 'ajv-draft-04'
import addFormats from 'ajv-formats'
import type { ErrorObject } from 'ajv'
import { isLosslessNumber } from 'lossless-json'
import {
  numberText,
  toNumericView,
  toPlainNumbers,
  type ExactNumbers,
} from './json'
import type { DecimalContext } from './precision'
import type { JsonObject, JsonSchema } from './types'

export const DECIMAL_KEYWORD = 'decimalBounds'

/**
 * Numeric bounds as exact decimal strings.
 */
export interface DecimalBounds {
  multipleOf?: string
  minimum?: string
  maximum?: string
  exclusiveMinimum?: string
  exclusiveMaximum?: string
}

export interface ValidationOutcome {
  valid: boolean
  errors: string[]
}

export type RecordValidator = (record: unknown) => ValidationOutcome

/** Keywords whose value is a map of name -> subschema */
const SCHEMA_MAP_KEYWORDS = new Set([
  'properties',
  'patternProperties',
  'definitions',
  'dependencies',
])

/** Keywords whose value is a subschema or a list of subschemas */
const SUBSCHEMA_KEYWORDS = new Set([
  'additionalProperties',
  'additionalItems',
  'items',
  'not',
  'anyOf',
  'allOf',
  'oneOf',
])

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Pull the numeric bound keywords out of one schema node.
 * Handles both the draft-04 boolean form of exclusiveMinimum/Maximum and
 * the later numeric form.
 */
function extractBounds(node: JsonObject): DecimalBounds | null {
  const bounds: DecimalBounds = {}

  const multipleOf = numberText(node.multipleOf)
  if (multipleOf !== undefined) bounds.multipleOf = multipleOf

  const minimum = numberText(node.minimum)
  if (minimum !== undefined) {
    if (node.exclusiveMinimum === true) bounds.exclusiveMinimum = minimum
    else bounds.minimum = minimum
  }
  const maximum = numberText(node.maximum)
  if (maximum !== undefined) {
    if (node.exclusiveMaximum === true) bounds.exclusiveMaximum = maximum
    else bounds.maximum = maximum
  }

  const exclusiveMinimum = numberText(node.exclusiveMinimum)
  if (exclusiveMinimum !== undefined) bounds.exclusiveMinimum = exclusiveMinimum
  const exclusiveMaximum = numberText(node.exclusiveMaximum)
  if (exclusiveMaximum !== undefined) bounds.exclusiveMaximum = exclusiveMaximum

  return Object.keys(bounds).length > 0 ? bounds : null
}

const BOUND_KEYWORDS = [
  'multipleOf',
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
]

function liftValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => liftValue(item))
  }
  if (!isObject(value) || isLosslessNumber(value)) return toPlainNumbers(value)
  return liftDecimalBounds(value)
}

/**
 * Copy of `schema` with numeric bounds moved into the decimal keyword.
 * Any other lossless number in the schema becomes a plain number.
 */
export function liftDecimalBounds(schema: JsonObject): JsonObject {
  const lifted: JsonObject = {}
  const bounds = extractBounds(schema)

  for (const [key, value] of Object.entries(schema)) {
    if (bounds && BOUND_KEYWORDS.includes(key)) continue

    if (SCHEMA_MAP_KEYWORDS.has(key) && isObject(value)) {
      const mapped: JsonObject = {}
      for (const [name, subschema] of Object.entries(value)) {
        mapped[name] = liftValue(subschema)
      }
      lifted[key] = mapped
    } else if (SUBSCHEMA_KEYWORDS.has(key)) {
      lifted[key] = liftValue(value)
    } else {
      lifted[key] = toPlainNumbers(value)
    }
  }

  if (bounds) {
    lifted[DECIMAL_KEYWORD] = bounds
  }
  return lifted
}

/**
 * Check one number against exact decimal bounds.
 */
export function satisfiesDecimalBounds(
  context: DecimalContext,
  bounds: DecimalBounds,
  data: number | string,
): boolean {
  const D = context.Decimal
  const value = context.toDecimal(data)

  if (bounds.minimum !== undefined && value.lessThan(new D(bounds.minimum))) {
    return false
  }
  if (bounds.maximum !== undefined && value.greaterThan(new D(bounds.maximum))) {
    return false
  }
  if (
    bounds.exclusiveMinimum !== undefined &&
    value.lessThanOrEqualTo(new D(bounds.exclusiveMinimum))
  ) {
    return false
  }
  if (
    bounds.exclusiveMaximum !== undefined &&
    value.greaterThanOrEqualTo(new D(bounds.exclusiveMaximum))
  ) {
    return false
  }
  if (bounds.multipleOf !== undefined) {
    const step = new D(bounds.multipleOf)
    if (step.isZero() || !value.mod(step).isZero()) return false
  }

  return true
}

function isDecimalBounds(value: unknown): value is DecimalBounds {
  return (
    isObject(value) &&
    Object.values(value).every((bound) => typeof bound === 'string')
  )
}

/** Where Ajv found the number it is checking */
interface NumberLocation {
  parentData?: unknown
  parentDataProperty?: string | number
}

function exactText(
  exact: ExactNumbers,
  data: number,
  location: NumberLocation | undefined,
): number | string {
  const { parentData, parentDataProperty } = location ?? {}
  if (typeof parentData !== 'object' || parentData === null) return data
  if (parentDataProperty === undefined) return data
  return exact.get(parentData)?.get(parentDataProperty) ?? data
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) return []
  return errors.map((error) => {
    const path = error.instancePath || '(root)'
    if (error.keyword === DECIMAL_KEYWORD) {
      return `${path} is outside its numeric bounds`
    }
    return `${path} ${error.message ?? 'is invalid'}`
  })
}

/**
 * Compile a validator for one stream schema.
 * A fresh Ajv instance per schema keeps a re-declared `$id` from clashing.
 */
export function compileRecordValidator(
  schema: JsonSchema,
  context: DecimalContext,
): RecordValidator {
  const ajv = new Ajv04({
    allErrors: true,
    strict: false,
    validateSchema: false,
  })
  addFormats(ajv)

  // Exact digits of the record being validated
  let exact: ExactNumbers = new WeakMap()

  ajv.addKeyword({
    keyword: DECIMAL_KEYWORD,
    type: 'number',
    schemaType: 'object',
    errors: false,
    validate: (
      bounds: unknown,
      data: unknown,
      _parentSchema: unknown,
      location?: NumberLocation,
    ) =>
      typeof data === 'number' &&
      isDecimalBounds(bounds) &&
      satisfiesDecimalBounds(context, bounds, exactText(exact, data, location)),
  })

  const validate = ajv.compile(liftDecimalBounds(schema))

  return (record: unknown) => {
    const numeric = toNumericView(record)
    exact = numeric.exact
    const valid = validate(numeric.view)
    return { valid, errors: valid ? [] : formatErrors(validate.errors) }
  }
}

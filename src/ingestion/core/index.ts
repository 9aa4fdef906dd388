/**
 * Loader Core
 *
 * Re-exports the batching engine and its types.
 */

export * from './buffer'
export * from './checkpoint'
export * from './dispatcher'
export * from './errors'
export * from './json'
export * from './messages'
export * from './pipeline'
export * from './precision'
export * from './registry'
export * from './staging'
export * from './types'
export * from './validator'

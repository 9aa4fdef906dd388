import { AsyncLocalStorage } from 'node:async_hooks'
import { generatePrefixedId } from './id'

interface RunContext {
  runId: string
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>()

/**
 * Run a function with a run context.
 * Every log entry written inside `fn` carries the run ID.
 */
export function runWithContext<T>(
  runId: string,
  fn: () => T | Promise<T>,
): T | Promise<T> {
  return asyncLocalStorage.run({ runId }, fn)
}

/**
 * Start a new run with a freshly generated ID.
 */
export function runWithNewContext<T>(fn: () => T | Promise<T>): T | Promise<T> {
  return runWithContext(generatePrefixedId('run'), fn)
}

export function getRunId(): string | undefined {
  return asyncLocalStorage.getStore()?.runId
}

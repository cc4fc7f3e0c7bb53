/**
 * Store call wrapper
 *
 * Every store call made by the engine goes through `callStore`, which hands
 * the caller's signal to the store, stops waiting once it fires, and turns the
 * abort into a cancellation or deadline error.
 */

import { type WorkName, type WorkStoreOptions, raceAbort } from '@workbridge/core'
import { type WorkOperation, WorkCancelledError, WorkDeadlineExceededError } from '../errors'

/**
 * Options accepted by engine operations.
 */
export interface WorkCallOptions {
  /**
   * Cancels the whole operation. Use `AbortSignal.timeout(ms)` for a deadline.
   */
  signal?: AbortSignal
}

export async function callStore<T>(
  operation: WorkOperation,
  name: WorkName,
  signal: AbortSignal | undefined,
  run: (options: WorkStoreOptions) => Promise<T>,
): Promise<T> {
  try {
    return await raceAbort(signal, () => run({ signal }))
  } catch (err) {
    if (signal?.aborted) {
      throw abortError(operation, name, signal.reason)
    }
    throw err
  }
}

/**
 * Errors raised by `callStore` when the caller's signal fired.
 */
export function isAbortError(err: unknown): err is WorkCancelledError | WorkDeadlineExceededError {
  return err instanceof WorkCancelledError || err instanceof WorkDeadlineExceededError
}

function abortError(operation: WorkOperation, name: WorkName, reason: unknown): Error {
  if (isTimeoutReason(reason)) {
    return new WorkDeadlineExceededError(operation, name, reason)
  }
  return new WorkCancelledError(operation, name, reason)
}

function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'name' in reason &&
    reason.name === 'TimeoutError'
  )
}

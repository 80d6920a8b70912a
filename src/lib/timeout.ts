/**
 * Timeout utilities for async operations
 *
 * Keeps one slow merge from holding up the rest of the plan.
 */

import { TimeoutError } from './errors.js'

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds; 0 or less disables it
 * @param operation - Operation name for the error message
 * @param controller - Aborted when the timeout fires, so the work can stop before persisting
 *
 * @example
 * ```ts
 * const controller = new AbortController()
 * const result = await withTimeout(
 *   mergeHistories(store, operation, { signal: controller.signal }),
 *   60000,
 *   operation.id,
 *   controller
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  controller?: AbortController
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise
  }

  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs)
      controller?.abort(error)
      reject(error)
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}

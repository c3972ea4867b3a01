/**
 * Timeout utilities for async operations
 *
 * Prevents remote calls from hanging a run when an instance is slow or unresponsive.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number

  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Wrap a promise with a timeout
 *
 * @param promise - The promise to wrap
 * @param timeoutMs - Timeout in milliseconds
 * @param operation - Operation name for error message
 * @returns Promise that rejects if timeout is reached
 *
 * @example
 * ```ts
 * const res = await withTimeout(
 *   fetch(`${url}/api/v1/settings`),
 *   30000,
 *   'GET /api/v1/settings'
 * )
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}

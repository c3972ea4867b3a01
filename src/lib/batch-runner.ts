/**
 * Batch Runner
 *
 * Execute one operation over a list of items with bounded concurrency.
 * Results come back in input order regardless of completion order.
 */

import pLimit from 'p-limit'

export interface BatchOperation<TItem, TResult> {
  item: TItem
  result?: TResult
  error?: Error
  /** Not started because the signal was aborted */
  skipped: boolean
  duration: number
}

export interface BatchResult<TItem, TResult> {
  total: number
  successful: number
  failed: number
  skipped: number
  operations: BatchOperation<TItem, TResult>[]
}

export type OperationFn<TItem, TResult> = (item: TItem, index: number) => Promise<TResult>

export interface BatchOptions {
  /** Maximum operations in flight (1 = strictly sequential) */
  concurrency?: number
  /** Aborting skips operations that have not started yet */
  signal?: AbortSignal
  now?: () => number
}

/**
 * Run an operation across multiple items
 */
export async function runBatch<TItem, TResult>(
  items: readonly TItem[],
  operation: OperationFn<TItem, TResult>,
  options: BatchOptions = {}
): Promise<BatchResult<TItem, TResult>> {
  const {
    concurrency = 1,
    signal,
    now = Date.now
  } = options

  const operations: BatchOperation<TItem, TResult>[] = items.map(item => ({
    item,
    skipped: true,
    duration: 0
  }))

  const runOperation = async (index: number): Promise<void> => {
    if (signal?.aborted) {
      return
    }

    const entry = operations[index]
    entry.skipped = false
    const startTime = now()

    try {
      entry.result = await operation(entry.item, index)
    } catch (err) {
      entry.error = err instanceof Error ? err : new Error(String(err))
    } finally {
      entry.duration = now() - startTime
    }
  }

  if (concurrency <= 1) {
    for (let i = 0; i < items.length; i++) {
      await runOperation(i)
    }
  } else {
    const limit = pLimit(concurrency)
    await Promise.all(items.map((_, index) => limit(() => runOperation(index))))
  }

  const skipped = operations.filter(op => op.skipped).length
  const failed = operations.filter(op => op.error !== undefined).length

  return {
    total: items.length,
    successful: items.length - skipped - failed,
    failed,
    skipped,
    operations
  }
}

/**
 * Batch Runner
 *
 * Runs keyed work items through a bounded worker pool. An item starts only
 * after every item it depends on has succeeded; items whose prerequisites
 * failed are reported as blocked and never started.
 */

import pLimit from 'p-limit'

export type BatchOutcome = 'succeeded' | 'failed' | 'blocked' | 'not-started'

export interface BatchOperation<TItem, TResult> {
  item: TItem
  key: string
  outcome: BatchOutcome
  result?: TResult
  error?: Error
  /** Keys of failed or blocked prerequisites */
  blockedBy?: string[]
  duration: number
}

export interface BatchResult<TItem, TResult> {
  total: number
  successful: number
  failed: number
  blocked: number
  notStarted: number
  /** True when the signal aborted before every item started */
  cancelled: boolean
  /** In input order */
  operations: BatchOperation<TItem, TResult>[]
}

export type OperationFn<TItem, TResult> = (item: TItem) => Promise<TResult>

export interface RunBatchOptions<TItem, TResult> {
  key: (item: TItem) => string
  /** Keys this item waits for; every key must appear earlier in the input */
  dependsOn?: (item: TItem) => readonly string[]
  concurrency?: number
  /** Launch nothing new once any item has failed */
  stopOnError?: boolean
  signal?: AbortSignal
  onStart?: (item: TItem, started: number, total: number) => void
  onSettled?: (operation: BatchOperation<TItem, TResult>) => void
}

/**
 * Run an operation across all items
 */
export async function runBatch<TItem, TResult>(
  items: readonly TItem[],
  operation: OperationFn<TItem, TResult>,
  options: RunBatchOptions<TItem, TResult>
): Promise<BatchResult<TItem, TResult>> {
  const {
    key,
    dependsOn = () => [],
    concurrency = 1,
    stopOnError = false,
    signal,
    onStart,
    onSettled
  } = options

  const limit = pLimit(Math.max(1, Math.floor(concurrency)))
  const settled = new Map<string, Promise<BatchOperation<TItem, TResult>>>()
  let started = 0
  let hasError = false

  const runOne = async (item: TItem, itemKey: string): Promise<BatchOperation<TItem, TResult>> => {
    const prerequisites = await Promise.all(
      dependsOn(item).map(dep => {
        const pending = settled.get(dep)
        if (!pending) {
          throw new Error(`"${itemKey}" depends on "${dep}", which is not scheduled before it`)
        }
        return pending
      })
    )

    const blockedBy = prerequisites
      .filter(p => p.outcome !== 'succeeded')
      .map(p => p.key)
    if (blockedBy.length > 0) {
      return { item, key: itemKey, outcome: 'blocked', blockedBy, duration: 0 }
    }

    return limit(async (): Promise<BatchOperation<TItem, TResult>> => {
      if ((stopOnError && hasError) || signal?.aborted) {
        return { item, key: itemKey, outcome: 'not-started', duration: 0 }
      }

      started++
      onStart?.(item, started, items.length)
      const startTime = Date.now()

      try {
        const result = await operation(item)
        return { item, key: itemKey, outcome: 'succeeded', result, duration: Date.now() - startTime }
      } catch (err) {
        hasError = true
        return {
          item,
          key: itemKey,
          outcome: 'failed',
          error: err instanceof Error ? err : new Error(String(err)),
          duration: Date.now() - startTime
        }
      }
    })
  }

  for (const item of items) {
    const itemKey = key(item)
    if (settled.has(itemKey)) {
      throw new Error(`Duplicate batch key: ${itemKey}`)
    }
    const pending = runOne(item, itemKey).then(op => {
      onSettled?.(op)
      return op
    })
    settled.set(itemKey, pending)
  }

  const operations = await Promise.all(settled.values())
  const count = (outcome: BatchOutcome) => operations.filter(op => op.outcome === outcome).length

  return {
    total: items.length,
    successful: count('succeeded'),
    failed: count('failed'),
    blocked: count('blocked'),
    notStarted: count('not-started'),
    cancelled: signal?.aborted === true && count('not-started') > 0,
    operations
  }
}

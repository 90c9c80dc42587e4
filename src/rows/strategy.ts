/**
 * Execution strategies for row batches
 *
 * Rows with media spend most of their time in codecs and storage writes,
 * which run off the main thread (libuv's pool, child processes, I/O), so
 * those batches run several rows at once. Everything else is plain object
 * traversal and runs row after row.
 *
 * @module rows/strategy
 */

import { DEFAULT_CONCURRENCY } from '../constants'
import { MEDIA_FEATURE_TYPES, type FeatureTypeName, type Features } from '../types/features'
import { featuresContain } from '../features/classify'

export type ExecutionStrategy =
  | { kind: 'sequential' }
  | { kind: 'pooled'; concurrency: number }

/**
 * Feature types whose encoding is worth overlapping across rows
 *
 * Videos are stored as-is, without decoding, so they do not count.
 */
export const POOLED_FEATURE_TYPES: readonly FeatureTypeName[] = MEDIA_FEATURE_TYPES.filter(
  type => type !== 'Video'
)

/**
 * Pick the strategy for a batch from its schema alone
 */
export function selectExecutionStrategy(
  features: Features,
  concurrency: number = DEFAULT_CONCURRENCY
): ExecutionStrategy {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`)
  }
  return featuresContain(features, POOLED_FEATURE_TYPES)
    ? { kind: 'pooled', concurrency }
    : { kind: 'sequential' }
}

/**
 * Map items through an async function under a strategy
 *
 * Results are in input order. The first rejection rejects the whole map and
 * no new item is started after it; items already running are left to finish.
 */
export async function mapWithStrategy<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  strategy: ExecutionStrategy
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length)

  if (strategy.kind === 'sequential') {
    for (const [index, item] of items.entries()) {
      results[index] = await fn(item, index)
    }
    return results
  }

  // Workers share one iterator, so each item is taken exactly once
  const entries = items.entries()
  let failed = false
  const worker = async (): Promise<void> => {
    for (const [index, item] of entries) {
      if (failed) {
        return
      }
      try {
        results[index] = await fn(item, index)
      } catch (error: unknown) {
        failed = true
        throw error
      }
    }
  }

  const workers = Math.min(strategy.concurrency, items.length)
  await Promise.all(Array.from({ length: workers }, worker))
  return results
}

/**
 * Bounded worker pool over an array.
 */

import pLimit from 'p-limit'

export function assertPoolSize(concurrency: number): void {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Worker pool size must be a positive integer, got ${concurrency}`)
  }
}

/**
 * Run `mapper` over `values` with at most `concurrency` calls in flight.
 * Results come back in input order; completion order is unspecified.
 * A rejected mapper call rejects the whole map, so mappers that must not
 * abort the batch handle their own errors.
 */
export async function mapWithConcurrency<T, R>(
  values: readonly T[],
  concurrency: number,
  mapper: (value: T, index: number) => Promise<R>
): Promise<R[]> {
  assertPoolSize(concurrency)

  const limit = pLimit(concurrency)
  return Promise.all(values.map((value, index) => limit(() => mapper(value, index))))
}

/**
 * Bounded parallel mapping
 */

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep the input order. The first rejection rejects the whole call.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  const limit = Math.max(1, Math.min(concurrency, items.length))
  let next = 0

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      const item = items[index]
      if (item === undefined) continue
      results[index] = await fn(item, index)
    }
  }

  const workers: Promise<void>[] = []
  for (let i = 0; i < limit; i++) {
    workers.push(worker())
  }
  await Promise.all(workers)
  return results
}

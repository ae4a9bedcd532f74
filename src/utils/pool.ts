/**
 * Bounded worker pool
 *
 * Each item is claimed by exactly one worker through a shared cursor; the
 * claim happens synchronously, so two workers never take the same index.
 * Results keep input order.
 */

export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  if (items.length === 0) return results

  const limit = Math.max(1, Math.floor(concurrency))
  let cursor = 0

  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (cursor < items.length) {
      const current = cursor
      cursor += 1
      results[current] = await mapper(items[current], current)
    }
  })

  await Promise.all(workers)
  return results
}

/**
 * Run `task` over `items` with at most `concurrency` tasks in flight.
 *
 * A fixed group of workers pulls items off a shared queue. Each result
 * lands in the slot matching its item's index, so the output order is the
 * input order no matter which task finishes first. Once `signal` aborts, workers stop taking new items and
 * the slots of items never started stay undefined.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined)
  let next = 0

  const workerCount = Math.max(1, Math.min(Math.floor(concurrency), items.length))

  const workers = Array(workerCount)
    .fill(null)
    .map(async () => {
      while (next < items.length) {
        if (signal?.aborted) break
        const index = next++
        results[index] = await task(items[index], index)
      }
    })

  await Promise.all(workers)

  return results
}

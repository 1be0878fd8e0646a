/**
 * Concurrency helpers
 */

/**
 * Run tasks with limited concurrency (worker pool pattern). Results keep the
 * order of `items`, whatever order the tasks finish in.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: Array<{ index: number; value: R }> = [];
  const queue = items.map((item, index) => ({ item, index }));

  async function processNext(): Promise<void> {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      results.push({ index: next.index, value: await fn(next.item, next.index) });
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(Math.max(1, concurrency), items.length); i++) {
    workers.push(processNext());
  }
  await Promise.all(workers);

  return results.sort((a, b) => a.index - b.index).map((result) => result.value);
}

/**
 * Run tasks in chunks of `concurrency`, waiting for each chunk to settle
 * before starting the next. Results keep the input order.
 */
export async function settleInChunks<T, R>(
  items: T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const size = Math.max(1, Math.floor(concurrency));
  const results: PromiseSettledResult<R>[] = [];

  for (let i = 0; i < items.length; i += size) {
    const chunk = items.slice(i, i + size);
    const settled = await Promise.allSettled(chunk.map((item, j) => task(item, i + j)));
    results.push(...settled);
  }

  return results;
}

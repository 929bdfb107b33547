/**
 * Fleetwire Runtime Host: Bounded Concurrency
 *
 * Runs a worker over a list with at most `limit` workers in flight. Every
 * item is attempted; one rejection never cancels the others. Results come
 * back in input order as settled outcomes.
 */

export async function runBounded<T, R>(
  items: ReadonlyArray<T>,
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<Array<PromiseSettledResult<R>>> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${String(limit)}`);
  }

  const results = new Array<PromiseSettledResult<R>>(items.length);
  // One iterator shared by every lane: each lane pulls the next unclaimed item.
  const queue = items.entries();

  const lane = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (reason: unknown) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, lane));
  return results;
}

/**
 * Bounded-concurrency mapping over independent jobs
 */

/**
 * Run `worker` over every item with at most `limit` jobs in flight.
 * Results keep the input order; a rejected job never stops the others.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  const width = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  const queue = items.map((item, index) => ({ item, index }));

  async function drain(): Promise<void> {
    for (let job = queue.shift(); job; job = queue.shift()) {
      try {
        results[job.index] = { status: "fulfilled", value: await worker(job.item, job.index) };
      } catch (reason) {
        results[job.index] = { status: "rejected", reason };
      }
    }
  }

  await Promise.all(Array.from({ length: width }, () => drain()));
  return results;
}

export function describeRejection(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

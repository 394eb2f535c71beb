/**
 * Runs `task` over `items` with at most `concurrency` in flight. Results come back in input
 * order regardless of completion order. A rejected task rejects the whole run, so callers that
 * need per-item failures should catch inside `task`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Map<number, R>();
  const queue = items.map((item, index) => ({ item, index }));

  async function worker(): Promise<void> {
    while (queue.length > 0) {
      const next = queue.shift();
      if (next) {
        results.set(next.index, await task(next.item, next.index));
      }
    }
  }

  // Non-finite limits fall back to a single worker
  const limit = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(limit, items.length); i++) {
    workers.push(worker());
  }

  await Promise.all(workers);

  // Completion order is arbitrary; re-sort into input order
  return [...results.entries()].sort(([a], [b]) => a - b).map(([, result]) => result);
}

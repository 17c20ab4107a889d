// =============================================================================
// TYPES
// =============================================================================

export type SettledTask<T, R> =
  | { item: T; status: "fulfilled"; value: R }
  | { item: T; status: "rejected"; reason: unknown };

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Run `worker` over `items` with at most `limit` in flight. Resolves only after
 * every task has settled; results keep the order of `items`.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<SettledTask<T, R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Concurrency limit must be a positive integer (received ${limit}).`);
  }

  const results = new Array<SettledTask<T, R>>(items.length);
  let cursor = 0;

  const runNext = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      const item = items[index];
      try {
        results[index] = { item, status: "fulfilled", value: await worker(item, index) };
      } catch (reason) {
        results[index] = { item, status: "rejected", reason };
      }
    }
  };

  const poolSize = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: poolSize }, () => runNext()));

  return results;
}

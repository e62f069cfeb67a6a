/**
 * Maps items through an async worker with at most `limit` calls in flight.
 * Results keep input order. After the first failure no new items are
 * started; once the items already in flight settle, the returned promise
 * rejects with that first failure.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;
  let failure: { error: unknown } | null = null;

  const runWorker = async (): Promise<void> => {
    while (failure === null && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  if (failure !== null) {
    throw failure.error;
  }
  return results;
}

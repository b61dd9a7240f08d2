/**
 * Bounded worker pool.
 *
 * Runs `worker` over `items` with at most `concurrency` in flight. Workers stop
 * taking new items once `signal` aborts or `shouldStop()` returns true; items
 * already started run to completion. Results are returned in input order,
 * with `undefined` for items that were never started.
 */
export async function mapPool<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>,
    options: { signal?: AbortSignal; shouldStop?: () => boolean } = {}
): Promise<Array<R | undefined>> {
    const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
    const limit = Math.max(1, Math.min(concurrency, items.length));
    let next = 0;

    const stopped = (): boolean => (options.signal?.aborted ?? false) || (options.shouldStop?.() ?? false);

    const runWorker = async (): Promise<void> => {
        while (next < items.length && !stopped()) {
            const index = next++;
            const item = items[index];
            if (item === undefined) continue;
            results[index] = await worker(item, index);
        }
    };

    await Promise.all(Array.from({ length: limit }, () => runWorker()));
    return results;
}

export function createBatches<T>(items: readonly T[], batchSize: number): T[][] {
    const batches: T[][] = [];
    for (let i = 0; i < items.length; i += batchSize) {
        batches.push(items.slice(i, i + batchSize));
    }
    return batches;
}

/**
 * Runs `task` over every item with at most `workers` in flight, one batch at
 * a time. Results keep the input order regardless of completion order; the
 * first rejection, or an abort of `signal`, stops later batches from starting.
 */
export async function mapWithWorkers<T, R>(
    items: readonly T[],
    workers: number,
    task: (item: T, index: number) => Promise<R>,
    signal?: AbortSignal
): Promise<R[]> {
    const size = Math.max(1, Math.floor(workers));
    const results: R[] = [];

    for (const [batchIndex, batch] of createBatches(items, size).entries()) {
        signal?.throwIfAborted();
        const offset = batchIndex * size;
        const scored = await Promise.all(batch.map((item, i) => task(item, offset + i)));
        results.push(...scored);
    }
    signal?.throwIfAborted();

    return results;
}

import os from 'os';

export function defaultConcurrency(): number {
    return Math.max(1, os.availableParallelism());
}

/**
 * Map over `items` with at most `limit` callbacks in flight. Results keep input order.
 * After the first failure no further items are started; the call rejects with
 * that error once every callback already running has settled.
 */
export async function mapWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
    const results = new Array<R>(items.length);
    let next = 0;
    const state: { failure?: { error: unknown } } = {};

    const worker = async () => {
        while (state.failure === undefined && next < items.length) {
            const index = next++;
            try {
                results[index] = await fn(items[index], index);
            } catch (error) {
                state.failure ??= { error };
                throw error;
            }
        }
    };

    const size = Math.max(1, Math.min(limit, items.length));
    await Promise.allSettled(Array.from({ length: size }, () => worker()));
    if (state.failure !== undefined) {
        throw state.failure.error;
    }
    return results;
}

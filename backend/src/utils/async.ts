/**
 * Async utilities for batched catalog calls
 */
import pLimit from "p-limit";

/**
 * Split array into chunks of specified size
 */
export function chunkArray<T>(array: readonly T[], size: number): T[][] {
    if (size <= 0) throw new Error("Chunk size must be positive");
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
        chunks.push(array.slice(i, i + size));
    }
    return chunks;
}

export type BatchOutcome<R> =
    | { ok: true; value: R }
    | { ok: false; error: unknown };

/**
 * Run `processor` over each chunk with at most `concurrency` chunks in flight.
 * Outcomes are returned in chunk order regardless of completion order, and a
 * failing chunk does not abort the others.
 */
export async function mapChunksSettled<T, R>(
    items: readonly T[],
    chunkSize: number,
    processor: (chunk: T[]) => Promise<R>,
    concurrency = 1
): Promise<BatchOutcome<R>[]> {
    const limit = pLimit(Math.max(1, concurrency));
    const chunks = chunkArray(items, chunkSize);

    return Promise.all(
        chunks.map((chunk) =>
            limit(async (): Promise<BatchOutcome<R>> => {
                try {
                    return { ok: true, value: await processor(chunk) };
                } catch (error) {
                    return { ok: false, error };
                }
            })
        )
    );
}

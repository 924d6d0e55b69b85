export const DEFAULT_CHUNK_SIZE = 25;

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export interface BatchOptions<Id, T> {
  ids: readonly Id[];
  chunkSize?: number;
  /** Fetches one chunk. Items may come back in any order, and missing ones are gaps. */
  fetchChunk: (ids: Id[], chunkIndex: number) => Promise<ReadonlyArray<T | null | undefined>>;
  keyOf: (item: T) => Id;
  /** Chunks in flight at once. Defaults to 1 (sequential). */
  concurrency?: number;
}

/**
 * Splits an oversized bulk lookup into chunks and reassembles one result
 * aligned with `ids`: slot i holds the item keyed `ids[i]`, or `null`.
 * The first failing chunk fails the whole batch.
 */
export async function fetchInBatches<Id, T>(options: BatchOptions<Id, T>): Promise<(T | null)[]> {
  const chunks = chunk(options.ids, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const results: ReadonlyArray<T | null | undefined>[] = new Array(chunks.length);

  let next = 0;
  let failed = false;
  const worker = async (): Promise<void> => {
    while (!failed && next < chunks.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await options.fetchChunk(chunks[index] ?? [], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };
  await Promise.all(Array.from({ length: Math.min(concurrency, chunks.length) }, () => worker()));

  const byId = new Map<Id, T>();
  for (const items of results) {
    for (const item of items ?? []) {
      if (item !== null && item !== undefined) {
        byId.set(options.keyOf(item), item);
      }
    }
  }
  return options.ids.map((id) => byId.get(id) ?? null);
}

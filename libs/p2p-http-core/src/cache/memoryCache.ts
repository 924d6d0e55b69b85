import type { CacheEntry, CacheStats, P2PCache } from '../types';

/**
 * In-process cache backed by a Map. Entries never expire. Values go in and
 * come out as deep copies.
 */
export class MemoryCache implements P2PCache {
  private readonly store = new Map<string, CacheEntry>();
  private gets = 0;
  private hits = 0;

  get<T = unknown>(signature: string): T | undefined {
    this.gets += 1;
    const entry = this.store.get(signature);
    if (!entry) {
      return undefined;
    }
    this.hits += 1;
    return structuredClone(entry.value) as T;
  }

  set<T = unknown>(signature: string, value: T): void {
    this.store.set(signature, {
      signature,
      value: structuredClone(value),
      insertedAt: Date.now(),
    });
  }

  invalidate(signature: string): void {
    this.store.delete(signature);
  }

  clear(): void {
    this.store.clear();
  }

  /**
   * Entry metadata without counting as a lookup.
   */
  peek(signature: string): Omit<CacheEntry, 'value'> | undefined {
    const entry = this.store.get(signature);
    return entry ? { signature: entry.signature, insertedAt: entry.insertedAt } : undefined;
  }

  keys(): string[] {
    return [...this.store.keys()];
  }

  stats(): CacheStats {
    return { gets: this.gets, hits: this.hits, size: this.store.size };
  }
}

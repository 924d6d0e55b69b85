import type { P2PCache } from '../types';

/**
 * Stores nothing. The default when a client is built without a cache.
 */
export class NoopCache implements P2PCache {
  get<T = unknown>(_signature: string): T | undefined {
    return undefined;
  }

  set<T = unknown>(_signature: string, _value: T): void {
    // no-op
  }

  invalidate(_signature: string): void {
    // no-op
  }

  clear(): void {
    // no-op
  }
}

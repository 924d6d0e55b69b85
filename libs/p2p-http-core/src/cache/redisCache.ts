import Redis from 'ioredis';
import type { Logger, P2PCache } from '../types';
import { describeError } from '../errors';
import { noopLogger } from '../logger';

export interface RedisCacheOptions {
  /** Existing connection. When omitted one is opened lazily from `url`. */
  client?: Redis;
  url?: string;
  namespace?: string;
  /** Entry lifetime; entries never expire when unset. */
  ttlMs?: number;
  /** Degrade backend errors to misses instead of throwing. Defaults to true. */
  failOpen?: boolean;
  logger?: Logger;
}

const SCAN_BATCH = 100;

/**
 * Networked response cache. Values are JSON-encoded under `<namespace>:<signature>`.
 */
export class RedisCache implements P2PCache {
  private readonly client: Redis;
  private readonly namespace: string;
  private readonly ttlMs?: number;
  private readonly failOpen: boolean;
  private readonly logger: Logger;

  constructor(options: RedisCacheOptions = {}) {
    this.client =
      options.client ??
      new Redis(options.url ?? 'redis://localhost:6379', {
        lazyConnect: true,
        maxRetriesPerRequest: 2,
        enableOfflineQueue: true,
        connectTimeout: 5000,
        commandTimeout: 2000,
      });
    this.namespace = options.namespace ?? 'p2p-cache';
    this.ttlMs = options.ttlMs;
    this.failOpen = options.failOpen ?? true;
    this.logger = options.logger ?? noopLogger;
  }

  private key(signature: string): string {
    return `${this.namespace}:${signature}`;
  }

  private contain(operation: string, error: unknown): void {
    this.logger.warn('p2p.cache.redis.error', { operation, namespace: this.namespace, error: describeError(error) });
    if (!this.failOpen) {
      throw error;
    }
  }

  async get<T = unknown>(signature: string): Promise<T | undefined> {
    try {
      const raw = await this.client.get(this.key(signature));
      if (raw == null) {
        return undefined;
      }
      return JSON.parse(raw) as T;
    } catch (err) {
      this.contain('get', err);
      return undefined;
    }
  }

  async set<T = unknown>(signature: string, value: T): Promise<void> {
    const payload = JSON.stringify(value);
    try {
      if (this.ttlMs && this.ttlMs > 0) {
        await this.client.set(this.key(signature), payload, 'PX', this.ttlMs);
      } else {
        await this.client.set(this.key(signature), payload);
      }
    } catch (err) {
      this.contain('set', err);
    }
  }

  async invalidate(signature: string): Promise<void> {
    try {
      await this.client.del(this.key(signature));
    } catch (err) {
      this.contain('invalidate', err);
    }
  }

  /**
   * Removes every key in this namespace, leaving the rest of the database alone.
   */
  async clear(): Promise<void> {
    try {
      let cursor = '0';
      do {
        const [next, keys] = await this.client.scan(cursor, 'MATCH', `${this.namespace}:*`, 'COUNT', SCAN_BATCH);
        if (keys.length > 0) {
          await this.client.del(...keys);
        }
        cursor = next;
      } while (cursor !== '0');
    } catch (err) {
      this.contain('clear', err);
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

import { beforeEach, describe, it, expect, vi } from 'vitest';

const redisInstance = {
  get: vi.fn(),
  set: vi.fn(),
  del: vi.fn(),
  scan: vi.fn(),
  quit: vi.fn(),
};

const RedisMock = vi.fn(function () {
  return redisInstance;
});

vi.mock('ioredis', () => ({ default: RedisMock }));

const { RedisCache } = await import('../cache/redisCache');

describe('RedisCache', () => {
  beforeEach(() => {
    RedisMock.mockClear();
    for (const fn of Object.values(redisInstance)) {
      fn.mockReset();
    }
  });

  it('opens a lazy connection from the url', () => {
    new RedisCache({ url: 'redis://cache.test:6379' });
    expect(RedisMock).toHaveBeenCalledWith(
      'redis://cache.test:6379',
      expect.objectContaining({ lazyConnect: true, maxRetriesPerRequest: 2 })
    );
  });

  it('stores JSON under namespaced keys', async () => {
    redisInstance.set.mockResolvedValue('OK');
    redisInstance.get.mockResolvedValue(JSON.stringify({ content_item: { id: 7 } }));
    const cache = new RedisCache({ namespace: 'p2p-test' });

    await cache.set('GET /content_items/a.json', { content_item: { id: 7 } });
    const value = await cache.get('GET /content_items/a.json');

    expect(redisInstance.set).toHaveBeenCalledWith('p2p-test:GET /content_items/a.json', '{"content_item":{"id":7}}');
    expect(redisInstance.get).toHaveBeenCalledWith('p2p-test:GET /content_items/a.json');
    expect(value).toEqual({ content_item: { id: 7 } });
  });

  it('applies a TTL in milliseconds when configured', async () => {
    redisInstance.set.mockResolvedValue('OK');
    const cache = new RedisCache({ namespace: 'ns', ttlMs: 5000 });
    await cache.set('k', { value: 1 });
    expect(redisInstance.set).toHaveBeenCalledWith('ns:k', '{"value":1}', 'PX', 5000);
  });

  it('reports a missing key as a miss', async () => {
    redisInstance.get.mockResolvedValue(null);
    const cache = new RedisCache();
    await expect(cache.get('absent')).resolves.toBeUndefined();
    expect(redisInstance.get).toHaveBeenCalledWith('p2p-cache:absent');
  });

  it('degrades backend errors to misses in fail-open mode and logs them', async () => {
    redisInstance.get.mockRejectedValue(new Error('connection lost'));
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cache = new RedisCache({ namespace: 'ns', logger });

    await expect(cache.get('k')).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('p2p.cache.redis.error', {
      operation: 'get',
      namespace: 'ns',
      error: 'connection lost',
    });
  });

  it('rethrows backend errors when fail-open is off', async () => {
    redisInstance.set.mockRejectedValue(new Error('read only replica'));
    const cache = new RedisCache({ failOpen: false });
    await expect(cache.set('k', 1)).rejects.toThrow('read only replica');
  });

  it('invalidates one key', async () => {
    redisInstance.del.mockResolvedValue(1);
    const cache = new RedisCache({ namespace: 'ns' });
    await cache.invalidate('k');
    expect(redisInstance.del).toHaveBeenCalledWith('ns:k');
  });

  it('clears only its own namespace, following the scan cursor', async () => {
    redisInstance.scan
      .mockResolvedValueOnce(['17', ['ns:a', 'ns:b']])
      .mockResolvedValueOnce(['0', ['ns:c']]);
    redisInstance.del.mockResolvedValue(1);
    const cache = new RedisCache({ namespace: 'ns' });

    await cache.clear();

    expect(redisInstance.scan).toHaveBeenNthCalledWith(1, '0', 'MATCH', 'ns:*', 'COUNT', 100);
    expect(redisInstance.scan).toHaveBeenNthCalledWith(2, '17', 'MATCH', 'ns:*', 'COUNT', 100);
    expect(redisInstance.del).toHaveBeenNthCalledWith(1, 'ns:a', 'ns:b');
    expect(redisInstance.del).toHaveBeenNthCalledWith(2, 'ns:c');
  });
});

import { afterEach, describe, it, expect, vi } from 'vitest';
import { MemoryCache } from '../cache/memoryCache';
import { NoopCache } from '../cache/noopCache';

describe('MemoryCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns what was set under a signature', () => {
    const cache = new MemoryCache();
    cache.set('GET /content_items/a.json', { content_item: { id: 1 } });
    expect(cache.get('GET /content_items/a.json')).toEqual({ content_item: { id: 1 } });
    expect(cache.get('GET /content_items/b.json')).toBeUndefined();
  });

  it('stores and returns deep copies', () => {
    const cache = new MemoryCache();
    const value = { content_item: { id: 1, tags: ['a'] } };
    cache.set('sig', value);
    value.content_item.tags.push('mutated');

    const first = cache.get<typeof value>('sig');
    first?.content_item.tags.push('again');

    expect(cache.get('sig')).toEqual({ content_item: { id: 1, tags: ['a'] } });
  });

  it('overwrites an entry and records when it was inserted', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T00:00:00Z'));
    const cache = new MemoryCache();
    cache.set('sig', 1);
    vi.setSystemTime(new Date('2024-05-01T00:01:00Z'));
    cache.set('sig', 2);

    expect(cache.get('sig')).toBe(2);
    expect(cache.peek('sig')).toEqual({ signature: 'sig', insertedAt: Date.parse('2024-05-01T00:01:00Z') });
  });

  it('counts lookups and hits', () => {
    const cache = new MemoryCache();
    cache.set('a', 'x');
    cache.get('a');
    cache.get('a');
    cache.get('missing');
    expect(cache.stats()).toEqual({ gets: 3, hits: 2, size: 1 });
  });

  it('invalidates single entries and clears everything', () => {
    const cache = new MemoryCache();
    cache.set('a', 1);
    cache.set('b', 2);
    cache.invalidate('a');
    expect(cache.keys()).toEqual(['b']);
    cache.clear();
    expect(cache.keys()).toEqual([]);
  });
});

describe('NoopCache', () => {
  it('never stores anything', () => {
    const cache = new NoopCache();
    cache.set('sig', { id: 1 });
    expect(cache.get('sig')).toBeUndefined();
  });
});

import { describe, it, expect, vi } from 'vitest';
import { MemoryCache } from './memory.js';
import { RedisCache } from './redis.js';
import type { RedisClient } from './redis.js';
import { createCache } from './index.js';

describe('MemoryCache', () => {
  it('expires entries after their ttl', async () => {
    let clock = 1_000;
    const cache = new MemoryCache({ now: () => clock });

    await cache.set('plan', { tables: ['customers'] }, 60);
    clock += 59_999;
    await expect(cache.get('plan')).resolves.toEqual({ tables: ['customers'] });

    clock += 1;
    await expect(cache.get('plan')).resolves.toBeUndefined();
  });

  it('evicts the least recently used entry when full', async () => {
    const cache = new MemoryCache({ maxSize: 2 });

    await cache.set('a', 1, 60);
    await cache.set('b', 2, 60);
    await cache.get('a');
    await cache.set('c', 3, 60);

    await expect(cache.get('a')).resolves.toBe(1);
    await expect(cache.get('b')).resolves.toBeUndefined();
    await expect(cache.get('c')).resolves.toBe(3);
  });

  it('hands out copies', async () => {
    const cache = new MemoryCache();
    const stored = { tables: ['customers'] };
    await cache.set('plan', stored, 60);
    stored.tables.push('orders');

    await expect(cache.get('plan')).resolves.toEqual({ tables: ['customers'] });
  });

  it('deletes keys', async () => {
    const cache = new MemoryCache();
    await cache.set('a', true, 60);

    await expect(cache.delete('a')).resolves.toBe(true);
    await expect(cache.delete('a')).resolves.toBe(false);
  });
});

describe('RedisCache', () => {
  const client = (overrides: Partial<RedisClient> = {}): RedisClient => ({
    get: vi.fn(async () => null),
    setex: vi.fn(async () => 'OK'),
    del: vi.fn(async () => 1),
    quit: vi.fn(async () => 'OK'),
    ...overrides,
  });

  it('stores JSON under the key prefix with a whole-second ttl', async () => {
    const redis = client();
    const cache = new RedisCache(redis, 'test:');

    await cache.set('plan', { limit: 5 }, 86400);

    expect(redis.setex).toHaveBeenCalledWith('test:plan', 86400, '{"limit":5}');
  });

  it('parses stored values', async () => {
    const cache = new RedisCache(client({ get: vi.fn(async () => '["a","b"]') }));

    await expect(cache.get('k')).resolves.toEqual(['a', 'b']);
  });

  it('degrades to a miss or a no-op when redis fails', async () => {
    const down = new Error('connect ECONNREFUSED');
    const cache = new RedisCache(
      client({
        get: vi.fn(async () => Promise.reject(down)),
        setex: vi.fn(async () => Promise.reject(down)),
        del: vi.fn(async () => Promise.reject(down)),
        quit: vi.fn(async () => Promise.reject(down)),
      })
    );

    await expect(cache.get('k')).resolves.toBeUndefined();
    await expect(cache.set('k', 1, 10)).resolves.toBeUndefined();
    await expect(cache.delete('k')).resolves.toBe(false);
    await expect(cache.close()).resolves.toBeUndefined();
  });

  it('treats unparseable stored data as a miss', async () => {
    const cache = new RedisCache(client({ get: vi.fn(async () => '{not json') }));

    await expect(cache.get('k')).resolves.toBeUndefined();
  });
});

describe('createCache', () => {
  it('uses memory without a redis url', async () => {
    const cache = createCache();
    expect(cache.getType()).toBe('memory');
    await cache.close();
  });
});

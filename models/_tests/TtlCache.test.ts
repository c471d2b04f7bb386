import { describe, it, expect, beforeEach } from 'vitest';
import { TtlCache } from '../cache/TtlCache';
import { DEFAULT_CACHE_TTL_MS } from '../constants';

describe('TtlCache', () => {
  let now: number;
  let cache: TtlCache<string, string>;

  beforeEach(() => {
    now = 1_000_000;
    cache = new TtlCache<string, string>({ ttlMs: 1000, now: () => now });
  });

  it('should default to a 15 minute TTL', () => {
    expect(new TtlCache<string, string>().ttlMs).toBe(DEFAULT_CACHE_TTL_MS);
    expect(DEFAULT_CACHE_TTL_MS).toBe(900_000);
  });

  it('should report a miss for unknown keys', async () => {
    expect(await cache.get('missing')).toEqual({ hit: false });
  });

  it('should return stored values until they expire', async () => {
    await cache.set('a', 'alpha');

    now += 999;
    expect(await cache.get('a')).toEqual({ hit: true, value: 'alpha' });

    now += 1;
    expect(await cache.get('a')).toEqual({ hit: false });
    expect(cache.size).toBe(0);
  });

  it('should cache negative results with the same TTL', async () => {
    await cache.set('ghost', null);
    expect(await cache.get('ghost')).toEqual({ hit: true, value: null });

    now += 1000;
    expect(await cache.get('ghost')).toEqual({ hit: false });
  });

  it('should compute expiry at write time, not on read', async () => {
    await cache.set('a', 'alpha');
    now += 600;
    await cache.get('a');
    now += 600;
    expect(await cache.get('a')).toEqual({ hit: false });
  });

  it('should partition keys into hits and misses', async () => {
    await cache.setMany([
      ['a', 'alpha'],
      ['b', null],
    ]);

    const { hits, misses } = await cache.partition(['a', 'b', 'c', 'a']);
    expect([...hits.entries()]).toEqual([
      ['a', 'alpha'],
      ['b', null],
    ]);
    expect(misses).toEqual(['c']);
  });

  it('should delete single and multiple keys', async () => {
    await cache.setMany([
      ['a', 'alpha'],
      ['b', 'beta'],
      ['c', 'gamma'],
    ]);

    expect(await cache.delete('a')).toBe(true);
    expect(await cache.delete('a')).toBe(false);
    expect(await cache.deleteMany(['b', 'c', 'd'])).toBe(2);
    expect(cache.size).toBe(0);
  });

  it('should prune only expired entries', async () => {
    await cache.set('old', 'value');
    now += 500;
    await cache.set('new', 'value');
    now += 600;

    expect(await cache.prune()).toBe(1);
    expect(await cache.get('new')).toEqual({ hit: true, value: 'value' });
  });

  it('should sweep expired entries on write once a TTL has passed', async () => {
    await cache.setMany(Array.from({ length: 200 }, (_, i) => [`ghost-${i}`, null] as const));
    now += 999;
    await cache.set('early', 'value');
    expect(cache.size).toBe(201);

    now += 1;
    await cache.set('late', 'value');
    expect(cache.size).toBe(2);

    // the next sweep waits another full TTL
    now += 999;
    await cache.set('later', 'value');
    expect(cache.size).toBe(3);
  });

  it('should clear everything', async () => {
    await cache.set('a', 'alpha');
    await cache.clear();
    expect(await cache.get('a')).toEqual({ hit: false });
  });
});

import { AsyncLock } from '../../utils/AsyncLock';
import { DEFAULT_CACHE_TTL_MS } from '../constants';

export interface CachedValue<V> {
  /** null records a confirmed absence. */
  readonly value: V | null;
  /** Epoch ms after which the entry is ignored. */
  readonly expiresAt: number;
}

export type CacheLookup<V> = { hit: true; value: V | null } | { hit: false };

export interface CachePartition<K, V> {
  hits: Map<K, V | null>;
  misses: K[];
}

export interface TtlCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Keyed cache with a fixed per-instance TTL. Absent values are cached like present
 * ones. All map access runs under one lock; callers never hold it across I/O.
 */
export class TtlCache<K, V> {
  private readonly entries = new Map<K, CachedValue<V>>();
  private readonly lock = new AsyncLock();
  private readonly now: () => number;
  private lastSweepAt: number;
  readonly ttlMs: number;

  constructor(options: TtlCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.lastSweepAt = this.now();
  }

  async get(key: K): Promise<CacheLookup<V>> {
    return this.lock.runExclusive(() => this.lookup(key));
  }

  async set(key: K, value: V | null): Promise<void> {
    await this.lock.runExclusive(() => {
      this.store(key, value);
    });
  }

  async setMany(entries: Iterable<readonly [K, V | null]>): Promise<void> {
    await this.lock.runExclusive(() => {
      for (const [key, value] of entries) {
        this.store(key, value);
      }
    });
  }

  async delete(key: K): Promise<boolean> {
    return this.lock.runExclusive(() => this.entries.delete(key));
  }

  async deleteMany(keys: Iterable<K>): Promise<number> {
    return this.lock.runExclusive(() => {
      let removed = 0;
      for (const key of keys) {
        if (this.entries.delete(key)) {
          removed++;
        }
      }
      return removed;
    });
  }

  /**
   * Splits `keys` into fresh hits and misses under a single lock acquisition.
   * Duplicate keys are reported once.
   */
  async partition(keys: Iterable<K>): Promise<CachePartition<K, V>> {
    return this.lock.runExclusive(() => {
      const hits = new Map<K, V | null>();
      const misses: K[] = [];
      for (const key of new Set(keys)) {
        const lookup = this.lookup(key);
        if (lookup.hit) {
          hits.set(key, lookup.value);
        } else {
          misses.push(key);
        }
      }
      return { hits, misses };
    });
  }

  async clear(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.entries.clear();
    });
  }

  /**
   * Drops expired entries and returns how many were removed.
   */
  async prune(): Promise<number> {
    return this.lock.runExclusive(() => this.sweep(this.now()));
  }

  get size(): number {
    return this.entries.size;
  }

  private lookup(key: K): CacheLookup<V> {
    const entry = this.entries.get(key);
    if (!entry) {
      return { hit: false };
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return { hit: false };
    }
    return { hit: true, value: entry.value };
  }

  // Writes sweep expired entries at most once per TTL, so keys that are never
  // read again do not accumulate.
  private store(key: K, value: V | null): void {
    const now = this.now();
    if (now - this.lastSweepAt >= this.ttlMs) {
      this.sweep(now);
    }
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  private sweep(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.lastSweepAt = now;
    return removed;
  }
}

/**
 * In-process TTL cache
 *
 * Key/value store with a per-entry time-to-live. Expiry is computed from the
 * insertion time on every read, so a stale entry is never served; it is evicted
 * lazily when read. The store is an lru-cache bounded by entry count.
 *
 * Async loads (getOrLoad) are serialized per key with async-mutex: concurrent
 * misses on the same key share one load, different keys proceed in parallel.
 *
 * The cache fails open. A fault inside the store is logged and treated as a
 * miss; no cache operation throws into its caller.
 */

import { Mutex } from 'async-mutex';
import { LRUCache } from 'lru-cache';

import { getLogger } from '@kernel/logger';

const logger = getLogger('TtlCache');

/** Default maximum number of live entries */
export const DEFAULT_MAX_ENTRIES = 1000;

// ============================================================================
// Types & Interfaces
// ============================================================================

export interface CacheEntry<V> {
  value: V;
  /** Clock reading at insertion (ms) */
  insertedAt: number;
  ttlMs: number;
}

export interface TtlCacheOptions {
  /** Maximum entries before least-recently-used eviction */
  maxEntries?: number;
  /** Clock source in ms, replaceable in tests */
  now?: () => number;
}

export interface CacheEntryStatus {
  key: string;
  ageMs: number;
  ttlMs: number;
  expired: boolean;
}

export interface CacheStatus {
  entryCount: number;
  validCount: number;
  expiredCount: number;
  entries: CacheEntryStatus[];
}

export interface GetOrLoadOptions {
  /** Skip the cached value and reload, still storing the fresh result */
  bypassRead?: boolean;
}

interface KeyLock {
  mutex: Mutex;
  holders: number;
}

// ============================================================================
// TTL Cache Class
// ============================================================================

export class TtlCache<V extends {}> {
  private readonly store: LRUCache<string, CacheEntry<V>>;
  private readonly locks = new Map<string, KeyLock>();
  private readonly now: () => number;
  readonly maxEntries: number;

  constructor(options: TtlCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new Error(`TtlCache maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    this.now = options.now ?? Date.now;
    this.store = new LRUCache<string, CacheEntry<V>>({ max: maxEntries });
  }

  /**
  * Get a live value
  * @returns The value, or undefined on miss or expiry
  */
  get(key: string): V | undefined {
    try {
      const entry = this.store.get(key);
      if (!entry) return undefined;

      if (this.isExpired(entry, this.now())) {
        this.store.delete(key);
        return undefined;
      }
      return entry.value;
    } catch (error) {
      this.reportFault('get', key, error);
      return undefined;
    }
  }

  /**
  * Insert or overwrite a value. A ttlMs of zero or less stores nothing.
  */
  set(key: string, value: V, ttlMs: number): void {
    try {
      if (!(ttlMs > 0)) {
        this.store.delete(key);
        return;
      }
      this.store.set(key, { value, insertedAt: this.now(), ttlMs });
    } catch (error) {
      this.reportFault('set', key, error);
    }
  }

  /**
  * @returns True if an entry was removed
  */
  invalidate(key: string): boolean {
    try {
      return this.store.delete(key);
    } catch (error) {
      this.reportFault('invalidate', key, error);
      return false;
    }
  }

  /**
  * Remove every key that contains the pattern
  * @returns Number of entries removed
  */
  invalidateMatching(pattern: string): number {
    try {
      const matching = [...this.store.keys()].filter(key => key.includes(pattern));
      for (const key of matching) {
        this.store.delete(key);
      }
      return matching.length;
    } catch (error) {
      this.reportFault('invalidateMatching', pattern, error);
      return 0;
    }
  }

  /**
  * Remove every entry
  * @returns Number of entries removed
  */
  clear(): number {
    try {
      const count = this.store.size;
      this.store.clear();
      return count;
    } catch (error) {
      this.reportFault('clear', '*', error);
      return 0;
    }
  }

  get size(): number {
    return this.store.size;
  }

  /**
  * Snapshot of every stored entry, ordered by key.
  * Reading the status neither evicts nor refreshes recency.
  */
  status(): CacheStatus {
    const now = this.now();
    const entries: CacheEntryStatus[] = [];

    try {
      for (const [key, entry] of this.store.entries()) {
        entries.push({
          key,
          ageMs: Math.max(0, now - entry.insertedAt),
          ttlMs: entry.ttlMs,
          expired: this.isExpired(entry, now),
        });
      }
    } catch (error) {
      this.reportFault('status', '*', error);
    }

    entries.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    const expiredCount = entries.filter(e => e.expired).length;

    return {
      entryCount: entries.length,
      validCount: entries.length - expiredCount,
      expiredCount,
      entries,
    };
  }

  /**
  * Return the live value for key, or run the loader and store its result.
  * Loader errors propagate to every waiter and are never cached.
  */
  async getOrLoad(
    key: string,
    ttlMs: number,
    loader: () => Promise<V>,
    options: GetOrLoadOptions = {}
  ): Promise<V> {
    const lock = this.acquireLock(key);
    try {
      return await lock.mutex.runExclusive(async () => {
        if (!options.bypassRead) {
          const cached = this.get(key);
          if (cached !== undefined) {
            return cached;
          }
        }

        const value = await loader();
        this.set(key, value, ttlMs);
        return value;
      });
    } finally {
      this.releaseLock(key, lock);
    }
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.insertedAt > entry.ttlMs;
  }

  private acquireLock(key: string): KeyLock {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = { mutex: new Mutex(), holders: 0 };
      this.locks.set(key, lock);
    }
    lock.holders++;
    return lock;
  }

  private releaseLock(key: string, lock: KeyLock): void {
    lock.holders--;
    if (lock.holders === 0 && this.locks.get(key) === lock) {
      this.locks.delete(key);
    }
  }

  private reportFault(operation: string, key: string, error: unknown): void {
    logger.warn('Cache operation failed, treating as miss', {
      operation,
      key,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * MemoryCacheStore - In-process TTL cache for raw page bodies
 *
 * Entries are keyed by fully qualified URL. An entry is only visible before
 * its expiry time; after that readers see it as expired and refresh it.
 */

import type { CacheEntry, CacheLookup, CacheStore } from '../types/cache';

/**
 * How often expired entries are swept on write
 */
const SWEEP_INTERVAL_MS = 60000; // 60 seconds

/**
 * MemoryCacheStore handles all caching operations for a single process.
 *
 * No locking: concurrent requests for the same key may both miss and both
 * write, and the last write wins.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private lastSweep = Date.now();

  /**
   * Look up a key. Returns null if never stored (or swept), otherwise the
   * value with its expiry state.
   */
  get(key: string): CacheLookup | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    return {
      value: entry.value,
      expired: Date.now() >= entry.expiresAt,
    };
  }

  /**
   * Store a value for `ttlSeconds`. A TTL of zero stores an entry that is
   * already expired for every later lookup.
   */
  put(key: string, value: string, ttlSeconds: number): void {
    const now = Date.now();
    this.sweep(now);

    this.entries.set(key, {
      value,
      expiresAt: now + Math.max(0, ttlSeconds) * 1000,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Drop expired entries so the map does not grow without bound
   */
  private sweep(now: number): void {
    if (now - this.lastSweep < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweep = now;

    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }
}

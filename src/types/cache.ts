/**
 * Cache type definitions for the cache-aside page fetcher
 */

/**
 * Configuration for a cached page type
 */
export interface CacheConfig {
  /** Time-to-live in seconds. Zero stores the body but never serves it again */
  ttl: number;
}

/**
 * Raw body stored under a fully qualified URL
 */
export interface CacheEntry {
  /** Decoded response body */
  value: string;
  /** Absolute expiry time in epoch milliseconds */
  expiresAt: number;
}

/**
 * Result of a cache lookup operation
 */
export interface CacheLookup {
  value: string;
  /** True once the entry's TTL has elapsed; expired values must not be served */
  expired: boolean;
}

/**
 * Key/value store with TTL semantics.
 *
 * Lookups and writes are synchronous. Concurrent readers of an expired key may
 * both miss; the last writer wins.
 */
export interface CacheStore {
  get(key: string): CacheLookup | null;
  put(key: string, value: string, ttlSeconds: number): void;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}

/**
 * Cache configuration constants for the fetched page types
 */

import type { CacheConfig } from '../types/cache';

/**
 * Cache configurations by page type
 *
 * - careerPage: Existence probe against the career site (5 min TTL)
 * - profilePage: Full profile page on the stats site (5 min TTL)
 * - profileUpdate: Update endpoint on the stats site (5 min TTL)
 */
export const CACHE_CONFIGS = {
  /**
   * Career page used only to check that a player exists in a region
   */
  careerPage: {
    ttl: 300, // 5 minutes
  },

  /**
   * Full profile page, fetched after a successful update
   */
  profilePage: {
    ttl: 300, // 5 minutes
  },

  /**
   * Update endpoint. Repeated calls within the TTL reuse the previous answer
   * instead of asking for another recompute.
   */
  profileUpdate: {
    ttl: 300, // 5 minutes
  },
} as const satisfies Record<string, CacheConfig>;

export type CacheConfigKey = keyof typeof CACHE_CONFIGS;

export type CacheConfigs = Record<CacheConfigKey, CacheConfig>;

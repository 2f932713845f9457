/**
 * Region Configuration
 *
 * Server regions under which the career and stats sites track players.
 *
 * @module config/regions
 */

/**
 * Every supported region, in the order the resolver tries them when the
 * caller does not name one
 */
export const REGIONS = ['eu', 'us', 'kr'] as const;

export type Region = (typeof REGIONS)[number];

export const DEFAULT_REGION_ORDER: readonly Region[] = REGIONS;

const REGION_SET: ReadonlySet<string> = new Set(REGIONS);

/**
 * Check if a value is a supported region code
 *
 * Codes are matched exactly; the sites only accept lower-case region segments.
 */
export function isRegion(value: string): value is Region {
  return REGION_SET.has(value);
}

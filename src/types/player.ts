/**
 * Player, document and resolution types
 */

import type { CheerioAPI } from 'cheerio';
import type { Region } from '../config/regions';

/**
 * Queryable tree built from a raw page body. Never cached or shared;
 * every load parses again.
 */
export type ParsedDocument = CheerioAPI;

/**
 * Outcome of asking the stats site to recompute a player's profile
 */
export type UpdateResult =
  | {
      kind: 'updated';
      /** Decoded JSON body returned by the update endpoint */
      payload: unknown;
    }
  | { kind: 'not-found' };

/**
 * Final output of the region resolver.
 *
 * A resolved region may still carry a null document when the full profile
 * fetch failed after a successful probe and update.
 */
export type RegionResolution =
  | { status: 'resolved'; document: ParsedDocument | null; region: Region }
  | { status: 'exhausted'; document: null; region: null };

export interface ResolveOptions {
  /** Restrict resolution to a single region */
  region?: Region;
  /** Opaque path/query suffix appended to the full profile URL */
  extra?: string;
}

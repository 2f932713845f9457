/**
 * Remote-Update Trigger
 *
 * Asks the stats site to recompute a player's profile and reports whether
 * the player exists there.
 */

import type { ResolverContext } from '../types/context';
import type { UpdateResult } from '../types/player';
import type { Region } from '../config/regions';
import { profileUpdateUrl } from '../config/urls';
import { componentLogger } from '../lib/logger';
import { fetchBody } from './cached-fetch';

/**
 * The only error message that counts as "player does not exist". Matched exactly.
 */
export const PLAYER_NOT_FOUND_MESSAGE = "We couldn't find a player with that name.";

/**
 * The update endpoint could not be fetched (non-200 status or network failure)
 */
export class UpdateFetchError extends Error {
  url: string;

  constructor(url: string) {
    super(`Profile update request failed: ${url}`);
    this.name = 'UpdateFetchError';
    this.url = url;
  }
}

/**
 * The update endpoint answered with something that is not JSON
 */
export class UpdateResponseError extends Error {
  url: string;

  constructor(url: string, cause: unknown) {
    super(`Profile update returned invalid JSON: ${url}`, { cause });
    this.name = 'UpdateResponseError';
    this.url = url;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Trigger a profile update for a player in one region.
 *
 * Only the exact not-found message yields `not-found`; every other payload,
 * including other errors, counts as `updated`.
 *
 * @throws UpdateFetchError when the endpoint cannot be fetched
 * @throws UpdateResponseError when the body is not valid JSON
 */
export async function triggerUpdate(
  ctx: ResolverContext,
  battletag: string,
  region: Region
): Promise<UpdateResult> {
  const logger = componentLogger(ctx.logger, 'profile-update');
  const url = profileUpdateUrl(ctx.urls, battletag, region);

  const body = await fetchBody(ctx, url, ctx.ttl.profileUpdate.ttl);
  if (body === null) {
    throw new UpdateFetchError(url);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    throw new UpdateResponseError(url, error);
  }

  if (isRecord(payload) && payload.status === 'error') {
    if (payload.message === PLAYER_NOT_FOUND_MESSAGE) {
      return { kind: 'not-found' };
    }
    logger.warn(
      { battletag, region, message: payload.message },
      'Profile update returned an unrecognised error; treating as updated'
    );
  }

  logger.info({ battletag, region, payload }, `Updated user \`${battletag}\``);
  return { kind: 'updated', payload };
}

/**
 * Region Resolver
 *
 * Walks the candidate regions in order. For each one:
 * 1. Probe the career page; a missing page skips the region
 * 2. Trigger a profile update; a not-found answer skips the region
 * 3. Load the full profile page and return it with the region
 *
 * Step 3 returns even when the profile page fails to load, pairing the
 * region with a null document instead of trying the next region.
 */

import type { ResolverContext } from '../types/context';
import type { RegionResolution, ResolveOptions } from '../types/player';
import { DEFAULT_REGION_ORDER, type Region } from '../config/regions';
import { careerPageUrl, profilePageUrl } from '../config/urls';
import { componentLogger } from '../lib/logger';
import { loadDocument } from './document-loader';
import { triggerUpdate } from './profile-update';

function assertNever(value: never): never {
  throw new Error(`Unhandled update result: ${JSON.stringify(value)}`);
}

/**
 * Find the first region whose career page exists and whose update call
 * recognises the player, and load that region's profile page.
 *
 * Update fetch failures and invalid update payloads propagate unchanged.
 */
export async function resolveRegion(
  ctx: ResolverContext,
  battletag: string,
  options: ResolveOptions = {}
): Promise<RegionResolution> {
  const logger = componentLogger(ctx.logger, 'region-resolver');
  const candidates: readonly Region[] = options.region ? [options.region] : DEFAULT_REGION_ORDER;

  for (const region of candidates) {
    const probe = await loadDocument(
      ctx,
      careerPageUrl(ctx.urls, battletag, region),
      ctx.ttl.careerPage.ttl
    );
    if (probe === null) {
      logger.debug({ battletag, region }, 'No career page; skipping region');
      continue;
    }

    const update = await triggerUpdate(ctx, battletag, region);
    switch (update.kind) {
      case 'not-found':
        logger.debug({ battletag, region }, 'Stats site does not know player; skipping region');
        continue;
      case 'updated':
        break;
      default:
        return assertNever(update);
    }

    const document = await loadDocument(
      ctx,
      profilePageUrl(ctx.urls, battletag, region, options.extra),
      ctx.ttl.profilePage.ttl
    );
    if (document === null) {
      logger.warn({ battletag, region }, 'Profile page unavailable after update');
    }

    return { status: 'resolved', document, region };
  }

  return { status: 'exhausted', document: null, region: null };
}

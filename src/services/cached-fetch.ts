/**
 * Cached Fetch - Cache-aside primitive for raw page bodies
 *
 * 1. Serve a live cache entry without touching the network
 * 2. Otherwise GET the URL (optionally coalesced with concurrent misses)
 * 3. Store 200 bodies for the TTL; failures are never cached
 */

import type { ResolverContext } from '../types/context';
import { componentLogger } from '../lib/logger';

/**
 * Return the body for `url`, from cache while it is live, otherwise from the
 * network.
 *
 * @param ttl - Seconds to keep a fetched body. Zero stores it already expired.
 * @returns The decoded body, or null on a non-200 status or transport failure
 */
export async function fetchBody(
  ctx: ResolverContext,
  url: string,
  ttl: number
): Promise<string | null> {
  const cached = ctx.cache.get(url);
  if (cached && !cached.expired) {
    return cached.value;
  }

  if (ctx.coalescer) {
    return ctx.coalescer.coalesce(url, () => fetchAndStore(ctx, url, ttl));
  }
  return fetchAndStore(ctx, url, ttl);
}

/**
 * Live network call. Only 200 responses reach the cache.
 */
async function fetchAndStore(
  ctx: ResolverContext,
  url: string,
  ttl: number
): Promise<string | null> {
  const logger = componentLogger(ctx.logger, 'cached-fetch');
  logger.info({ url }, `GET => ${url}`);

  let status: number;
  let body: string;
  try {
    ({ status, body } = await ctx.transport.get(url));
  } catch (error) {
    logger.warn({ url, err: error }, 'Upstream request failed');
    return null;
  }

  if (status !== 200) {
    logger.warn({ url, status }, 'Upstream returned non-200 status');
    return null;
  }

  ctx.cache.put(url, body, ttl);
  return body;
}

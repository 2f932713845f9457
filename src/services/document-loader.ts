/**
 * Document Loader - fetch through the cache, then parse off the main thread
 */

import type { ResolverContext } from '../types/context';
import type { ParsedDocument } from '../types/player';
import { fetchBody } from './cached-fetch';

/**
 * @returns The parsed page, or null when the fetch failed (no parse is attempted)
 */
export async function loadDocument(
  ctx: ResolverContext,
  url: string,
  ttl: number
): Promise<ParsedDocument | null> {
  const body = await fetchBody(ctx, url, ttl);
  if (body === null) {
    return null;
  }

  return ctx.parser.parse(body);
}

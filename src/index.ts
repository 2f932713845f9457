/**
 * Player Stats Resolver
 *
 * HTTP front for the region resolver:
 * - CORS headers on ALL responses (including errors)
 * - Cache-aside fetching of career and profile pages
 * - Off-main-thread parsing of fetched markup
 *
 * @module player-stats-resolver
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { ResolverContext } from './types/context';
import type { Environment } from './config/env';
import { isRegion } from './config/regions';
import { isValidBattletag } from './config/urls';
import { resolveRegion } from './services/region-resolver';
import { UpdateFetchError, UpdateResponseError } from './services/profile-update';
import { componentLogger } from './lib/logger';

export { resolveRegion } from './services/region-resolver';
export { triggerUpdate, UpdateFetchError, UpdateResponseError } from './services/profile-update';
export { loadDocument } from './services/document-loader';
export { fetchBody } from './services/cached-fetch';
export { createResolverContext } from './context';
export type { ResolverContext, ParseExecutor } from './types/context';
export type { ParsedDocument, RegionResolution, UpdateResult } from './types/player';

export const VERSION = '1.0.0';

export interface AppOptions {
  environment: Environment;
  allowedOrigins: string[];
}

export function createApp(ctx: ResolverContext, options: AppOptions): Hono {
  const app = new Hono();
  const logger = componentLogger(ctx.logger, 'http');

  // ===========================================================================
  // CORS Middleware - Applied to ALL responses including errors
  // ===========================================================================

  app.use('*', async (c, next) => {
    const origin = c.req.header('Origin') || '';

    const isAllowed =
      options.environment === 'development'
        ? // In development, allow localhost on any port
          origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:')
        : options.allowedOrigins.includes(origin);

    return cors({
      origin: isAllowed ? origin : (options.allowedOrigins[0] ?? ''),
      allowMethods: ['GET', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Accept'],
      maxAge: 86400, // Cache preflight for 24 hours
      credentials: false,
    })(c, next);
  });

  // ===========================================================================
  // Health Check
  // ===========================================================================

  app.get('/', (c) => {
    return c.json({
      name: 'player-stats-resolver',
      status: 'ok',
      environment: options.environment,
      version: VERSION,
    });
  });

  app.get('/health', (c) => {
    return c.json({ status: 'ok' });
  });

  // ===========================================================================
  // Player Routes
  // ===========================================================================

  /**
   * Resolve the region a player's profile lives in
   * GET /api/v1/u/:battletag/region?region=eu&extra=/heroes
   */
  app.get('/api/v1/u/:battletag/region', async (c) => {
    const battletag = c.req.param('battletag');
    const region = c.req.query('region');
    const extra = c.req.query('extra') ?? '';

    if (!isValidBattletag(battletag)) {
      return c.json({ error: 'Invalid battletag parameter' }, 400);
    }
    if (region !== undefined && !isRegion(region)) {
      return c.json({ error: 'Invalid region parameter' }, 400);
    }

    try {
      const result = await resolveRegion(ctx, battletag, { region, extra });

      if (result.status === 'exhausted') {
        return c.json({ error: 'Player not found', battletag }, 404);
      }

      const title = result.document ? result.document('title').first().text().trim() : '';
      return c.json({
        battletag,
        region: result.region,
        profileAvailable: result.document !== null,
        title: title || null,
      });
    } catch (error) {
      if (error instanceof UpdateFetchError || error instanceof UpdateResponseError) {
        logger.error({ err: error, battletag }, 'Profile update failed');
        return c.json(
          {
            error: 'Failed to update profile on upstream site',
            message: error.message,
          },
          502
        );
      }
      throw error;
    }
  });

  // ===========================================================================
  // 404 Handler
  // ===========================================================================

  app.notFound((c) => {
    return c.json(
      {
        error: 'Not Found',
        message: 'The requested endpoint does not exist',
        availableEndpoints: ['/health', '/api/v1/u/:battletag/region'],
      },
      404
    );
  });

  // ===========================================================================
  // Global Error Handler
  // ===========================================================================

  app.onError((err, c) => {
    logger.error({ err }, 'Unhandled error');
    return c.json(
      {
        error: 'Internal Server Error',
        message: options.environment === 'development' ? err.message : 'An unexpected error occurred',
      },
      500
    );
  });

  return app;
}

/**
 * Builds the resolver context from process configuration
 */

import type { Logger } from 'pino';
import type { ResolverContext } from './types/context';
import type { AppConfig } from './config/env';
import { CACHE_CONFIGS } from './config/cache';
import { MemoryCacheStore } from './services/cache-service';
import { FetchTransport } from './services/http-transport';
import { WorkerParsePool } from './services/parse-pool';
import { RequestCoalescer } from './services/request-coalescer';

export function createResolverContext(config: AppConfig, logger: Logger): ResolverContext {
  return {
    cache: new MemoryCacheStore(),
    transport: new FetchTransport({ userAgent: config.userAgent }),
    parser: new WorkerParsePool({ size: config.parseWorkers, logger }),
    urls: config.urls,
    ttl: CACHE_CONFIGS,
    logger,
    coalescer: config.singleFlight ? new RequestCoalescer() : undefined,
  };
}

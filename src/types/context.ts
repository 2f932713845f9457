/**
 * Explicit context passed into every core function
 */

import type { Logger } from 'pino';
import type { CacheConfigs } from '../config/cache';
import type { UrlConfig } from '../config/urls';
import type { RequestCoalescer } from '../services/request-coalescer';
import type { CacheStore } from './cache';
import type { HttpTransport } from './http';
import type { ParsedDocument } from './player';

/**
 * Converts a raw body into a parsed document without blocking the caller's
 * event loop
 */
export interface ParseExecutor {
  parse(body: string): Promise<ParsedDocument>;
  close(): Promise<void>;
}

export interface ResolverContext {
  cache: CacheStore;
  transport: HttpTransport;
  parser: ParseExecutor;
  urls: UrlConfig;
  ttl: CacheConfigs;
  logger: Logger;
  /** When set, concurrent misses for the same URL share one network call */
  coalescer?: RequestCoalescer;
}

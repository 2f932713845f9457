/**
 * Test Setup - In-process stand-ins for the resolver's collaborators
 *
 * - MockTransport: scripted HTTP responses, records every requested URL
 * - createCapturingLogger: pino logger writing parsed entries to an array
 * - createTestContext: a full ResolverContext wired to the above
 */

import type { HttpTransport, TransportResponse } from './types/http';
import type { ResolverContext } from './types/context';
import { CACHE_CONFIGS } from './config/cache';
import { DEFAULT_URLS } from './config/urls';
import { createLogger, type Logger } from './lib/logger';
import { MemoryCacheStore } from './services/cache-service';
import { InlineParseExecutor } from './services/parse-pool';

type MockRoute =
  | { kind: 'response'; response: TransportResponse }
  | { kind: 'failure'; error: Error };

/**
 * Mock HTTP transport. Unscripted URLs answer 404.
 */
export class MockTransport implements HttpTransport {
  readonly requests: string[] = [];
  private routes = new Map<string, MockRoute>();

  respond(url: string, status: number, body: string): this {
    this.routes.set(url, { kind: 'response', response: { status, body } });
    return this;
  }

  respondJson(url: string, payload: unknown): this {
    return this.respond(url, 200, JSON.stringify(payload));
  }

  fail(url: string, error: Error = new Error('Network error')): this {
    this.routes.set(url, { kind: 'failure', error });
    return this;
  }

  async get(url: string): Promise<TransportResponse> {
    this.requests.push(url);

    const route = this.routes.get(url);
    if (!route) {
      return { status: 404, body: 'Not Found' };
    }
    if (route.kind === 'failure') {
      throw route.error;
    }
    return { ...route.response };
  }

  /**
   * Number of requests made for one URL
   */
  countFor(url: string): number {
    return this.requests.filter((requested) => requested === url).length;
  }
}

export interface LogRecord {
  level: number;
  msg: string;
  component?: string;
  [key: string]: unknown;
}

/**
 * pino numeric levels
 */
export const LOG_LEVEL = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
} as const;

/**
 * Logger that keeps every entry in memory
 */
export function createCapturingLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  });
  return { logger, records };
}

export function createTestContext(
  overrides: Partial<ResolverContext> = {}
): ResolverContext & { transport: MockTransport; records: LogRecord[] } {
  const { logger, records } = createCapturingLogger();
  const transport = new MockTransport();

  return {
    cache: new MemoryCacheStore(),
    parser: new InlineParseExecutor(),
    urls: DEFAULT_URLS,
    ttl: CACHE_CONFIGS,
    logger,
    ...overrides,
    transport,
    records,
  };
}

/**
 * Minimal HTML page with a title
 */
export function page(title: string, body = ''): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}

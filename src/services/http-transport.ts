/**
 * FetchTransport - HTTP GET over the global fetch of Node.js
 */

import type { HttpTransport, TransportResponse } from '../types/http';
import { DEFAULT_USER_AGENT } from '../config/env';

export interface FetchTransportOptions {
  /** User-Agent header sent with every request */
  userAgent?: string;
  /** Abort requests after this many milliseconds. Unset means no timeout */
  timeoutMs?: number;
}

export class FetchTransport implements HttpTransport {
  private userAgent: string;
  private timeoutMs: number | undefined;

  constructor(options: FetchTransportOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Resolves with the status and body of any HTTP response; rejects on
   * network failure or timeout
   */
  async get(url: string): Promise<TransportResponse> {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': this.userAgent,
      },
      signal: this.timeoutMs === undefined ? undefined : AbortSignal.timeout(this.timeoutMs),
    });

    return {
      status: response.status,
      body: await response.text(),
    };
  }
}

/**
 * Transport type definitions
 */

/**
 * Status and decoded body of a completed GET
 */
export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Performs a GET against a URL.
 *
 * Resolves for every HTTP status; rejects only when no response was received.
 */
export interface HttpTransport {
  get(url: string): Promise<TransportResponse>;
}

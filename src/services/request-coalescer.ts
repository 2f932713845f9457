/**
 * RequestCoalescer - Prevents duplicate in-flight requests
 *
 * When several callers miss the cache for the same URL at once, this ensures
 * only one upstream request is made. The others wait for and share the result
 * of the first.
 *
 * Only used when single-flight mode is enabled; without it concurrent misses
 * each fetch independently.
 */

/**
 * Timestamped entries so hung promises can be swept
 */
interface InFlightEntry {
  promise: Promise<unknown>;
  createdAt: number;
}

/**
 * Maximum time to keep a request in the in-flight map (safety timeout)
 */
const MAX_IN_FLIGHT_TIME_MS = 60000; // 60 seconds

/**
 * How often to run cleanup sweep
 */
const CLEANUP_INTERVAL_MS = 10000; // 10 seconds

/**
 * RequestCoalescer handles request deduplication within a process
 */
export class RequestCoalescer {
  private inFlightRequests = new Map<string, InFlightEntry>();
  private lastCleanupTime = 0;

  /**
   * Execute a fetch function with request coalescing
   *
   * If an identical request is already in flight, returns its result.
   * Otherwise, executes the fetch function and shares the result with
   * requests for the same key that arrive before it settles.
   *
   * @param key - Unique identifier for the request (usually the URL)
   * @param fetchFn - Function that performs the actual fetch
   * @returns The fetch result (may be shared with other concurrent requests)
   */
  async coalesce<T>(key: string, fetchFn: () => Promise<T>): Promise<T> {
    this.cleanupStaleEntries();

    const existing = this.inFlightRequests.get(key);
    if (existing) {
      return (await existing.promise) as T;
    }

    const promise = fetchFn();
    this.inFlightRequests.set(key, {
      promise,
      createdAt: Date.now(),
    });

    // Dropped as soon as it settles: later callers start a fresh request
    try {
      return await promise;
    } finally {
      if (this.inFlightRequests.get(key)?.promise === promise) {
        this.inFlightRequests.delete(key);
      }
    }
  }

  /**
   * Remove entries older than MAX_IN_FLIGHT_TIME_MS, at most once per
   * CLEANUP_INTERVAL_MS
   */
  private cleanupStaleEntries(): void {
    const now = Date.now();

    if (now - this.lastCleanupTime < CLEANUP_INTERVAL_MS) {
      return;
    }
    this.lastCleanupTime = now;

    for (const [key, entry] of this.inFlightRequests) {
      if (now - entry.createdAt > MAX_IN_FLIGHT_TIME_MS) {
        this.inFlightRequests.delete(key);
      }
    }
  }
}

/**
 * ByteFetcher — Raw-byte retrieval capability for remote context sources.
 *
 * The registry depends only on the `ByteFetcher` contract. The default
 * implementation uses the global `fetch` with an abort timeout; retries, if
 * wanted, belong in a wrapper around it.
 */

import { BoundedCache } from '../cache/BoundedCache.js';
import type { Logger } from '../logging.js';
import { RetrievalFailureError } from './errors.js';

export interface ByteFetcher {
  fetch(url: string): Promise<Uint8Array>;
}

/**
 * The slice of the `fetch` API the HTTP fetcher uses.
 */
export type FetchLike = (url: string, init: { signal: AbortSignal; redirect: 'follow' }) => Promise<Response>;

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

export interface HttpByteFetcherOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Create a fetcher that raises `RetrievalFailureError` on timeout,
 * non-2xx status, or transport failure.
 */
export function createHttpByteFetcher(options: HttpByteFetcherOptions = {}): ByteFetcher {
  const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  const logger = options.logger ?? console;

  return {
    async fetch(url: string): Promise<Uint8Array> {
      logger.debug(`GET ${url}`);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const res = await fetchImpl(url, { signal: controller.signal, redirect: 'follow' });
        if (!res.ok) {
          throw new RetrievalFailureError(url, `HTTP ${res.status}`, { status: res.status });
        }
        return new Uint8Array(await res.arrayBuffer());
      } catch (err) {
        if (err instanceof RetrievalFailureError) {
          throw err;
        }
        if (controller.signal.aborted) {
          throw new RetrievalFailureError(url, `timed out after ${timeoutMs}ms`, { timedOut: true, cause: err });
        }
        const message = err instanceof Error ? err.message : String(err);
        throw new RetrievalFailureError(url, message, { cause: err });
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

/**
 * Wrap a fetcher with a per-URL cache. Failures are not cached and
 * concurrent requests for one URL share a single round trip.
 */
export function withFetchCache(fetcher: ByteFetcher, cache: BoundedCache<Uint8Array>): ByteFetcher {
  return {
    fetch(url: string): Promise<Uint8Array> {
      return cache.getOrLoad(url, () => fetcher.fetch(url));
    },
  };
}

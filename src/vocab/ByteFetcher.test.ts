/**
 * Tests for the HTTP byte fetcher and its cache wrapper.
 */

import { describe, it, expect, vi } from 'vitest';
import { BoundedCache } from '../cache/BoundedCache.js';
import { silentLogger } from '../logging.js';
import { createHttpByteFetcher, withFetchCache, type ByteFetcher, type FetchLike } from './ByteFetcher.js';
import { RetrievalFailureError } from './errors.js';

const URL_A = 'https://vocab.test/a.jsonld';

function decode(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

describe('createHttpByteFetcher', () => {
  it('returns the response body as bytes', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response('{"ok":true}', { status: 200 }));
    const fetcher = createHttpByteFetcher({ fetchImpl, logger: silentLogger });

    expect(decode(await fetcher.fetch(URL_A))).toBe('{"ok":true}');
    expect(fetchImpl).toHaveBeenCalledWith(URL_A, expect.objectContaining({ redirect: 'follow' }));
  });

  it('raises RetrievalFailureError on a non-2xx status', async () => {
    const fetchImpl: FetchLike = async () => new Response('missing', { status: 404 });
    const fetcher = createHttpByteFetcher({ fetchImpl, logger: silentLogger });

    const err = await fetcher.fetch(URL_A).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalFailureError);
    expect(err).toMatchObject({
      code: 'RETRIEVAL_FAILURE',
      status: 404,
      statusCode: 502,
      timedOut: false,
      message: `Failed to retrieve ${URL_A}: HTTP 404`,
    });
  });

  it('raises a timed-out RetrievalFailureError when the request is aborted', async () => {
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    const fetcher = createHttpByteFetcher({ fetchImpl, timeoutMs: 10, logger: silentLogger });

    const err = await fetcher.fetch(URL_A).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalFailureError);
    expect(err).toMatchObject({
      timedOut: true,
      statusCode: 504,
      message: `Failed to retrieve ${URL_A}: timed out after 10ms`,
    });
  });

  it('wraps transport errors', async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error('connection refused');
    };
    const fetcher = createHttpByteFetcher({ fetchImpl, logger: silentLogger });

    await expect(fetcher.fetch(URL_A)).rejects.toThrow(`Failed to retrieve ${URL_A}: connection refused`);
  });

  it('logs each request at debug level', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
    const fetcher = createHttpByteFetcher({
      fetchImpl: async () => new Response('{}'),
      logger,
    });

    await fetcher.fetch(URL_A);
    expect(logger.debug).toHaveBeenCalledWith(`GET ${URL_A}`);
  });
});

describe('withFetchCache', () => {
  it('fetches each URL once', async () => {
    const inner: ByteFetcher = { fetch: vi.fn(async (url: string) => new TextEncoder().encode(url)) };
    const cache = new BoundedCache<Uint8Array>('http');
    const fetcher = withFetchCache(inner, cache);

    const [first, second] = await Promise.all([fetcher.fetch(URL_A), fetcher.fetch(URL_A)]);
    await fetcher.fetch(URL_A);

    expect(decode(first)).toBe(URL_A);
    expect(second).toBe(first);
    expect(inner.fetch).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toMatchObject({ misses: 1, coalesced: 1, hits: 1 });
  });

  it('retries a URL whose fetch failed', async () => {
    const fetch = vi
      .fn<(url: string) => Promise<Uint8Array>>()
      .mockRejectedValueOnce(new RetrievalFailureError(URL_A, 'HTTP 503', { status: 503 }))
      .mockResolvedValueOnce(new Uint8Array([1]));
    const fetcher = withFetchCache({ fetch }, new BoundedCache<Uint8Array>('http'));

    await expect(fetcher.fetch(URL_A)).rejects.toBeInstanceOf(RetrievalFailureError);
    expect(await fetcher.fetch(URL_A)).toEqual(new Uint8Array([1]));
  });
});

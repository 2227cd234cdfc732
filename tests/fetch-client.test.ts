import { describe, it, expect } from 'vitest';
import { FetchClient, parseRetryAfter, type FetchClientConfig } from '../lib/fetch-client';
import { IdentityRotator } from '../lib/identity-rotator';
import { ScrapingRateLimiter } from '../lib/scraping-rate-limiter';
import { FakeClock, createFakeFetch, hangingRoute, type Route } from './helpers';

const FEED_URL = 'https://blog.example.com/feed.xml';

function setup(routes: Record<string, Route | Route[]>, config: FetchClientConfig = {}) {
  const clock = new FakeClock(0);
  const { fetchImpl, requests } = createFakeFetch(routes, clock);
  const client = new FetchClient(
    { baseBackoffMs: 1000, maxBackoffMs: 30000, maxAttempts: 3, ...config },
    {
      rateLimiter: new ScrapingRateLimiter({ minDelayMs: 0 }, { clock }),
      identities: new IdentityRotator(['agent-a', 'agent-b']),
      fetchImpl,
      clock
    }
  );
  return { client, clock, requests };
}

describe('FetchClient', () => {
  it('returns the body and response details on success', async () => {
    const { client, requests } = setup({
      [FEED_URL]: { body: '<rss/>', headers: { 'content-type': 'application/rss+xml' } }
    });

    const result = await client.fetch(FEED_URL, { method: 'rss' });

    expect(result).toMatchObject({
      ok: true,
      url: FEED_URL,
      finalUrl: FEED_URL,
      status: 200,
      contentType: 'application/rss+xml',
      body: '<rss/>',
      attempts: 1,
      method: 'rss'
    });
    expect(requests).toHaveLength(1);
  });

  it('sends the next identity with every request', async () => {
    const { client, requests } = setup({ [FEED_URL]: { body: 'ok' } });

    await client.fetch(FEED_URL);
    await client.fetch(FEED_URL);

    expect(requests.map(request => request.userAgent)).toEqual(['agent-a', 'agent-b']);
  });

  it('retries a 503 exactly maxAttempts times with exponential backoff', async () => {
    const { client, clock, requests } = setup({ [FEED_URL]: { status: 503 } });

    const result = await client.fetch(FEED_URL);

    expect(requests).toHaveLength(3);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.attempts).toBe(3);
      expect(result.error).toEqual({ category: 'transient', message: 'HTTP 503', statusCode: 503 });
    }
  });

  it('recovers when a later attempt succeeds', async () => {
    const { client, clock } = setup({ [FEED_URL]: [{ status: 502 }, { body: 'fresh' }] });

    const result = await client.fetch(FEED_URL);

    expect(result).toMatchObject({ ok: true, body: 'fresh', attempts: 2 });
    expect(clock.sleeps).toEqual([1000]);
  });

  it('does not retry a 404', async () => {
    const { client, clock, requests } = setup({ [FEED_URL]: { status: 404 } });

    const result = await client.fetch(FEED_URL);

    expect(requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
    expect(result).toMatchObject({
      ok: false,
      attempts: 1,
      error: { category: 'permanent', message: 'HTTP 404', statusCode: 404 }
    });
  });

  it('cancels the body of every failed response', async () => {
    let cancelled = 0;
    const { client, requests } = setup(
      {
        [FEED_URL]: () =>
          new Response(
            new ReadableStream({
              cancel() {
                cancelled++;
              }
            }),
            { status: 503 }
          )
      },
      { maxAttempts: 2 }
    );

    const result = await client.fetch(FEED_URL);

    expect(result.ok).toBe(false);
    expect(requests).toHaveLength(2);
    expect(cancelled).toBe(2);
  });

  it('waits at least the Retry-After delay on 429', async () => {
    const { client, clock } = setup({
      [FEED_URL]: [{ status: 429, headers: { 'retry-after': '5' } }, { body: 'ok' }]
    });

    const result = await client.fetch(FEED_URL);

    expect(result).toMatchObject({ ok: true, attempts: 2 });
    expect(clock.sleeps).toEqual([5000]);
  });

  it('caps Retry-After at maxBackoffMs', async () => {
    const { client, clock } = setup(
      { [FEED_URL]: [{ status: 503, headers: { 'retry-after': '120' } }, { body: 'ok' }] },
      { maxBackoffMs: 10000 }
    );

    await client.fetch(FEED_URL);

    expect(clock.sleeps).toEqual([10000]);
  });

  it('reports a timeout as a transient failure', async () => {
    const { client } = setup({ [FEED_URL]: hangingRoute }, { timeoutMs: 20, maxAttempts: 1 });

    const result = await client.fetch(FEED_URL);

    expect(result).toMatchObject({
      ok: false,
      attempts: 1,
      error: { category: 'transient', message: `Request to ${FEED_URL} timed out after 20ms` }
    });
  });

  it('retries connection errors', async () => {
    const { client, requests } = setup({}, { maxAttempts: 2 });

    const result = await client.fetch(FEED_URL);

    expect(requests).toHaveLength(2);
    expect(result).toMatchObject({
      ok: false,
      attempts: 2,
      error: { category: 'transient', message: `Network error for ${FEED_URL}: fetch failed (ECONNREFUSED)` }
    });
  });

  it('treats other request errors as permanent', async () => {
    const { client, requests } = setup({
      [FEED_URL]: () => {
        throw new TypeError('Invalid URL');
      }
    });

    const result = await client.fetch(FEED_URL);

    expect(requests).toHaveLength(1);
    expect(result).toMatchObject({ ok: false, error: { category: 'permanent' } });
  });

  it('returns a cancelled failure without fetching when already aborted', async () => {
    const { client, requests } = setup({ [FEED_URL]: { body: 'ok' } });
    const controller = new AbortController();
    controller.abort();

    const result = await client.fetch(FEED_URL, { signal: controller.signal });

    expect(requests).toHaveLength(0);
    expect(result).toMatchObject({ ok: false, attempts: 1, error: { category: 'cancelled' } });
  });

  it('stops retrying when aborted during backoff', async () => {
    const controller = new AbortController();
    const { client, requests } = setup({
      [FEED_URL]: () => {
        controller.abort();
        return new Response('', { status: 503 });
      }
    });

    const result = await client.fetch(FEED_URL, { signal: controller.signal });

    expect(requests).toHaveLength(1);
    expect(result).toMatchObject({ ok: false, attempts: 1, error: { category: 'cancelled' } });
  });

  it('computes capped exponential backoff', () => {
    const { client } = setup({});

    expect([1, 2, 3, 4, 5, 6].map(attempt => client.backoffDelay(attempt))).toEqual([
      1000, 2000, 4000, 8000, 16000, 30000
    ]);
    expect(client.backoffDelay(1, 5000)).toBe(5000);
    expect(client.backoffDelay(3, 1000)).toBe(4000);
  });
});

describe('parseRetryAfter', () => {
  it('reads delta-seconds', () => {
    expect(parseRetryAfter('120', 0)).toBe(120000);
  });

  it('reads an HTTP date relative to now', () => {
    const at = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT', at - 10000)).toBe(10000);
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT', at + 10000)).toBe(0);
  });

  it('ignores missing or unreadable values', () => {
    expect(parseRetryAfter(null, 0)).toBeUndefined();
    expect(parseRetryAfter('soon', 0)).toBeUndefined();
  });
});

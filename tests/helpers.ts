import { RequestAbortedError } from '../lib/errors';
import type { SourceConfig } from '../lib/types';
import type { Clock } from '../lib/utils/timing';
import { DEFAULT_SELECTORS } from '../lib/config';

/**
 * Clock whose sleeps return on the next microtask and move time forward
 */
export class FakeClock implements Clock {
  current: number;
  readonly sleeps: number[] = [];

  constructor(start = Date.UTC(2024, 0, 15, 9, 0, 0)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RequestAbortedError();
    }
    this.sleeps.push(ms);
    await Promise.resolve();
    this.current += Math.max(0, ms);
  }
}

export interface RecordedRequest {
  url: string;
  userAgent: string | null;
  at: number;
}

export type RouteHandler = (url: string, init?: RequestInit) => Response | Promise<Response>;

export type Route = RouteHandler | { status?: number; body?: string; headers?: Record<string, string> };

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * fetch stand-in keyed by URL. Unknown URLs reject like a refused connection.
 * A route may be a handler or a static response; an array is served in order,
 * repeating its last entry.
 */
export function createFakeFetch(routes: Record<string, Route | Route[]>, clock?: Clock) {
  const requests: RecordedRequest[] = [];
  const served = new Map<string, number>();

  const fetchImpl: typeof fetch = async (input, init) => {
    const url = requestUrl(input);
    requests.push({
      url,
      userAgent: new Headers(init?.headers).get('user-agent'),
      at: clock ? clock.now() : Date.now()
    });

    const entry = routes[url];
    if (!entry) {
      throw new TypeError('fetch failed', {
        cause: Object.assign(new Error(`connect ECONNREFUSED ${url}`), { code: 'ECONNREFUSED' })
      });
    }

    let route: Route;
    if (Array.isArray(entry)) {
      const index = served.get(url) ?? 0;
      served.set(url, index + 1);
      route = entry[Math.min(index, entry.length - 1)];
    } else {
      route = entry;
    }

    if (typeof route === 'function') {
      return route(url, init);
    }
    return new Response(route.body ?? '', { status: route.status ?? 200, headers: route.headers });
  };

  return { fetchImpl, requests };
}

/**
 * Handler that never answers until the request is aborted
 */
export const hangingRoute: RouteHandler = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    const fail = () => {
      const error = new Error('This operation was aborted');
      error.name = 'AbortError';
      reject(error);
    };
    if (signal?.aborted) {
      fail();
      return;
    }
    signal?.addEventListener('abort', fail, { once: true });
  });

export function rssFeed(items: Array<{ title: string; link: string; pubDate?: string; description?: string }>): string {
  const entries = items
    .map(
      item => `
    <item>
      <title>${item.title}</title>
      <link>${item.link}</link>
      ${item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : ''}
      ${item.description ? `<description>${item.description}</description>` : ''}
    </item>`
    )
    .join('');

  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Test Feed</title>
    <link>https://blog.example.com/</link>
    <description>Fixture feed</description>${entries}
  </channel>
</rss>`;
}

export function listingPage(cards: Array<{ title: string; href: string; date?: string }>): string {
  const body = cards
    .map(
      card => `
    <article>
      <h2><a href="${card.href}">${card.title}</a></h2>
      ${card.date ? `<time datetime="${card.date}">${card.date}</time>` : ''}
    </article>`
    )
    .join('');
  return `<!doctype html><html><body><main>${body}</main></body></html>`;
}

export function source(overrides: Partial<SourceConfig> & { name: string }): SourceConfig {
  return {
    tier: 'tier1',
    selectors: { ...DEFAULT_SELECTORS },
    ...overrides
  };
}

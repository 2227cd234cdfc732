import { describe, it, expect } from 'vitest';
import { DEFAULT_SELECTORS } from '../lib/config';
import { ParseError } from '../lib/errors';
import { HtmlFallbackParser } from '../lib/parsers/html-parser';
import type { ParseContext } from '../lib/types';
import { listingPage } from './helpers';

const context: ParseContext = {
  source: 'Globex Newsroom',
  tier: 'tier2',
  baseUrl: 'https://news.globex.example.com/blog/'
};

describe('HtmlFallbackParser', () => {
  const parser = new HtmlFallbackParser();

  it('extracts articles with the default selectors', () => {
    const page = listingPage([
      { title: 'Globex opens a new data center', href: '/blog/data-center', date: '2024-03-01' },
      { title: 'Quarterly product roundup', href: 'https://news.globex.example.com/blog/roundup' }
    ]);

    const result = parser.parse(page, DEFAULT_SELECTORS, context);

    expect(result.error).toBeUndefined();
    expect(result.skipped).toBe(0);
    expect(result.articles).toEqual([
      {
        source: 'Globex Newsroom',
        tier: 'tier2',
        title: 'Globex opens a new data center',
        link: 'https://news.globex.example.com/blog/data-center',
        publishedAt: '2024-03-01T00:00:00.000Z',
        summary: undefined,
        method: 'html'
      },
      {
        source: 'Globex Newsroom',
        tier: 'tier2',
        title: 'Quarterly product roundup',
        link: 'https://news.globex.example.com/blog/roundup',
        publishedAt: undefined,
        summary: undefined,
        method: 'html'
      }
    ]);
  });

  it('uses custom selectors, date text and summaries', () => {
    const page = `
      <div class="card">
        <span class="card__title">Hooli adds team workspaces</span>
        <a class="card__link" href="workspaces">Read</a>
        <span class="card__date">5.1.2024</span>
        <p class="card__excerpt">Workspaces   group projects &amp; people.</p>
      </div>`;

    const result = parser.parse(
      page,
      { articles: '.card', title: '.card__title', link: '.card__link', date: '.card__date', summary: '.card__excerpt' },
      context
    );

    expect(result.articles).toEqual([
      {
        source: 'Globex Newsroom',
        tier: 'tier2',
        title: 'Hooli adds team workspaces',
        link: 'https://news.globex.example.com/blog/workspaces',
        publishedAt: '2024-01-05T00:00:00.000Z',
        summary: 'Workspaces group projects & people.',
        method: 'html'
      }
    ]);
  });

  it('keeps escaped markup in titles as literal text', () => {
    const page = listingPage([{ title: 'Using &amp;lt;div&amp;gt; wrappers in React apps', href: '/p' }]);

    const result = parser.parse(page, DEFAULT_SELECTORS, context);

    expect(result.articles.map(article => article.title)).toEqual(['Using &lt;div&gt; wrappers in React apps']);
  });

  it('falls back to the anchor around the title', () => {
    const page = `<div class="post"><a href="/p/1"><h3>Title wrapped in a link</h3></a></div>`;

    const result = parser.parse(page, { articles: '.post', title: 'h3', link: 'a.missing', date: 'time' }, context);

    expect(result.articles[0].link).toBe('https://news.globex.example.com/p/1');
  });

  it('skips containers without a title or a link', () => {
    const page = `
      <article><h2><a href="/ok">A complete article card</a></h2></article>
      <article><a href="/no-title">Card without heading</a></article>
      <article><h2>Heading without any link</h2></article>`;

    const result = parser.parse(page, DEFAULT_SELECTORS, context);

    expect(result.articles.map(article => article.title)).toEqual(['A complete article card']);
    expect(result.skipped).toBe(2);
  });

  it('keeps only the first maxItems containers', () => {
    const page = listingPage([
      { title: 'First listing entry', href: '/1' },
      { title: 'Second listing entry', href: '/2' },
      { title: 'Third listing entry', href: '/3' }
    ]);

    const result = parser.parse(page, DEFAULT_SELECTORS, { ...context, maxItems: 2 });

    expect(result.articles.map(article => article.link)).toEqual([
      'https://news.globex.example.com/1',
      'https://news.globex.example.com/2'
    ]);
  });

  it('returns no articles when nothing matches', () => {
    const result = parser.parse('<html><body><p>Empty</p></body></html>', DEFAULT_SELECTORS, context);

    expect(result).toEqual({ articles: [], skipped: 0 });
  });

  it('reports an invalid selector as a ParseError', () => {
    const result = parser.parse(listingPage([]), { ...DEFAULT_SELECTORS, articles: 'div[[' }, context);

    expect(result.articles).toEqual([]);
    expect(result.error).toBeInstanceOf(ParseError);
    expect(result.error?.format).toBe('html');
  });
});

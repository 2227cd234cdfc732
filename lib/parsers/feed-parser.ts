import Parser from 'rss-parser';
import { ParseError, errorMessage } from '../errors';
import { parsePublishedDate } from '../formatters/date-parser';
import { collapseText, decodeHTMLEntities, toSummary } from '../formatters/text-cleaner';
import { silentLogger, type Logger } from '../logger';
import type { CandidateArticle, ParseContext, ParseResult } from '../types';

export const DEFAULT_MAX_ITEMS = 10;
export const SUMMARY_LENGTH = 300;

type FeedItem = Parser.Item;

function resolveLink(raw: string | undefined, baseUrl: string): string {
  const value = raw?.trim();
  if (!value) return '';
  try {
    return new URL(value, baseUrl).toString();
  } catch {
    // Left as-is; the validator rejects it as an invalid link
    return value;
  }
}

/**
 * Parses RSS 0.9x/1.0/2.0 and Atom payloads into candidate articles.
 * Fetching happens elsewhere; this only sees the payload text.
 */
export class FeedParser {
  private readonly parser = new Parser<object, object>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async parse(payload: string, context: ParseContext): Promise<ParseResult> {
    const maxItems = context.maxItems ?? DEFAULT_MAX_ITEMS;

    let items: FeedItem[];
    try {
      const feed = await this.parser.parseString(payload);
      items = feed.items;
    } catch (error) {
      const message = `Malformed feed from ${context.baseUrl}: ${errorMessage(error)}`;
      this.logger.warn(`🔍 ${message}`);
      return {
        articles: [],
        skipped: 0,
        error: new ParseError(message, {
          format: 'feed',
          url: context.baseUrl,
          cause: error instanceof Error ? error : undefined
        })
      };
    }

    if (items.length === 0) {
      this.logger.warn(`⚠️ Feed from ${context.baseUrl} contains no items`);
    }

    const articles = items.slice(0, maxItems).map(item => this.toCandidate(item, context));
    this.logger.debug(`Parsed ${articles.length} of ${items.length} feed items from ${context.baseUrl}`);
    return { articles, skipped: 0 };
  }

  private toCandidate(item: FeedItem, context: ParseContext): CandidateArticle {
    // Some feeds only carry the permalink in <guid>
    const guidLink = item.guid && /^https?:\/\//i.test(item.guid) ? item.guid : undefined;

    return {
      source: context.source,
      tier: context.tier,
      // Feeds often escape titles twice
      title: collapseText(decodeHTMLEntities(item.title ?? '')),
      link: resolveLink(item.link ?? guidLink, context.baseUrl),
      publishedAt: parsePublishedDate(item.isoDate) ?? parsePublishedDate(item.pubDate),
      summary: toSummary(item.contentSnippet ?? item.summary ?? item.content, SUMMARY_LENGTH),
      method: 'rss'
    };
  }
}

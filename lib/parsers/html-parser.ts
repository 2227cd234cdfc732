import * as cheerio from 'cheerio';
import { ParseError, errorMessage } from '../errors';
import { parsePublishedDate } from '../formatters/date-parser';
import { collapseText, truncateText } from '../formatters/text-cleaner';
import { silentLogger, type Logger } from '../logger';
import type { CandidateArticle, ParseContext, ParseResult, SourceSelectors } from '../types';
import { DEFAULT_MAX_ITEMS, SUMMARY_LENGTH } from './feed-parser';

/**
 * Listing-page scraper driven by per-source CSS selectors.
 *
 * Each container matched by `selectors.articles` yields at most one article.
 * Containers without a title or a link are skipped and counted.
 */
export class HtmlFallbackParser {
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  parse(document: string, selectors: SourceSelectors, context: ParseContext): ParseResult {
    const maxItems = context.maxItems ?? DEFAULT_MAX_ITEMS;
    const articles: CandidateArticle[] = [];
    let skipped = 0;

    try {
      const $ = cheerio.load(document);
      const containers = $(selectors.articles);

      if (containers.length === 0) {
        this.logger.warn(`⚠️ No "${selectors.articles}" containers on ${context.baseUrl}`);
      }

      containers.slice(0, maxItems).each((_, element) => {
        const $container = $(element);
        const $title = $container.find(selectors.title).first();
        const title = collapseText($title.text());
        // Link element first, then the anchor around the title, then the container itself
        const href = [
          $container.find(selectors.link).first().attr('href'),
          $title.closest('a').attr('href'),
          $container.is('a') ? $container.attr('href') : undefined
        ]
          .map(value => value?.trim())
          .find(value => Boolean(value));

        if (!title || !href) {
          skipped++;
          return;
        }

        const $date = $container.find(selectors.date).first();
        const rawDate = $date.attr('datetime') ?? $date.text();
        const summaryText = selectors.summary ? collapseText($container.find(selectors.summary).first().text()) : '';
        const summary = summaryText ? truncateText(summaryText, SUMMARY_LENGTH) : undefined;

        articles.push({
          source: context.source,
          tier: context.tier,
          title,
          link: this.resolveUrl(href, context.baseUrl),
          publishedAt: parsePublishedDate(rawDate),
          summary,
          method: 'html'
        });
      });
    } catch (error) {
      // css-select throws on selectors it cannot compile
      const message = `Cannot parse ${context.baseUrl} with selectors for ${context.source}: ${errorMessage(error)}`;
      this.logger.error(`❌ ${message}`);
      return {
        articles: [],
        skipped,
        error: new ParseError(message, {
          format: 'html',
          url: context.baseUrl,
          cause: error instanceof Error ? error : undefined
        })
      };
    }

    if (skipped > 0) {
      this.logger.debug(`Skipped ${skipped} containers without title or link on ${context.baseUrl}`);
    }
    this.logger.debug(`📰 Extracted ${articles.length} articles from ${context.baseUrl}`);
    return { articles, skipped };
  }

  private resolveUrl(url: string, baseUrl: string): string {
    try {
      return new URL(url, baseUrl).toString();
    } catch {
      // Left as-is; the validator rejects it as an invalid link
      return url;
    }
  }
}

/**
 * Article validation
 *
 * Drops candidates that are not real articles: missing fields, navigation
 * labels scraped as titles, boilerplate phrases. Rejections are counted per
 * reason and never stop the pipeline.
 */

import { DEFAULT_STOPLIST } from './config';
import type { CandidateArticle, RejectionCounts, RejectionReason } from './types';

export interface ValidationOptions {
  /** Titles shorter than this are UI noise (default: 10) */
  minTitleLength?: number;
  maxTitleLength?: number;
  /** Boilerplate titles, compared case- and punctuation-insensitively */
  stoplist?: readonly string[];
}

export type ValidationResult =
  | { valid: true }
  | { valid: false; reason: RejectionReason; detail: string };

export interface FilterResult<T extends CandidateArticle> {
  accepted: T[];
  rejected: RejectionCounts;
  rejectedTotal: number;
}

/**
 * Lower-case, drop trailing punctuation and ellipses, collapse whitespace
 */
function normalizePhrase(text: string): string {
  return text
    .toLowerCase()
    .replace(/[\s.…:!?»›→>-]+$/u, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isAbsoluteHttpUrl(link: string): boolean {
  try {
    const parsed = new URL(link);
    return ['http:', 'https:'].includes(parsed.protocol) && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}

export class ContentValidator {
  private readonly minTitleLength: number;
  private readonly maxTitleLength?: number;
  private readonly stoplist: Set<string>;

  constructor(options: ValidationOptions = {}) {
    this.minTitleLength = options.minTitleLength ?? 10;
    this.maxTitleLength = options.maxTitleLength;
    this.stoplist = new Set((options.stoplist ?? DEFAULT_STOPLIST).map(normalizePhrase).filter(Boolean));
  }

  validate(article: CandidateArticle): ValidationResult {
    const title = article.title.trim();

    if (!title) {
      return { valid: false, reason: 'empty-title', detail: 'Title is empty' };
    }

    if (!article.link || !isAbsoluteHttpUrl(article.link)) {
      return { valid: false, reason: 'invalid-link', detail: `Link is not an absolute http(s) URL: "${article.link}"` };
    }

    if (this.stoplist.has(normalizePhrase(title))) {
      return { valid: false, reason: 'stoplisted-title', detail: `Boilerplate title "${title}"` };
    }

    if (title.length < this.minTitleLength) {
      return {
        valid: false,
        reason: 'title-too-short',
        detail: `Title shorter than ${this.minTitleLength} characters`
      };
    }

    if (this.maxTitleLength !== undefined && title.length > this.maxTitleLength) {
      return {
        valid: false,
        reason: 'title-too-long',
        detail: `Title longer than ${this.maxTitleLength} characters`
      };
    }

    return { valid: true };
  }

  isValid(article: CandidateArticle): boolean {
    return this.validate(article).valid;
  }

  filter<T extends CandidateArticle>(articles: readonly T[]): FilterResult<T> {
    const accepted: T[] = [];
    const rejected: RejectionCounts = {};
    let rejectedTotal = 0;

    for (const article of articles) {
      const result = this.validate(article);
      if (result.valid) {
        accepted.push(article);
      } else {
        rejected[result.reason] = (rejected[result.reason] ?? 0) + 1;
        rejectedTotal++;
      }
    }

    return { accepted, rejected, rejectedTotal };
  }
}

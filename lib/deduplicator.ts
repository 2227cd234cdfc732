import crypto from 'crypto';
import type { Article, CandidateArticle } from './types';

const TRACKING_PARAMS = ['utm_source', 'utm_medium', 'utm_campaign', 'utm_term', 'utm_content', 'ref', 'fbclid', 'gclid'];

/**
 * Normalize title: lowercase, remove punctuation, collapse whitespace
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Normalize link: lower-case host, no fragment, no tracking params,
 * sorted query, no trailing slash
 */
export function normalizeLink(link: string): string {
  try {
    const parsed = new URL(link.trim());
    parsed.hash = '';
    TRACKING_PARAMS.forEach(param => parsed.searchParams.delete(param));
    parsed.searchParams.sort();
    if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
      parsed.pathname = parsed.pathname.replace(/\/+$/, '');
    }
    return parsed.toString().replace(/\/$/, '');
  } catch {
    return link.trim().toLowerCase();
  }
}

/**
 * SHA-256 over normalized (title, link). Re-published copies that differ
 * only in case, punctuation or tracking parameters collapse to one value.
 */
export function fingerprint(title: string, link: string): string {
  const composite = `${normalizeTitle(title)}|${normalizeLink(link)}`;
  return crypto.createHash('sha256').update(composite).digest('hex');
}

/**
 * Run-scoped set of fingerprints seen so far; first occurrence wins.
 *
 * Given an owner, `dedupe` also drops an article whose normalized title another
 * owner already kept, so one announcement syndicated under different links is
 * recorded once. Titles repeated by the same owner are left to the fingerprint.
 *
 * Check-and-insert is synchronous, so concurrent pipelines on the event loop
 * cannot both claim the same fingerprint.
 */
export class Deduplicator {
  private readonly seen = new Set<string>();
  private readonly titleOwners = new Map<string, string>();
  private duplicateCount = 0;

  fingerprint(title: string, link: string): string {
    return fingerprint(title, link);
  }

  /**
   * True for a repeat (counted); otherwise records the fingerprint and returns false
   */
  isDuplicate(value: string): boolean {
    if (this.seen.has(value)) {
      this.duplicateCount++;
      return true;
    }
    this.seen.add(value);
    return false;
  }

  has(value: string): boolean {
    return this.seen.has(value);
  }

  /**
   * Attach the fingerprint to a validated candidate
   */
  identify(candidate: CandidateArticle): Article {
    return Object.freeze({ ...candidate, fingerprint: this.fingerprint(candidate.title, candidate.link) });
  }

  /**
   * True when a different owner already kept this title; otherwise claims it for `owner`
   */
  isTitleClaimed(title: string, owner: string): boolean {
    const key = normalizeTitle(title);
    if (!key) return false;
    const claimedBy = this.titleOwners.get(key);
    if (claimedBy !== undefined && claimedBy !== owner) {
      this.duplicateCount++;
      return true;
    }
    this.titleOwners.set(key, owner);
    return false;
  }

  /**
   * Keep the first article per fingerprint (and per title across owners), in input order
   */
  dedupe(articles: readonly Article[], owner?: string): { unique: Article[]; duplicates: number } {
    const unique: Article[] = [];
    let duplicates = 0;
    for (const article of articles) {
      if (this.isDuplicate(article.fingerprint) || (owner !== undefined && this.isTitleClaimed(article.title, owner))) {
        duplicates++;
      } else {
        unique.push(article);
      }
    }
    return { unique, duplicates };
  }

  get size(): number {
    return this.seen.size;
  }

  get duplicates(): number {
    return this.duplicateCount;
  }
}

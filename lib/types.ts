/**
 * Core types shared by the collection pipeline
 */

import type { ErrorCategory, ParseError } from './errors';

export type FetchMethod = 'rss' | 'html';

export interface SourceSelectors {
  /** Container for one article, e.g. `article` or `.post-card` */
  articles: string;
  title: string;
  link: string;
  date: string;
  /** Optional excerpt element inside the container */
  summary?: string;
}

export interface SourceConfig {
  name: string;
  /** Priority classification, e.g. `tier1` for primary competitors */
  tier: string;
  feedUrl?: string;
  pageUrl?: string;
  selectors: SourceSelectors;
}

/**
 * Candidate produced by a parser, before validation and fingerprinting
 */
export interface CandidateArticle {
  source: string;
  tier: string;
  title: string;
  link: string;
  /** ISO-8601, absent when the source date could not be parsed */
  publishedAt?: string;
  summary?: string;
  method: FetchMethod;
}

export interface Article extends CandidateArticle {
  /** Normalized (title, link) hash, unique within a run */
  readonly fingerprint: string;
}

export interface ErrorDetail {
  category: ErrorCategory;
  message: string;
  statusCode?: number;
}

interface FetchResultBase {
  url: string;
  /** Attempts made, including the successful one */
  attempts: number;
  elapsedMs: number;
  method?: FetchMethod;
}

export interface FetchSuccess extends FetchResultBase {
  ok: true;
  /** URL after redirects */
  finalUrl: string;
  status: number;
  contentType: string;
  body: string;
}

export interface FetchFailure extends FetchResultBase {
  ok: false;
  error: ErrorDetail;
}

export type FetchResult = FetchSuccess | FetchFailure;

export type PipelineState = 'init' | 'try_rss' | 'try_html' | 'validate' | 'dedupe' | 'done' | 'failed';

export const REJECTION_REASONS = [
  'empty-title',
  'invalid-link',
  'title-too-short',
  'title-too-long',
  'stoplisted-title'
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type RejectionCounts = Partial<Record<RejectionReason, number>>;

/**
 * Outcome of one fetch-and-parse method for a source
 */
export interface MethodAttempt {
  method: FetchMethod;
  url: string;
  success: boolean;
  /** Candidates the parser produced */
  parsed: number;
  /** Candidates left after validation */
  accepted: number;
  fetchAttempts: number;
  durationMs: number;
  error?: ErrorDetail;
}

export interface SourceOutcome {
  source: string;
  tier: string;
  status: 'done' | 'failed';
  /** Method whose articles were kept; null when the source failed */
  method: FetchMethod | null;
  articles: Article[];
  /** States visited, in order */
  states: PipelineState[];
  attempts: MethodAttempt[];
  rejected: RejectionCounts;
  /** Repeats dropped within this source */
  duplicates: number;
  durationMs: number;
  error?: ErrorDetail;
}

export interface SourceMetrics {
  source: string;
  tier: string;
  method: FetchMethod | null;
  /** Articles attributed to this source after run-wide deduplication */
  articleCount: number;
  success: boolean;
  durationMs: number;
  error?: ErrorDetail;
  states: PipelineState[];
  attempts: MethodAttempt[];
  parsed: number;
  rejected: number;
  /** Repeats dropped within the source plus those lost to earlier sources */
  duplicates: number;
}

export interface RunTotals {
  sourcesAttempted: number;
  sourcesSucceeded: number;
  sourcesFailed: number;
  totalArticles: number;
  rejected: number;
  duplicates: number;
  durationMs: number;
}

export interface RunMetrics {
  startedAt: string;
  finishedAt: string;
  /** True when the run was aborted before every source finished */
  cancelled: boolean;
  sources: readonly SourceMetrics[];
  totals: RunTotals;
}

export interface CollectionResult {
  articles: readonly Article[];
  metrics: RunMetrics;
}

export interface ParseContext {
  source: string;
  tier: string;
  /** Document URL; relative links resolve against it */
  baseUrl: string;
  /** Keep at most this many entries (first ones win) */
  maxItems?: number;
}

export interface ParseResult {
  articles: CandidateArticle[];
  /** Entries dropped because a required element was missing */
  skipped: number;
  error?: ParseError;
}

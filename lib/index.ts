/**
 * Competitive intelligence article collector.
 *
 * Collects recent articles from competitor blogs and news feeds (RSS first,
 * listing-page scraping as fallback), validates and deduplicates them, and
 * returns articles plus per-source run metrics.
 *
 * @example
 * ```typescript
 * import { collect, toReportPayload, writeReportPayload } from 'competitive-intel-collector';
 *
 * const result = await collect({
 *   sources: [
 *     { name: 'Acme Blog', tier: 'tier1', feedUrl: 'https://acme.example/feed.xml' },
 *     { name: 'Globex News', tier: 'tier2', pageUrl: 'https://globex.example/news' }
 *   ]
 * });
 * console.log(result.metrics.totals);
 * await writeReportPayload('data', toReportPayload(result));
 * ```
 */

import { CollectionRun, type CollectionRunDeps } from './collection-run';
import { loadConfig, type CollectorConfigInput } from './config';
import type { CollectionResult } from './types';

/**
 * Validate a configuration and run one collection pass over its sources.
 * Throws ConfigurationError for an invalid configuration; source failures
 * only show up in the metrics.
 */
export async function collect(
  config: CollectorConfigInput,
  options: CollectionRunDeps & { signal?: AbortSignal } = {}
): Promise<CollectionResult> {
  const { signal, ...deps } = options;
  const validated = loadConfig(config);
  return CollectionRun.fromConfig(validated, deps).execute(validated.sources, { signal });
}

// Run orchestration
export { CollectionRun, type CollectionRunOptions, type CollectionRunDeps } from './collection-run';
export { SourcePipeline, type SourcePipelineDeps } from './source-pipeline';

// Fetching
export {
  FetchClient,
  parseRetryAfter,
  type FetchClientConfig,
  type FetchClientDeps,
  type FetchOptions
} from './fetch-client';
export { IdentityRotator, DEFAULT_USER_AGENT } from './identity-rotator';
export {
  ScrapingRateLimiter,
  createRateLimiter,
  RATE_LIMITER_PRESETS,
  type RateLimiterConfig,
  type RateLimiterPreset
} from './scraping-rate-limiter';

// Parsing
export { FeedParser } from './parsers/feed-parser';
export { HtmlFallbackParser } from './parsers/html-parser';
export { parseDate, parsePublishedDate } from './formatters/date-parser';
export { stripHTML, decodeHTMLEntities, truncateText, toSummary } from './formatters/text-cleaner';

// Validation and deduplication
export { ContentValidator, isAbsoluteHttpUrl, type ValidationOptions, type ValidationResult } from './content-validator';
export { Deduplicator, fingerprint, normalizeTitle, normalizeLink } from './deduplicator';

// Configuration
export {
  loadConfig,
  readConfigFile,
  parseSourceConfig,
  CollectorConfigSchema,
  SourceConfigSchema,
  DEFAULT_SELECTORS,
  DEFAULT_STOPLIST,
  type CollectorConfig,
  type CollectorConfigInput
} from './config';

// Output
export {
  toReportPayload,
  writeReportPayload,
  reportFileName,
  type ReportPayload,
  type ReportArticle,
  type ReportSourceMetrics
} from './report-payload';

// Errors
export {
  CollectorError,
  TransientFetchError,
  RequestTimeoutError,
  PermanentFetchError,
  RequestAbortedError,
  ParseError,
  ConfigurationError,
  isCollectorError,
  isAbortError,
  categorizeError,
  type ErrorCategory
} from './errors';

// Logging and time
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from './logger';
export { systemClock, sleep, type Clock } from './utils/timing';

// Types
export { REJECTION_REASONS } from './types';
export type {
  Article,
  CandidateArticle,
  CollectionResult,
  ErrorDetail,
  FetchFailure,
  FetchMethod,
  FetchResult,
  FetchSuccess,
  MethodAttempt,
  ParseContext,
  ParseResult,
  PipelineState,
  RejectionCounts,
  RejectionReason,
  RunMetrics,
  RunTotals,
  SourceConfig,
  SourceMetrics,
  SourceOutcome,
  SourceSelectors
} from './types';

import { ContentValidator } from './content-validator';
import { Deduplicator } from './deduplicator';
import { FetchClient } from './fetch-client';
import { silentLogger, type Logger } from './logger';
import { FeedParser } from './parsers/feed-parser';
import { HtmlFallbackParser } from './parsers/html-parser';
import {
  REJECTION_REASONS,
  type CandidateArticle,
  type ErrorDetail,
  type FetchMethod,
  type MethodAttempt,
  type PipelineState,
  type RejectionCounts,
  type SourceConfig,
  type SourceOutcome
} from './types';
import { systemClock, type Clock } from './utils/timing';

export interface SourcePipelineDeps {
  fetchClient: FetchClient;
  feedParser?: FeedParser;
  htmlParser?: HtmlFallbackParser;
  validator?: ContentValidator;
  logger?: Logger;
  clock?: Clock;
  /** Entries kept per method (default: 10) */
  maxItems?: number;
}

interface MethodRun {
  attempt: MethodAttempt;
  candidates: CandidateArticle[];
}

function mergeCounts(target: RejectionCounts, source: RejectionCounts): void {
  for (const reason of REJECTION_REASONS) {
    const count = source[reason];
    if (count) {
      target[reason] = (target[reason] ?? 0) + count;
    }
  }
}

/**
 * Per-source state machine:
 *
 *   init → try_rss → validate ─┬─ (articles) ─────────────→ dedupe → done
 *             │                └─ (none, page URL) → try_html
 *             └─ (failed) → try_html → validate → dedupe → done
 *                              └─ (failed) → failed
 *
 * `try_rss` runs only with a feed URL and `try_html` only with a page URL.
 * Every outcome is returned; nothing is thrown.
 */
export class SourcePipeline {
  private readonly fetchClient: FetchClient;
  private readonly feedParser: FeedParser;
  private readonly htmlParser: HtmlFallbackParser;
  private readonly validator: ContentValidator;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly maxItems?: number;

  constructor(deps: SourcePipelineDeps) {
    this.fetchClient = deps.fetchClient;
    this.logger = deps.logger ?? silentLogger;
    this.feedParser = deps.feedParser ?? new FeedParser({ logger: this.logger });
    this.htmlParser = deps.htmlParser ?? new HtmlFallbackParser({ logger: this.logger });
    this.validator = deps.validator ?? new ContentValidator();
    this.clock = deps.clock ?? systemClock;
    this.maxItems = deps.maxItems;
  }

  async run(source: SourceConfig, options: { signal?: AbortSignal } = {}): Promise<SourceOutcome> {
    const { signal } = options;
    const started = this.clock.now();
    const states: PipelineState[] = [];
    const attempts: MethodAttempt[] = [];
    const rejected: RejectionCounts = {};

    let state: PipelineState = 'init';
    let current: MethodRun | null = null;
    let accepted: CandidateArticle[] = [];
    let method: FetchMethod | null = null;
    let duplicates = 0;
    let articles: SourceOutcome['articles'] = [];
    let lastError: ErrorDetail | undefined;

    this.logger.info(`🎭 Processing source: ${source.name} (${source.tier})`);

    while (state !== 'done' && state !== 'failed') {
      states.push(state);

      if (signal?.aborted) {
        lastError = { category: 'cancelled', message: `Run cancelled while ${source.name} was in ${state}` };
        state = 'failed';
        break;
      }

      switch (state) {
        case 'init': {
          if (source.feedUrl) {
            state = 'try_rss';
          } else if (source.pageUrl) {
            state = 'try_html';
          } else {
            lastError = { category: 'unavailable', message: `${source.name} has neither a feed URL nor a page URL` };
            state = 'failed';
          }
          break;
        }

        case 'try_rss':
        case 'try_html': {
          const methodName: FetchMethod = state === 'try_rss' ? 'rss' : 'html';
          const url = methodName === 'rss' ? source.feedUrl : source.pageUrl;
          // init only routes here when the URL exists
          if (!url) {
            state = 'failed';
            break;
          }

          const run = await this.runMethod(methodName, url, source, signal);
          attempts.push(run.attempt);

          if (run.attempt.success) {
            current = run;
            state = 'validate';
          } else {
            lastError = run.attempt.error;
            const canFallBack = methodName === 'rss' && Boolean(source.pageUrl) && lastError?.category !== 'cancelled';
            if (canFallBack) {
              this.logger.warn(`🔄 RSS failed for ${source.name}, falling back to HTML: ${lastError?.message}`);
              state = 'try_html';
            } else {
              state = 'failed';
            }
          }
          break;
        }

        case 'validate': {
          if (!current) {
            state = 'failed';
            break;
          }
          const result = this.validator.filter(current.candidates);
          current.attempt.accepted = result.accepted.length;
          mergeCounts(rejected, result.rejected);
          accepted = result.accepted;

          if (accepted.length === 0 && current.attempt.method === 'rss' && source.pageUrl) {
            this.logger.warn(`🔄 RSS for ${source.name} yielded no valid articles, falling back to HTML`);
            state = 'try_html';
          } else {
            method = current.attempt.method;
            state = 'dedupe';
          }
          break;
        }

        case 'dedupe': {
          const local = new Deduplicator();
          const identified = accepted.map(candidate => local.identify(candidate));
          const result = local.dedupe(identified);
          articles = result.unique;
          duplicates = result.duplicates;
          state = 'done';
          break;
        }
      }
    }

    states.push(state);
    const durationMs = this.clock.now() - started;

    if (state === 'done') {
      this.logger.info(`✅ ${source.name}: ${articles.length} articles via ${method} in ${durationMs}ms`);
      return {
        source: source.name,
        tier: source.tier,
        status: 'done',
        method,
        articles,
        states,
        attempts,
        rejected,
        duplicates,
        durationMs,
        // An RSS failure rescued by HTML is still worth reporting
        error: lastError
      };
    }

    this.logger.error(`❌ ${source.name} failed: ${lastError?.message ?? 'unknown error'}`);
    return {
      source: source.name,
      tier: source.tier,
      status: 'failed',
      method: null,
      articles: [],
      states,
      attempts,
      rejected,
      duplicates: 0,
      durationMs,
      error: lastError ?? { category: 'unavailable', message: 'No collection method succeeded' }
    };
  }

  /**
   * Fetch one URL and parse it with the method's parser
   */
  private async runMethod(
    method: FetchMethod,
    url: string,
    source: SourceConfig,
    signal?: AbortSignal
  ): Promise<MethodRun> {
    const started = this.clock.now();
    const fetched = await this.fetchClient.fetch(url, { signal, method });

    if (!fetched.ok) {
      return {
        candidates: [],
        attempt: {
          method,
          url,
          success: false,
          parsed: 0,
          accepted: 0,
          fetchAttempts: fetched.attempts,
          durationMs: this.clock.now() - started,
          error: fetched.error
        }
      };
    }

    const context = {
      source: source.name,
      tier: source.tier,
      baseUrl: fetched.finalUrl,
      maxItems: this.maxItems
    };
    const parsed =
      method === 'rss'
        ? await this.feedParser.parse(fetched.body, context)
        : this.htmlParser.parse(fetched.body, source.selectors, context);

    return {
      candidates: parsed.articles,
      attempt: {
        method,
        url,
        success: !parsed.error,
        parsed: parsed.articles.length,
        accepted: 0,
        fetchAttempts: fetched.attempts,
        durationMs: this.clock.now() - started,
        error: parsed.error ? { category: 'parse', message: parsed.error.message } : undefined
      }
    };
  }
}

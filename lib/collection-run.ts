import pLimit from 'p-limit';
import type { CollectorConfig } from './config';
import { ContentValidator, type ValidationOptions } from './content-validator';
import { Deduplicator } from './deduplicator';
import { errorMessage } from './errors';
import { FetchClient, type FetchClientConfig } from './fetch-client';
import { IdentityRotator } from './identity-rotator';
import { silentLogger, type Logger } from './logger';
import { ScrapingRateLimiter, type RateLimiterConfig } from './scraping-rate-limiter';
import { SourcePipeline } from './source-pipeline';
import type {
  Article,
  CollectionResult,
  RunMetrics,
  SourceConfig,
  SourceMetrics,
  SourceOutcome
} from './types';
import { systemClock, type Clock } from './utils/timing';

export interface CollectionRunOptions {
  rateLimit?: RateLimiterConfig;
  fetch?: FetchClientConfig;
  identities?: readonly string[];
  validation?: ValidationOptions;
  /** Sources processed at once (default: 3) */
  maxConcurrency?: number;
  maxItemsPerSource?: number;
  /** Tier names, highest priority first; unknown tiers rank last */
  tierPriority?: readonly string[];
  /** Abort the run after this long and keep what finished */
  runTimeoutMs?: number;
}

export interface CollectionRunDeps {
  fetchImpl?: typeof fetch;
  clock?: Clock;
  random?: () => number;
  logger?: Logger;
}

/**
 * One collection pass over every configured source.
 *
 * Owns its rate limiter and identity rotator, and deduplicates each
 * `execute` call on its own. `execute` never throws: failed or cancelled sources show up
 * in the metrics and the articles from finished sources are still returned.
 */
export class CollectionRun {
  private readonly options: CollectionRunOptions;
  private readonly pipeline: SourcePipeline;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CollectionRunOptions = {}, deps: CollectionRunDeps = {}) {
    this.options = options;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;

    const rateLimiter = new ScrapingRateLimiter(options.rateLimit, { clock: this.clock, random: deps.random });
    const fetchClient = new FetchClient(options.fetch ?? {}, {
      rateLimiter,
      identities: new IdentityRotator(options.identities),
      fetchImpl: deps.fetchImpl,
      clock: this.clock,
      logger: this.logger.child('Fetch')
    });

    this.pipeline = new SourcePipeline({
      fetchClient,
      validator: new ContentValidator(options.validation),
      logger: this.logger.child('Pipeline'),
      clock: this.clock,
      maxItems: options.maxItemsPerSource
    });
  }

  /**
   * Build a run from a validated configuration (seconds become milliseconds)
   */
  static fromConfig(config: CollectorConfig, deps: CollectionRunDeps = {}): CollectionRun {
    return new CollectionRun(
      {
        rateLimit: {
          minDelayMs: config.rateLimit.minDelaySeconds * 1000,
          jitterMs: config.rateLimit.jitterSeconds * 1000,
          keyBy: config.rateLimit.keyBy
        },
        fetch: config.fetch,
        identities: config.identities,
        validation: config.validation,
        maxConcurrency: config.maxConcurrency,
        maxItemsPerSource: config.maxItemsPerSource,
        tierPriority: config.tierPriority,
        runTimeoutMs: config.runTimeoutMs
      },
      deps
    );
  }

  async execute(sources: readonly SourceConfig[], options: { signal?: AbortSignal } = {}): Promise<CollectionResult> {
    const startedAt = new Date(this.clock.now());
    const started = this.clock.now();
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const timeoutId = this.options.runTimeoutMs
      ? setTimeout(() => {
          this.logger.warn(`⏱️ Run timeout after ${this.options.runTimeoutMs}ms, keeping finished sources`);
          controller.abort();
        }, this.options.runTimeoutMs)
      : undefined;

    this.logger.info(`🚀 Collecting from ${sources.length} sources (concurrency ${this.options.maxConcurrency ?? 3})`);

    const limit = pLimit(Math.max(1, this.options.maxConcurrency ?? 3));
    let outcomes: SourceOutcome[];
    try {
      outcomes = await Promise.all(
        sources.map(source => limit(() => this.runSource(source, controller.signal)))
      );
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
    }

    const { articles, attributed, lostToEarlier } = this.aggregate(sources, outcomes);
    const durationMs = this.clock.now() - started;
    const metrics = this.buildMetrics(outcomes, attributed, lostToEarlier, {
      startedAt: startedAt.toISOString(),
      finishedAt: new Date(this.clock.now()).toISOString(),
      cancelled: controller.signal.aborted,
      durationMs
    });

    this.logger.info(
      `🏁 Run complete: ${metrics.totals.sourcesSucceeded}/${metrics.totals.sourcesAttempted} sources, ` +
        `${articles.length} articles in ${durationMs}ms`
    );

    return Object.freeze({ articles: Object.freeze(articles), metrics });
  }

  private async runSource(source: SourceConfig, signal: AbortSignal): Promise<SourceOutcome> {
    if (signal.aborted) {
      return this.cancelledOutcome(source);
    }
    try {
      return await this.pipeline.run(source, { signal });
    } catch (error) {
      // The pipeline reports failures itself; this only guards against bugs
      this.logger.error(`❌ Unexpected error processing ${source.name}: ${errorMessage(error)}`);
      return {
        ...this.cancelledOutcome(source),
        error: { category: 'unavailable', message: errorMessage(error) }
      };
    }
  }

  private cancelledOutcome(source: SourceConfig): SourceOutcome {
    return {
      source: source.name,
      tier: source.tier,
      status: 'failed',
      method: null,
      articles: [],
      states: ['init', 'failed'],
      attempts: [],
      rejected: {},
      duplicates: 0,
      durationMs: 0,
      error: { category: 'cancelled', message: `Run cancelled before ${source.name} started` }
    };
  }

  /**
   * Tier priority first, configuration order second
   */
  private rank(sources: readonly SourceConfig[]): number[] {
    const priority = this.options.tierPriority ?? [];
    const tierRank = (tier: string) => {
      const index = priority.indexOf(tier);
      return index === -1 ? priority.length : index;
    };
    return sources
      .map((source, index) => ({ index, rank: tierRank(source.tier) }))
      .sort((a, b) => a.rank - b.rank || a.index - b.index)
      .map(entry => entry.index);
  }

  private aggregate(sources: readonly SourceConfig[], outcomes: SourceOutcome[]) {
    const deduplicator = new Deduplicator();
    const articles: Article[] = [];
    const attributed = new Map<number, number>();
    const lostToEarlier = new Map<number, number>();

    for (const index of this.rank(sources)) {
      const outcome = outcomes[index];
      if (outcome.status !== 'done') continue;

      const { unique, duplicates } = deduplicator.dedupe(outcome.articles, outcome.source);
      articles.push(...unique);
      attributed.set(index, unique.length);
      lostToEarlier.set(index, duplicates);
      if (duplicates > 0) {
        this.logger.debug(`${outcome.source}: ${duplicates} articles already collected from higher-priority sources`);
      }
    }

    return { articles, attributed, lostToEarlier };
  }

  private buildMetrics(
    outcomes: SourceOutcome[],
    attributed: Map<number, number>,
    lostToEarlier: Map<number, number>,
    run: { startedAt: string; finishedAt: string; cancelled: boolean; durationMs: number }
  ): RunMetrics {
    const sources: SourceMetrics[] = outcomes.map((outcome, index) =>
      Object.freeze({
        source: outcome.source,
        tier: outcome.tier,
        method: outcome.method,
        articleCount: attributed.get(index) ?? 0,
        success: outcome.status === 'done',
        durationMs: outcome.durationMs,
        error: outcome.error,
        states: outcome.states,
        attempts: outcome.attempts,
        parsed: outcome.attempts.reduce((sum, attempt) => sum + attempt.parsed, 0),
        rejected: Object.values(outcome.rejected).reduce((sum, count) => sum + count, 0),
        duplicates: outcome.duplicates + (lostToEarlier.get(index) ?? 0)
      })
    );

    const succeeded = sources.filter(source => source.success).length;
    return Object.freeze({
      startedAt: run.startedAt,
      finishedAt: run.finishedAt,
      cancelled: run.cancelled,
      sources: Object.freeze(sources),
      totals: Object.freeze({
        sourcesAttempted: sources.length,
        sourcesSucceeded: succeeded,
        sourcesFailed: sources.length - succeeded,
        totalArticles: sources.reduce((sum, source) => sum + source.articleCount, 0),
        rejected: sources.reduce((sum, source) => sum + source.rejected, 0),
        duplicates: sources.reduce((sum, source) => sum + source.duplicates, 0),
        durationMs: run.durationMs
      })
    });
  }
}

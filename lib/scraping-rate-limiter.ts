import { RequestAbortedError } from './errors';
import { systemClock, type Clock } from './utils/timing';

interface KeyState {
  /** Permitted start time of the most recent call (ms since epoch) */
  lastStart: number | null;
  /** Callers currently sleeping on this key */
  pending: number;
  permitted: number;
}

export interface RateLimiterConfig {
  /** Minimum gap between call starts for the same key */
  minDelayMs?: number;
  /** Upper bound of the uniform random delay added to each gap */
  jitterMs?: number;
  /** `host` spaces requests per hostname, `global` across every request */
  keyBy?: 'host' | 'global';
}

export interface RateLimiterKeyStats {
  lastStart: number | null;
  pending: number;
  permitted: number;
}

// Preset configurations for different use cases
export const RATE_LIMITER_PRESETS = {
  // Polite: company blogs that ban aggressive crawlers
  polite: {
    minDelayMs: 5000,
    jitterMs: 2000,
    keyBy: 'host'
  },
  // Moderate: default for scheduled collection runs
  moderate: {
    minDelayMs: 2000,
    jitterMs: 1000,
    keyBy: 'host'
  },
  // Aggressive: local testing against friendly hosts
  aggressive: {
    minDelayMs: 500,
    jitterMs: 250,
    keyBy: 'host'
  }
} as const satisfies Record<string, RateLimiterConfig>;

export type RateLimiterPreset = keyof typeof RATE_LIMITER_PRESETS;

const GLOBAL_KEY = '*';

export class ScrapingRateLimiter {
  private keys = new Map<string, KeyState>();
  private readonly minDelayMs: number;
  private readonly jitterMs: number;
  private readonly keyBy: 'host' | 'global';
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    options: RateLimiterConfig = {},
    deps: { clock?: Clock; random?: () => number } = {}
  ) {
    this.minDelayMs = Math.max(0, options.minDelayMs ?? 2000);
    this.jitterMs = Math.max(0, options.jitterMs ?? 0);
    this.keyBy = options.keyBy ?? 'host';
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  static fromPreset(preset: RateLimiterPreset, deps: { clock?: Clock; random?: () => number } = {}): ScrapingRateLimiter {
    return new ScrapingRateLimiter(RATE_LIMITER_PRESETS[preset], deps);
  }

  /**
   * Key a URL according to `keyBy`. Unparseable URLs share one bucket.
   */
  keyFor(url: string): string {
    if (this.keyBy === 'global') {
      return GLOBAL_KEY;
    }
    try {
      return new URL(url).hostname.toLowerCase();
    } catch {
      return GLOBAL_KEY;
    }
  }

  /**
   * Resolve once this caller may start. The slot is reserved before the
   * first await, so concurrent callers on the same key queue up in call order
   * and each waits at most one gap per caller ahead of it.
   */
  async awaitTurn(key: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new RequestAbortedError(`Rate limiter wait aborted for ${key}`);
    }

    const state = this.getState(key);
    const now = this.clock.now();
    const gap = this.minDelayMs + this.random() * this.jitterMs;
    const start = state.lastStart === null ? now : Math.max(now, state.lastStart + gap);

    state.lastStart = start;
    state.permitted++;

    const waitTime = start - now;
    if (waitTime <= 0) {
      return;
    }

    state.pending++;
    try {
      await this.clock.sleep(waitTime, signal);
    } finally {
      state.pending--;
    }
  }

  private getState(key: string): KeyState {
    let state = this.keys.get(key);
    if (!state) {
      state = { lastStart: null, pending: 0, permitted: 0 };
      this.keys.set(key, state);
    }
    return state;
  }

  // Utility method to get current per-key stats
  getStats(): Record<string, RateLimiterKeyStats> {
    const stats: Record<string, RateLimiterKeyStats> = {};

    this.keys.forEach((state, key) => {
      stats[key] = {
        lastStart: state.lastStart,
        pending: state.pending,
        permitted: state.permitted
      };
    });

    return stats;
  }
}

// Factory function to create rate limiter with custom config or a preset
export function createRateLimiter(
  config: RateLimiterConfig | RateLimiterPreset,
  deps: { clock?: Clock; random?: () => number } = {}
): ScrapingRateLimiter {
  if (typeof config === 'string') {
    return ScrapingRateLimiter.fromPreset(config, deps);
  }
  return new ScrapingRateLimiter(config, deps);
}

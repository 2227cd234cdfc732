import {
  CollectorError,
  PermanentFetchError,
  RequestAbortedError,
  RequestTimeoutError,
  TransientFetchError,
  categorizeError,
  errorMessage,
  isAbortError
} from './errors';
import { IdentityRotator } from './identity-rotator';
import { silentLogger, type Logger } from './logger';
import { ScrapingRateLimiter } from './scraping-rate-limiter';
import type { FetchMethod, FetchResult } from './types';
import { systemClock, type Clock } from './utils/timing';

export interface FetchClientConfig {
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Total attempts, including the first one */
  maxAttempts?: number;
  /** Backoff before the second attempt; doubles for every later one */
  baseBackoffMs?: number;
  maxBackoffMs?: number;
}

export interface FetchClientDeps {
  rateLimiter: ScrapingRateLimiter;
  identities: IdentityRotator;
  fetchImpl?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
}

export interface FetchOptions {
  signal?: AbortSignal;
  method?: FetchMethod;
}

const RETRYABLE_STATUS = new Set([408, 429]);
const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT'
]);

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  if (isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/**
 * Map a low-level fetch rejection to the collector's taxonomy.
 * Node's fetch reports network trouble as `TypeError: fetch failed` with the
 * socket error in `cause`.
 */
function classifyNetworkError(error: unknown, url: string): TransientFetchError | PermanentFetchError {
  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCode(error) ?? errorCode(cause);
  const message = errorMessage(error);
  const detail = code ? `${message} (${code})` : message;
  const original = error instanceof Error ? error : undefined;

  if ((code && NETWORK_ERROR_CODES.has(code)) || (error instanceof TypeError && /fetch failed/i.test(message))) {
    return new TransientFetchError(`Network error for ${url}: ${detail}`, { url, cause: original });
  }
  if (error instanceof TypeError) {
    // Invalid URL, unsupported protocol and friends never recover
    return new PermanentFetchError(`Request rejected for ${url}: ${detail}`, { url, cause: original });
  }
  return new TransientFetchError(`Request failed for ${url}: ${detail}`, { url, cause: original });
}

/**
 * Single-URL HTTP GET with rate limiting, rotating identity, per-attempt
 * timeout and exponential backoff. Never throws: every outcome is a FetchResult.
 */
export class FetchClient {
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly rateLimiter: ScrapingRateLimiter;
  private readonly identities: IdentityRotator;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: FetchClientConfig, deps: FetchClientDeps) {
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? 3);
    this.baseBackoffMs = config.baseBackoffMs ?? 1000;
    this.maxBackoffMs = config.maxBackoffMs ?? 30000;
    this.rateLimiter = deps.rateLimiter;
    this.identities = deps.identities;
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Backoff before attempt `attempt + 1`, given `attempt` failures so far
   */
  backoffDelay(attempt: number, retryAfter?: number): number {
    const exponential = this.baseBackoffMs * Math.pow(2, attempt - 1);
    const delay = retryAfter !== undefined ? Math.max(exponential, retryAfter) : exponential;
    return Math.min(delay, this.maxBackoffMs);
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const { signal, method } = options;
    const started = this.clock.now();
    const key = this.rateLimiter.keyFor(url);
    let attempt = 0;

    while (true) {
      attempt++;
      try {
        await this.rateLimiter.awaitTurn(key, signal);
        const { response, body } = await this.attempt(url, signal);

        this.logger.debug(`✅ GET ${url} → ${response.status} (attempt ${attempt}/${this.maxAttempts})`);
        return {
          ok: true,
          url,
          finalUrl: response.url || url,
          status: response.status,
          contentType: response.headers.get('content-type') ?? '',
          body,
          attempts: attempt,
          elapsedMs: this.clock.now() - started,
          method
        };
      } catch (error) {
        if (!(error instanceof TransientFetchError) || attempt >= this.maxAttempts) {
          const category = categorizeError(error);
          const level = category === 'cancelled' ? 'debug' : 'warn';
          this.logger[level](`❌ GET ${url} failed after ${attempt} attempt(s): ${errorMessage(error)}`);
          return {
            ok: false,
            url,
            error: {
              category,
              message: errorMessage(error),
              statusCode:
                error instanceof TransientFetchError || error instanceof PermanentFetchError
                  ? error.statusCode
                  : undefined
            },
            attempts: attempt,
            elapsedMs: this.clock.now() - started,
            method
          };
        }

        const delay = this.backoffDelay(attempt, error.retryAfter);
        this.logger.warn(
          `🔄 Retrying ${url} in ${delay}ms (attempt ${attempt}/${this.maxAttempts}): ${error.message}`
        );

        try {
          await this.clock.sleep(delay, signal);
        } catch (sleepError) {
          return {
            ok: false,
            url,
            error: { category: 'cancelled', message: errorMessage(sleepError) },
            attempts: attempt,
            elapsedMs: this.clock.now() - started,
            method
          };
        }
      }
    }
  }

  /**
   * One GET bounded by `timeoutMs`, body included. Resolves only for 2xx.
   */
  private async attempt(url: string, signal?: AbortSignal): Promise<{ response: Response; body: string }> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.identities.headers(),
        redirect: 'follow',
        signal: controller.signal
      });

      if (!response.ok) {
        // Release the connection; the error body is never read
        await response.body?.cancel();
        const status = response.status;
        const statusText = response.statusText ? ` ${response.statusText}` : '';
        if (status >= 500 || RETRYABLE_STATUS.has(status)) {
          throw new TransientFetchError(`HTTP ${status}${statusText}`, {
            url,
            statusCode: status,
            retryAfter: parseRetryAfter(response.headers.get('retry-after'), this.clock.now())
          });
        }
        throw new PermanentFetchError(`HTTP ${status}${statusText}`, { url, statusCode: status });
      }

      const body = await response.text();
      return { response, body };
    } catch (error) {
      if (error instanceof CollectorError) {
        throw error;
      }
      if (timedOut) {
        throw new RequestTimeoutError(`Request to ${url} timed out after ${this.timeoutMs}ms`, {
          url,
          timeout: this.timeoutMs
        });
      }
      if (signal?.aborted || isAbortError(error)) {
        throw new RequestAbortedError(`Request to ${url} was aborted`, { url });
      }
      throw classifyNetworkError(error, url);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (compatible; CompetitiveIntelCollector/0.1; +https://example.com/bot)';

const BASE_HEADERS: Readonly<Record<string, string>> = {
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,application/rss+xml,application/atom+xml,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'DNT': '1',
  'Upgrade-Insecure-Requests': '1'
};

/**
 * Hands out user agents from a fixed pool in round-robin order.
 *
 * The cursor advances synchronously, so workers sharing one rotator on the
 * event loop never observe the same position twice in a row.
 */
export class IdentityRotator {
  private readonly pool: readonly string[];
  private cursor = 0;

  constructor(identities: readonly string[] = []) {
    this.pool = identities.filter(identity => identity.trim().length > 0);
  }

  next(): string {
    if (this.pool.length === 0) {
      return DEFAULT_USER_AGENT;
    }
    const identity = this.pool[this.cursor % this.pool.length];
    this.cursor = (this.cursor + 1) % this.pool.length;
    return identity;
  }

  /**
   * Full header set for one outbound request, with the next identity
   */
  headers(): Record<string, string> {
    return {
      'User-Agent': this.next(),
      ...BASE_HEADERS
    };
  }

  get size(): number {
    return this.pool.length;
  }
}

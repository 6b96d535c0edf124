export interface RateLimiterStore {
  /** Takes one token for `identifier`; resolves false when its bucket is empty. */
  allow(identifier: string): boolean | Promise<boolean>;
}

export interface RateLimiterMemoryStoreConfig {
  /** Tokens refilled per second. */
  rate: number;
  /** Bucket capacity, and the size of a fresh bucket. */
  burst: number;
  /** Idle time after which a visitor's bucket is forgotten. */
  expiresInMs: number;
  now?: () => number;
}

interface Visitor {
  tokens: number;
  lastRefill: number;
  lastSeen: number;
}

/**
 * In-memory token buckets, one per client identifier.
 *
 * Each `allow` call runs to completion without yielding, so concurrent
 * requests never observe a half-updated bucket. Stale visitors are swept at
 * most once per `expiresInMs`.
 */
export class RateLimiterMemoryStore implements RateLimiterStore {
  private readonly visitors = new Map<string, Visitor>();
  private readonly now: () => number;
  private lastCleanup: number;

  constructor(private readonly config: RateLimiterMemoryStoreConfig) {
    this.now = config.now ?? Date.now;
    this.lastCleanup = this.now();
  }

  allow(identifier: string): boolean {
    const now = this.now();
    let visitor = this.visitors.get(identifier);
    if (!visitor) {
      visitor = { tokens: this.config.burst, lastRefill: now, lastSeen: now };
      this.visitors.set(identifier, visitor);
    }
    visitor.lastSeen = now;
    if (now - this.lastCleanup > this.config.expiresInMs) {
      this.cleanupStaleVisitors(now);
    }

    const elapsedSeconds = Math.max(0, now - visitor.lastRefill) / 1000;
    visitor.tokens = Math.min(this.config.burst, visitor.tokens + elapsedSeconds * this.config.rate);
    visitor.lastRefill = now;

    if (visitor.tokens < 1) return false;
    visitor.tokens -= 1;
    return true;
  }

  get visitorCount(): number {
    return this.visitors.size;
  }

  private cleanupStaleVisitors(now: number): void {
    for (const [id, visitor] of this.visitors) {
      if (now - visitor.lastSeen > this.config.expiresInMs) this.visitors.delete(id);
    }
    this.lastCleanup = now;
  }
}

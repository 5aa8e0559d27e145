/**
 * Rate Limiter Service
 *
 * In-memory sliding window limiter keyed by client IP. Used for POST
 * requests on the HTTP service.
 */

// ============================================================================
// TYPES
// ============================================================================

export interface RateLimiterOptions {
  /** Requests allowed per window */
  limit: number;
  windowMs: number;
  /** How often stale keys are pruned (default 5 minutes) */
  cleanupIntervalMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

// ============================================================================
// RATE LIMITING LOGIC
// ============================================================================

export class RateLimiter {
  private readonly requests = new Map<string, number[]>();
  private readonly now: () => number;
  private readonly cleanupTimer: NodeJS.Timeout;

  constructor(private readonly options: RateLimiterOptions) {
    this.now = options.now ?? Date.now;
    this.cleanupTimer = setInterval(
      () => this.prune(),
      options.cleanupIntervalMs ?? 5 * 60 * 1000
    );
    // Never keep the process alive just for cleanup
    this.cleanupTimer.unref();
  }

  /**
   * Record a request for `key` if it fits in the current window.
   *
   * @returns false when the key has already used its quota
   */
  isAllowed(key: string): boolean {
    const now = this.now();
    const recent = this.recentRequests(key, now);

    if (recent.length >= this.options.limit) {
      this.requests.set(key, recent);
      return false;
    }

    recent.push(now);
    this.requests.set(key, recent);
    return true;
  }

  /** Number of keys currently tracked */
  get size(): number {
    return this.requests.size;
  }

  /**
   * Drop timestamps outside the window and keys left with none.
   */
  prune(): void {
    const now = this.now();
    for (const key of [...this.requests.keys()]) {
      const recent = this.recentRequests(key, now);
      if (recent.length === 0) {
        this.requests.delete(key);
      } else {
        this.requests.set(key, recent);
      }
    }
  }

  dispose(): void {
    clearInterval(this.cleanupTimer);
    this.requests.clear();
  }

  private recentRequests(key: string, now: number): number[] {
    return (this.requests.get(key) ?? []).filter(
      (timestamp) => now - timestamp < this.options.windowMs
    );
  }
}

// ============================================================================
// CLIENT IDENTIFICATION
// ============================================================================

/**
 * Client IP for rate limiting: first `X-Forwarded-For` entry, then
 * `X-Real-IP`, then the socket address.
 */
export function getClientIP(
  header: (name: string) => string | undefined,
  remoteAddress?: string
): string {
  const forwarded = header("x-forwarded-for");
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) return first;
  }

  const realIp = header("x-real-ip")?.trim();
  if (realIp) return realIp;

  return remoteAddress || "unknown";
}

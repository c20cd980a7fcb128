/**
 * Sliding Window Rate Limiter
 *
 * Tracks timestamps of accepted requests over the last window and rejects
 * once the window holds `maxRequests` of them.
 */

export interface RateLimitResult {
  allowed: boolean;
  /** Accepted requests left in the current window */
  remaining: number;
  limit: number;
  /** Ms until the oldest accepted request leaves the window (0 if allowed) */
  retryAfterMs: number;
}

export const RATE_LIMIT_WINDOW_MS = 60_000;

export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number = RATE_LIMIT_WINDOW_MS,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Check the window and record the request when it fits.
   * Check and record happen in one synchronous step.
   */
  tryAcquire(): RateLimitResult {
    const now = this.now();
    this.prune(now);

    if (this.timestamps.length >= this.maxRequests) {
      const oldest = this.timestamps[0];
      return {
        allowed: false,
        remaining: 0,
        limit: this.maxRequests,
        retryAfterMs: Math.max(0, oldest + this.windowMs - now),
      };
    }

    this.timestamps.push(now);
    return {
      allowed: true,
      remaining: this.maxRequests - this.timestamps.length,
      limit: this.maxRequests,
      retryAfterMs: 0,
    };
  }

  /**
   * Accepted requests currently inside the window
   */
  getCurrentCount(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  reset(): void {
    this.timestamps = [];
  }

  private prune(now: number): void {
    const windowStart = now - this.windowMs;
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= windowStart) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps = this.timestamps.slice(expired);
    }
  }
}

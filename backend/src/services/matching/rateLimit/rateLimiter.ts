import type { Clock } from '../types.js';
import { systemClock } from '../types.js';

export type RateDecision = {
  allowed: boolean;
  retryAfterSeconds: number;
};

export interface RateLimiter {
  allow(learnerId: string): RateDecision;
  remaining(learnerId: string): number;
  windowSeconds(): number;
}

type RateLimiterOptions = {
  maxRequests: number;
  windowMs: number;
  clock?: Clock;
};

/**
 * Rolling-window limiter keyed by learner id.
 * Keeps the timestamps of accepted requests; rejected requests are not recorded.
 * allow() checks and records in one synchronous step.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private windows = new Map<string, number[]>();
  private maxRequests: number;
  private windowMs: number;
  private clock: Clock;
  private lastPrune: number;

  constructor(options: RateLimiterOptions) {
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? systemClock;
    this.lastPrune = this.clock.now();
  }

  size(): number {
    return this.windows.size;
  }

  allow(learnerId: string): RateDecision {
    const now = this.clock.now();
    // Sweep idle learners at most once per window.
    if (now - this.lastPrune >= this.windowMs) {
      this.prune();
    }
    const recent = this.activeRequests(learnerId, now);

    if (recent.length >= this.maxRequests) {
      const oldest = recent[0] ?? now;
      const retryAfterMs = oldest + this.windowMs - now;
      return { allowed: false, retryAfterSeconds: Math.max(1, Math.ceil(retryAfterMs / 1000)) };
    }

    this.windows.set(learnerId, [...recent, now]);
    return { allowed: true, retryAfterSeconds: 0 };
  }

  remaining(learnerId: string): number {
    const recent = this.activeRequests(learnerId, this.clock.now());
    return Math.max(0, this.maxRequests - recent.length);
  }

  windowSeconds(): number {
    return Math.round(this.windowMs / 1000);
  }

  /**
   * Drop learners whose every request has left the window.
   */
  prune(): number {
    const now = this.clock.now();
    const windowStart = now - this.windowMs;
    let removed = 0;
    for (const [learnerId, stamps] of this.windows.entries()) {
      const newest = stamps[stamps.length - 1];
      if (newest === undefined || newest <= windowStart) {
        this.windows.delete(learnerId);
        removed += 1;
      }
    }
    this.lastPrune = now;
    return removed;
  }

  private activeRequests(learnerId: string, now: number): number[] {
    const windowStart = now - this.windowMs;
    const stamps = this.windows.get(learnerId) ?? [];
    const recent = stamps.filter((stamp) => stamp > windowStart);
    if (recent.length) {
      this.windows.set(learnerId, recent);
    } else {
      this.windows.delete(learnerId);
    }
    return recent;
  }
}

export interface RateLimiterOptions {
  maxCalls?: number;
  windowMs?: number;
  now?: () => number;
}

export interface RateLimiterState {
  inWindow: number;
  maxCalls: number;
  windowMs: number;
}

/** Admission gate consulted before oracle-bound tools run. */
export interface RateLimiter {
  admit(): boolean;
}

export const DEFAULT_MAX_CALLS = 1200;
export const DEFAULT_WINDOW_MS = 60_000;

/**
 * Sliding-window admission gate. Denials are immediate; callers decide
 * whether to back off.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private calls: number[] = [];

  constructor(options: RateLimiterOptions = {}) {
    this.maxCalls = options.maxCalls ?? DEFAULT_MAX_CALLS;
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  admit(): boolean {
    const now = this.now();
    this.prune(now);
    if (this.calls.length >= this.maxCalls) {
      return false;
    }
    this.calls.push(now);
    return true;
  }

  getState(): RateLimiterState {
    this.prune(this.now());
    return {
      inWindow: this.calls.length,
      maxCalls: this.maxCalls,
      windowMs: this.windowMs,
    };
  }

  reset(): void {
    this.calls = [];
  }

  private prune(now: number): void {
    this.calls = this.calls.filter((ts) => now - ts < this.windowMs);
  }
}

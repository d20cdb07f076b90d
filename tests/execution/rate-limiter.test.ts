import { describe, expect, it } from 'vitest';

import { SlidingWindowRateLimiter } from '../../src/execution/rate-limiter.js';

function manualClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('SlidingWindowRateLimiter', () => {
  it('admits up to maxCalls inside one window', () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter({ maxCalls: 3, windowMs: 1000, now: clock.now });

    expect([limiter.admit(), limiter.admit(), limiter.admit(), limiter.admit()]).toEqual([
      true,
      true,
      true,
      false,
    ]);
    expect(limiter.getState()).toEqual({ inWindow: 3, maxCalls: 3, windowMs: 1000 });
  });

  it('frees capacity once entries age out', () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter({ maxCalls: 2, windowMs: 1000, now: clock.now });

    expect(limiter.admit()).toBe(true);
    clock.advance(400);
    expect(limiter.admit()).toBe(true);
    clock.advance(599);
    expect(limiter.admit()).toBe(false);

    // The first entry is exactly windowMs old and no longer counts.
    clock.advance(1);
    expect(limiter.admit()).toBe(true);
    expect(limiter.getState().inWindow).toBe(2);
  });

  it('does not record denied calls', () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter({ maxCalls: 1, windowMs: 1000, now: clock.now });

    expect(limiter.admit()).toBe(true);
    clock.advance(500);
    expect(limiter.admit()).toBe(false);
    clock.advance(500);
    expect(limiter.admit()).toBe(true);
  });

  it('reset empties the window', () => {
    const limiter = new SlidingWindowRateLimiter({ maxCalls: 1, windowMs: 60_000 });
    expect(limiter.admit()).toBe(true);
    expect(limiter.admit()).toBe(false);
    limiter.reset();
    expect(limiter.admit()).toBe(true);
  });

  it('defaults to 1200 calls per minute', () => {
    expect(new SlidingWindowRateLimiter().getState()).toEqual({
      inWindow: 0,
      maxCalls: 1200,
      windowMs: 60_000,
    });
  });
});

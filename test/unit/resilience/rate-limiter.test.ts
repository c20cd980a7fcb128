import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import { SlidingWindowRateLimiter } from '../../../src/resilience/rate-limiter';

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
  it('should accept requests up to the ceiling and reject the next', () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter(3, 60_000, clock.now);

    assert.deepStrictEqual(limiter.tryAcquire(), { allowed: true, remaining: 2, limit: 3, retryAfterMs: 0 });
    limiter.tryAcquire();
    limiter.tryAcquire();

    clock.advance(10_000);
    assert.deepStrictEqual(limiter.tryAcquire(), { allowed: false, remaining: 0, limit: 3, retryAfterMs: 50_000 });
    assert.strictEqual(limiter.getCurrentCount(), 3);
  });

  it('should not count rejected requests against the window', () => {
    const clock = manualClock();
    const limiter = new SlidingWindowRateLimiter(1, 60_000, clock.now);
    limiter.tryAcquire();
    limiter.tryAcquire();
    limiter.tryAcquire();
    assert.strictEqual(limiter.getCurrentCount(), 1);
  });

  it('should free a slot once the oldest request leaves the window', () => {
    const clock = manualClock(1_000);
    const limiter = new SlidingWindowRateLimiter(2, 60_000, clock.now);
    limiter.tryAcquire();
    clock.advance(30_000);
    limiter.tryAcquire();

    clock.advance(29_999);
    assert.strictEqual(limiter.tryAcquire().allowed, false);

    clock.advance(1);
    const result = limiter.tryAcquire();
    assert.strictEqual(result.allowed, true);
    assert.strictEqual(limiter.getCurrentCount(), 2);
  });

  it('should empty the window on reset', () => {
    const limiter = new SlidingWindowRateLimiter(1);
    limiter.tryAcquire();
    limiter.reset();
    assert.strictEqual(limiter.tryAcquire().allowed, true);
  });
});

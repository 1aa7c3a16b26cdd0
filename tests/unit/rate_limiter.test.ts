import { afterEach, describe, expect, it, vi } from 'vitest';
import { RateLimiter, getRateLimiter, resetRateLimiter } from '@/providers/rate_limiter';

afterEach(() => {
  vi.useRealTimers();
  resetRateLimiter();
});

describe('RateLimiter', () => {
  it('tracks requests in the current window', async () => {
    const limiter = new RateLimiter({ maxRequestsPerWindow: 5, maxConcurrent: 2 });

    await limiter.acquire();
    await limiter.acquire();
    expect(limiter.getStats()).toEqual({ requestsInWindow: 2, activeRequests: 2 });

    limiter.release();
    expect(limiter.getStats()).toEqual({ requestsInWindow: 2, activeRequests: 1 });
  });

  it('waits for a concurrency slot', async () => {
    const limiter = new RateLimiter({ maxRequestsPerWindow: 10, maxConcurrent: 1 });
    await limiter.acquire();

    let acquired = false;
    const pending = limiter.acquire().then(() => {
      acquired = true;
    });
    await Promise.resolve();
    expect(acquired).toBe(false);

    limiter.release();
    await pending;
    expect(acquired).toBe(true);
  });

  it('delays requests beyond the window budget', async () => {
    vi.useFakeTimers();
    const limiter = new RateLimiter({ maxRequestsPerWindow: 1, windowMs: 1000, maxConcurrent: 5 });
    await limiter.acquire();

    let acquired = false;
    const pending = limiter.acquire().then(() => {
      acquired = true;
    });
    await vi.advanceTimersByTimeAsync(500);
    expect(acquired).toBe(false);

    await vi.advanceTimersByTimeAsync(600);
    await pending;
    expect(acquired).toBe(true);
  });

  it('shares one limiter until reset', () => {
    const first = getRateLimiter();
    expect(getRateLimiter()).toBe(first);

    resetRateLimiter();
    expect(getRateLimiter()).not.toBe(first);
  });
});

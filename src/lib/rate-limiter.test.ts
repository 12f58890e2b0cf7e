import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from './rate-limiter';

function fakeClock(start = 1000) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => { time += ms; },
  };
}

describe('RateLimiter', () => {
  it('should grant the first slot immediately', async () => {
    const clock = fakeClock();
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ minIntervalMs: 300, now: clock.now, sleep });

    await limiter.acquire();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('should space back-to-back callers by the interval', async () => {
    const clock = fakeClock();
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ minIntervalMs: 300, now: clock.now, sleep });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(sleep.mock.calls).toEqual([[300], [600]]);
    expect(limiter.getStats()).toEqual({ granted: 3, totalWaitMs: 900, minIntervalMs: 300 });
  });

  it('should only wait for the remainder of the interval', async () => {
    const clock = fakeClock();
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ minIntervalMs: 300, now: clock.now, sleep });

    await limiter.acquire();
    clock.advance(100);
    await limiter.acquire();

    expect(sleep).toHaveBeenCalledWith(200);
  });

  it('should not wait once the interval has passed', async () => {
    const clock = fakeClock();
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ minIntervalMs: 300, now: clock.now, sleep });

    await limiter.acquire();
    clock.advance(500);
    await limiter.acquire();

    expect(sleep).not.toHaveBeenCalled();
    expect(limiter.getStats().totalWaitMs).toBe(0);
  });

  it('should never wait with a zero interval', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const limiter = new RateLimiter({ minIntervalMs: 0, sleep });

    await Promise.all([limiter.acquire(), limiter.acquire()]);

    expect(sleep).not.toHaveBeenCalled();
  });

  it('should clamp a negative interval to zero', () => {
    expect(new RateLimiter({ minIntervalMs: -50 }).getStats().minIntervalMs).toBe(0);
  });
});

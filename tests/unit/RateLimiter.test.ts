// tests/unit/RateLimiter.test.ts

import { describe, it, expect } from 'vitest';
import { performance } from 'perf_hooks';
import { RateLimiter } from '../../src/core/http/RateLimiter';

describe('RateLimiter', () => {
  it('should be a no-op without a spec', async () => {
    const limiter = new RateLimiter(null);

    expect(limiter.enabled).toBe(false);
    expect(await limiter.acquire()).toBe(0);
  });

  it('should derive the spacing from calls and period', () => {
    expect(new RateLimiter({ calls: 4, period: 2 }).spacing).toBe(500);
  });

  it('should space three sequential acquisitions at least 0.2s apart in total', async () => {
    const limiter = new RateLimiter({ calls: 1, period: 0.1 });

    const start = performance.now();
    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(performance.now() - start).toBeGreaterThanOrEqual(200);
  });

  it('should not delay the first acquisition', async () => {
    const limiter = new RateLimiter({ calls: 1, period: 10 });

    expect(await limiter.acquire()).toBeLessThan(100);
  });

  it('should serialise acquisitions started together', async () => {
    const limiter = new RateLimiter({ calls: 1, period: 0.05 });
    const stamps: number[] = [];

    await Promise.all(
      [0, 1, 2].map(async () => {
        await limiter.acquire();
        stamps.push(performance.now());
      })
    );

    expect(stamps[1] - stamps[0]).toBeGreaterThanOrEqual(49);
    expect(stamps[2] - stamps[1]).toBeGreaterThanOrEqual(49);
  });
});

// src/core/http/RateLimiter.ts

import PQueue from 'p-queue';
import { performance } from 'perf_hooks';
import type { RateLimitSpec } from './types';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Spaces consecutive acquisitions at least period / calls seconds apart,
 * measured on the monotonic clock.
 */
export class RateLimiter {
  private queue?: PQueue;
  private spacingMs = 0;
  private lastAcquired?: number;

  constructor(spec: Readonly<RateLimitSpec> | null) {
    if (spec) {
      this.spacingMs = (spec.period * 1000) / spec.calls;
      this.queue = new PQueue({ concurrency: 1 });
    }
  }

  get enabled(): boolean {
    return this.queue !== undefined;
  }

  get spacing(): number {
    return this.spacingMs;
  }

  /**
   * Resolves once the caller may issue its next call.
   *
   * @returns milliseconds spent waiting
   */
  async acquire(): Promise<number> {
    const queue = this.queue;
    if (!queue) {
      return 0;
    }

    const startedAt = performance.now();
    await queue.add(async () => {
      if (this.lastAcquired !== undefined) {
        const readyAt = this.lastAcquired + this.spacingMs;
        let now = performance.now();
        while (now < readyAt) {
          await sleep(Math.ceil(readyAt - now));
          now = performance.now();
        }
      }
      this.lastAcquired = performance.now();
    });
    return performance.now() - startedAt;
  }
}

// src/core/http/RetryPolicy.ts

import type { AttemptOutcome, HttpMethod, RetryDecision, RetrySpec } from './types';

const STOP: RetryDecision = { retry: false, delayMs: 0 };

/**
 * Decides whether a call is repeated and how long to wait first.
 * Holds no state between calls; the caller counts attempts.
 */
export class RetryPolicy {
  private statuses: ReadonlySet<number>;
  private methods: ReadonlySet<HttpMethod>;

  constructor(
    private spec: Readonly<RetrySpec>,
    private random: () => number = Math.random
  ) {
    this.statuses = new Set(spec.statuses);
    this.methods = new Set(spec.methods);
  }

  get maxAttempts(): number {
    return this.spec.maxAttempts;
  }

  isRetryableStatus(status: number): boolean {
    return this.statuses.has(status);
  }

  isRetryableMethod(method: HttpMethod): boolean {
    return this.methods.has(method);
  }

  /**
   * @param attempt - number of calls made so far, starting at 1
   * @param outcome - what the latest call produced
   * @param method - HTTP method of the call
   */
  shouldRetry(attempt: number, outcome: AttemptOutcome, method: HttpMethod): RetryDecision {
    if (attempt >= this.spec.maxAttempts || !this.methods.has(method)) {
      return STOP;
    }

    if (outcome.kind === 'transport') {
      return { retry: true, delayMs: this.backoff(attempt) };
    }

    if (!this.statuses.has(outcome.status)) {
      return STOP;
    }

    const retryAfter = outcome.retryAfter ? this.parseRetryAfter(outcome.retryAfter) : undefined;
    return {
      retry: true,
      delayMs: retryAfter !== undefined ? Math.min(retryAfter, this.spec.maxDelay) : this.backoff(attempt),
    };
  }

  /**
   * Exponential backoff with jitter. The jitter factor stays below 2 so a
   * delay never exceeds the undisturbed delay of the next attempt, and the
   * result is clamped to maxDelay.
   */
  backoff(attempt: number): number {
    const exponential = this.spec.baseDelay * Math.pow(2, Math.max(0, attempt - 1));
    const capped = Math.min(exponential, this.spec.maxDelay);
    const jittered = capped * (1 + Math.min(this.random(), 0.999));
    return Math.min(jittered, this.spec.maxDelay);
  }

  private parseRetryAfter(value: string): number | undefined {
    const seconds = Number(value);
    if (value.trim() !== '' && !Number.isNaN(seconds)) {
      return Math.max(0, seconds * 1000);
    }
    const date = Date.parse(value);
    if (Number.isNaN(date)) {
      return undefined;
    }
    return Math.max(0, date - Date.now());
  }
}

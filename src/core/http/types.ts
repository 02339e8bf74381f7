// src/core/http/types.ts

import type { HTTP_METHODS } from '../../config/ConfigValidator';
import type { Credentials } from '../auth/types';

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type QueryParams = Record<string, string | number | boolean>;

export interface RetrySpec {
  statuses: number[];
  methods: HttpMethod[];
  maxAttempts: number;
  baseDelay: number; // milliseconds
  maxDelay: number; // milliseconds
}

export interface RateLimitSpec {
  calls: number;
  period: number; // seconds
}

/**
 * Per-client configuration, resolved once at construction and frozen.
 */
export interface RequestContext {
  readonly headers: Readonly<Record<string, string>>;
  readonly credentials?: Readonly<Credentials>;
  readonly extraParams: Readonly<Record<string, string>>;
  readonly rateLimit: Readonly<RateLimitSpec> | null;
  readonly retry: Readonly<RetrySpec>;
  readonly timeout?: number; // milliseconds
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  params?: QueryParams;
  headers?: Record<string, string>;
  timeout?: number;
  /** Encoding used when decoding the body as text */
  encoding?: BufferEncoding;
}

export interface StreamResult {
  path: string;
  contentHash: string;
  bytes: number;
}

export type AttemptOutcome =
  | { kind: 'response'; status: number; retryAfter?: string }
  | { kind: 'transport'; error: unknown };

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

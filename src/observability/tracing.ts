/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans wrap each outbound HTTP call (all attempts included) and each
 * retrieval. They are recorded only when OTEL_ENABLED is set and the host
 * application has registered a tracer provider.
 */

import { trace, context, SpanStatusCode, SpanKind, type Attributes, type Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';
import type { RetrievalSource, RetrieveKind } from '../core/retrieval/types';

const TRACER_NAME = 'tabular-retriever';

export function isOTelEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.OTEL_ENABLED === '1' || env.OTEL_ENABLED === 'true';
}

/**
 * Request id sent as X-Request-ID and logged with every attempt
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Run fn inside an active span, or with `null` when tracing is off.
 * A rejection marks the span as failed and is rethrown unchanged.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span | null) => Promise<T>,
  kind: SpanKind = SpanKind.INTERNAL
): Promise<T> {
  if (!isOTelEnabled()) {
    return fn(null);
  }

  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { kind, attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      span.recordException(error instanceof Error ? error : message);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, { 'http.method': method, 'http.url': url }, fn, SpanKind.CLIENT);
}

/**
 * @param label - cache filename, or the shortened url when none is given
 */
export async function withRetrievalSpan<T>(
  kind: RetrieveKind,
  label: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Retrieve ${kind}`, { 'retrieval.kind': kind, 'retrieval.label': label }, fn);
}

/**
 * Note on the active retrieval span which store answered and the file used.
 */
export function recordRetrievalSource(source: RetrievalSource, filePath?: string): void {
  if (!isOTelEnabled()) return;
  const span = trace.getSpan(context.active());
  span?.setAttribute('retrieval.source', source);
  if (filePath) {
    span?.setAttribute('retrieval.path', filePath);
  }
}

/**
 * Tracing Unit Tests
 *
 * Without a registered tracer provider the OpenTelemetry API hands out
 * non-recording spans, so these run against the real API.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as tracing from '../../src/observability/tracing';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('Tracing', () => {
  const original = process.env.OTEL_ENABLED;

  beforeEach(() => {
    delete process.env.OTEL_ENABLED;
  });

  afterEach(() => {
    if (original === undefined) {
      delete process.env.OTEL_ENABLED;
    } else {
      process.env.OTEL_ENABLED = original;
    }
  });

  describe('Tracing State', () => {
    it('should be disabled by default', () => {
      expect(tracing.isOTelEnabled()).toBe(false);
      expect(tracing.isOTelEnabled({})).toBe(false);
    });

    it('should be enabled when OTEL_ENABLED=1 or true', () => {
      process.env.OTEL_ENABLED = '1';
      expect(tracing.isOTelEnabled()).toBe(true);

      process.env.OTEL_ENABLED = 'true';
      expect(tracing.isOTelEnabled()).toBe(true);
    });

    it('should read an injected environment', () => {
      expect(tracing.isOTelEnabled({ OTEL_ENABLED: '1' })).toBe(true);
      expect(tracing.isOTelEnabled({ OTEL_ENABLED: 'yes' })).toBe(false);
    });

    it('should be disabled when OTEL_ENABLED=0', () => {
      process.env.OTEL_ENABLED = '0';
      expect(tracing.isOTelEnabled()).toBe(false);
    });
  });

  describe('Correlation IDs', () => {
    it('should generate distinct v4 uuids', () => {
      const first = tracing.generateCorrelationId();
      const second = tracing.generateCorrelationId();

      expect(first).toMatch(UUID_V4);
      expect(second).not.toBe(first);
    });
  });

  describe('Spans', () => {
    it('should run without a span when disabled', async () => {
      const result = await tracing.withSpan('test', {}, async (span) => (span === null ? 'no-span' : 'span'));

      expect(result).toBe('no-span');
    });

    it('should run inside a span when enabled', async () => {
      process.env.OTEL_ENABLED = '1';

      const result = await tracing.withHttpSpan('GET', 'http://x.test/a', async (span) =>
        span === null ? 'no-span' : 'span'
      );

      expect(result).toBe('span');
    });

    it('should rethrow errors from inside a span', async () => {
      process.env.OTEL_ENABLED = '1';

      await expect(
        tracing.withRetrievalSpan('json', 'data.json', async () => {
          throw new Error('retrieval failed');
        })
      ).rejects.toThrow('retrieval failed');
    });

    it('should record the retrieval source without an active span', () => {
      process.env.OTEL_ENABLED = '1';

      expect(() => tracing.recordRetrievalSource('network')).not.toThrow();
    });

    it('should record the retrieval source inside a retrieval span', async () => {
      process.env.OTEL_ENABLED = '1';

      const result = await tracing.withRetrievalSpan('file', 'data.csv', async (span) => {
        tracing.recordRetrievalSource('saved', '/tmp/saved/data.csv');
        return span === null ? 'no-span' : 'span';
      });

      expect(result).toBe('span');
    });
  });
});

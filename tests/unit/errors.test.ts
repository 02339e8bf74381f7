// tests/unit/errors.test.ts

import { describe, it, expect } from 'vitest';
import {
  SDKError,
  ConfigurationError,
  NetworkError,
  NetworkTimeoutError,
  RetryExhaustedError,
  ApiError,
  ApiClientError,
  ApiServerError,
  DecodeError,
  StateError,
  CacheMissError,
  InvalidArgumentError,
  isRecoverableRetrievalError,
  errorMessage,
} from '../../src/utils/errors';

describe('errors', () => {
  it('should carry a code and the class name', () => {
    const error = new ConfigurationError('bad config', { key: 'auth' });

    expect(error).toBeInstanceOf(SDKError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.details).toEqual({ key: 'auth' });
  });

  it('should make timeouts and exhausted retries network errors', () => {
    const timeout = new NetworkTimeoutError();
    const exhausted = new RetryExhaustedError('gave up', 503, 5);

    expect(timeout).toBeInstanceOf(NetworkError);
    expect(timeout.code).toBe('NETWORK_TIMEOUT');
    expect(timeout.message).toBe('Request timeout');
    expect(exhausted).toBeInstanceOf(NetworkError);
    expect(exhausted.code).toBe('RETRY_EXHAUSTED');
    expect(exhausted.status).toBe(503);
    expect(exhausted.attempts).toBe(5);
    expect(exhausted.details).toEqual({ status: 503, attempts: 5 });
  });

  it('should split api errors by status class', () => {
    const client = new ApiClientError('not found', 404);
    const server = new ApiServerError('broken', 502);

    expect(client).toBeInstanceOf(ApiError);
    expect(client.code).toBe('API_CLIENT_ERROR');
    expect(client.status).toBe(404);
    expect(server).toBeInstanceOf(ApiError);
    expect(server.code).toBe('API_SERVER_ERROR');
    expect(server.details).toEqual({ status: 502 });
  });

  it('should expose the decode position', () => {
    const error = new DecodeError('bad yaml', { line: 3, column: 7 }, { source: 'file.yaml' });

    expect(error.position).toEqual({ line: 3, column: 7 });
    expect(error.details).toEqual({ source: 'file.yaml', line: 3, column: 7 });
  });

  it('should keep the path of a cache miss', () => {
    const error = new CacheMissError('missing', '/saved/data.json');

    expect(error.code).toBe('CACHE_MISS');
    expect(error.path).toBe('/saved/data.json');
  });

  it('should only treat network, api and decode errors as recoverable', () => {
    expect(isRecoverableRetrievalError(new NetworkError('down'))).toBe(true);
    expect(isRecoverableRetrievalError(new RetryExhaustedError('gave up', 500, 3))).toBe(true);
    expect(isRecoverableRetrievalError(new ApiClientError('gone', 410))).toBe(true);
    expect(isRecoverableRetrievalError(new DecodeError('bad'))).toBe(true);
    expect(isRecoverableRetrievalError(new StateError('misuse'))).toBe(false);
    expect(isRecoverableRetrievalError(new ConfigurationError('bad'))).toBe(false);
    expect(isRecoverableRetrievalError(new InvalidArgumentError('bad'))).toBe(false);
    expect(isRecoverableRetrievalError(new Error('plain'))).toBe(false);
  });

  it('should render messages of unknown values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});

// src/utils/errors.ts

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Setup errors
export class ConfigurationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class InvalidArgumentError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', details);
  }
}

// Network errors
export class NetworkError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

export class RetryExhaustedError extends NetworkError {
  constructor(
    message: string,
    public status: number,
    public attempts: number,
    details?: Record<string, unknown>
  ) {
    super(message, { ...details, status, attempts });
    this.code = 'RETRY_EXHAUSTED';
  }
}

// API errors (non-2xx responses surfaced by download calls)
export class ApiError extends SDKError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

// Payload errors
export class DecodeError extends SDKError {
  constructor(
    message: string,
    public position: { offset?: number; line?: number; column?: number } = {},
    details?: Record<string, unknown>
  ) {
    super(message, 'DECODE_ERROR', { ...details, ...position });
  }
}

// Protocol violations by the caller
export class StateError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STATE_ERROR', details);
  }
}

export class CacheMissError extends SDKError {
  constructor(
    message: string,
    public path: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'CACHE_MISS', { ...details, path });
  }
}

/**
 * Errors the retrieval layer may replace with static fallback data.
 */
export function isRecoverableRetrievalError(error: unknown): error is SDKError {
  return error instanceof NetworkError || error instanceof ApiError || error instanceof DecodeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

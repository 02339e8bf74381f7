// src/index.ts

export { RetrievalSDK, DEFAULT_CLIENT } from './sdk';
export type { SDKOptions } from './sdk';
export type { InitConfig, HttpClientConfig, RetrievalPolicyInput, RetrySpecInput } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe, validateClientConfig, validateRetrievalPolicy } from './config/ConfigValidator';

export { HttpClient, withHttpClient } from './core/http/HttpClient';
export type { HttpClientDeps, DownloadFileOptions } from './core/http/HttpClient';
export { LiveResponse } from './core/http/LiveResponse';
export { RetryPolicy } from './core/http/RetryPolicy';
export { RateLimiter } from './core/http/RateLimiter';
export type { RequestOptions, RetrySpec, RateLimitSpec, StreamResult, QueryParams } from './core/http/types';

export { AuthResolver } from './core/auth/AuthResolver';
export { UserAgent } from './core/auth/UserAgent';
export type { Credentials, UserAgentOptions } from './core/auth/types';

export { TabularReader, sniffDelimiter } from './core/tabular/TabularReader';
export { RowCursor } from './core/tabular/RowCursor';
export type { CellValue, ListRow, DictRow, HeaderSpec, ListRowsOptions, DictRowsOptions, TabularRows } from './core/tabular/types';

export { RetrievalCache } from './core/retrieval/RetrievalCache';
export type { RetrievalCacheDeps } from './core/retrieval/RetrievalCache';
export { CacheKeyRegistry, cacheKey, derivedFilename } from './core/retrieval/CacheKey';
export type { RetrievalPolicy, RetrieveKind, RetrieveOptions } from './core/retrieval/types';

export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';
export { getTempDir, withTempDir, getPathForUrl, getFilenameFromUrl } from './utils/path';

// Export error classes for error handling
export {
  SDKError,
  ConfigurationError,
  InvalidArgumentError,
  NetworkError,
  NetworkTimeoutError,
  RetryExhaustedError,
  ApiError,
  ApiClientError,
  ApiServerError,
  DecodeError,
  StateError,
  CacheMissError,
} from './utils/errors';

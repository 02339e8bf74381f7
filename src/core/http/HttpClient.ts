// src/core/http/HttpClient.ts

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { createHash } from 'crypto';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import * as http from 'http';
import * as https from 'https';
import path from 'path';
import { performance } from 'perf_hooks';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { HttpClientConfig } from '../../config/ConfigValidator';
import type { AttemptOutcome, HttpMethod, QueryParams, RequestContext, RequestOptions, StreamResult } from './types';
import { validateClientConfig } from '../../config/ConfigValidator';
import { AuthResolver } from '../auth/AuthResolver';
import { UserAgent } from '../auth/UserAgent';
import { LiveResponse } from './LiveResponse';
import { RateLimiter } from './RateLimiter';
import { RetryPolicy } from './RetryPolicy';
import {
  ApiClientError,
  ApiError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  RetryExhaustedError,
  SDKError,
  StateError,
  errorMessage,
} from '../../utils/errors';
import { fileExists } from '../../utils/files';
import { getPathForUrl, getUrlLogstr, type PathForUrlOptions } from '../../utils/path';
import { generateCorrelationId, withHttpSpan } from '../../observability/tracing';

export interface HttpClientDeps {
  logger: Logger;
  metrics: MetricsCollector;
  env?: NodeJS.ProcessEnv;
  /** Jitter source for backoff, replaceable in tests */
  random?: () => number;
}

export type DownloadFileOptions = RequestOptions & PathForUrlOptions;

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Resilient downloader. One logical caller at a time: every request
 * replaces the previous response and invalidates any open row cursor.
 *
 * @example
 * ```typescript
 * await withHttpClient({ userAgent: 'my-app' }, deps, async (client) => {
 *   const rows = await client.downloadJson('https://example.com/data.json');
 * });
 * ```
 */
export class HttpClient {
  private axiosInstance: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private retryPolicy: RetryPolicy;
  private rateLimiter: RateLimiter;
  private current?: LiveResponse;
  private cursorToken?: symbol;
  private closed = false;

  private constructor(
    readonly context: RequestContext,
    private logger: Logger,
    private metrics: MetricsCollector,
    random?: () => number
  ) {
    this.retryPolicy = new RetryPolicy(context.retry, random);
    this.rateLimiter = new RateLimiter(context.rateLimit);
    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });
    this.axiosInstance = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
    });
  }

  /**
   * Validate the configuration and resolve credentials, extra parameters and
   * user agent into a frozen request context.
   *
   * @throws {ConfigurationError} on invalid or conflicting configuration
   */
  static async create(config: HttpClientConfig, deps: HttpClientDeps): Promise<HttpClient> {
    const validated = validateClientConfig(config);
    const env = deps.env ?? process.env;
    const decoration = await new AuthResolver(deps.logger, env).resolve(validated);
    const userAgentOptions =
      typeof validated.userAgent === 'string' ? { userAgent: validated.userAgent } : (validated.userAgent ?? {});
    const userAgent = await UserAgent.get(userAgentOptions, env);

    const context: RequestContext = Object.freeze({
      headers: Object.freeze({ ...validated.headers, 'User-Agent': userAgent }),
      credentials: decoration.credentials ? Object.freeze({ ...decoration.credentials }) : undefined,
      extraParams: Object.freeze({ ...decoration.extraParams }),
      rateLimit: validated.rateLimit ? Object.freeze({ ...validated.rateLimit }) : null,
      retry: Object.freeze({
        ...validated.retry,
        statuses: [...validated.retry.statuses],
        methods: [...validated.retry.methods],
      }),
      timeout: validated.timeout,
    });

    deps.logger.debug('HTTP client created', {
      userAgent,
      extraParamKeys: Object.keys(context.extraParams),
      rateLimit: context.rateLimit,
      hasCredentials: context.credentials !== undefined,
    });
    return new HttpClient(context, deps.logger, deps.metrics, deps.random);
  }

  static getUrlLogstr(url: string): string {
    return getUrlLogstr(url);
  }

  /**
   * Merge parameters into the query string of a url.
   */
  static getUrlForGet(url: string, params: QueryParams = {}): string {
    const entries = Object.entries(params);
    if (entries.length === 0) {
      return url;
    }
    const parsed = new URL(url);
    for (const [key, value] of entries) {
      parsed.searchParams.set(key, String(value));
    }
    return parsed.toString();
  }

  /**
   * Split a url into its query-less form and the parameters for a form body.
   */
  static getUrlParamsForPost(url: string, params: QueryParams = {}): { url: string; params: Record<string, string> } {
    const parsed = new URL(url);
    const merged: Record<string, string> = Object.fromEntries(parsed.searchParams);
    for (const [key, value] of Object.entries(params)) {
      merged[key] = String(value);
    }
    parsed.search = '';
    return { url: parsed.toString(), params: merged };
  }

  /**
   * The url a GET would be issued against, extra parameters included.
   */
  getFullUrl(url: string): string {
    return HttpClient.getUrlForGet(HttpClient.withScheme(url), this.context.extraParams);
  }

  /**
   * Issue a request and make its response current. Non-2xx responses are
   * returned as they are; only transport failures and exhausted retries throw.
   */
  async request(url: string, options: RequestOptions = {}): Promise<LiveResponse> {
    this.assertOpen();
    this.releaseCurrent();

    if (!SCHEME.test(url) && (await fileExists(url))) {
      this.logger.info('Reading local file', { path: url });
      this.current = new LiveResponse(url, 200, {}, createReadStream(url), options.encoding);
      return this.current;
    }

    const method = options.method ?? 'GET';
    const absolute = HttpClient.withScheme(url);
    let target: string;
    let data: URLSearchParams | undefined;
    if (method === 'POST') {
      const split = HttpClient.getUrlParamsForPost(absolute, options.params);
      target = HttpClient.getUrlForGet(split.url, this.context.extraParams);
      data = new URLSearchParams(split.params);
    } else {
      target = HttpClient.getUrlForGet(absolute, { ...this.context.extraParams, ...options.params });
    }

    const response = await this.execute(url, target, method, data, options);
    this.current = new LiveResponse(target, response.status, this.toHeaderRecord(response.headers), response.data, options.encoding);
    return this.current;
  }

  /**
   * Request a url, failing on a non-2xx status.
   *
   * @throws {ApiClientError} for 4xx
   * @throws {ApiServerError} for 5xx
   */
  async download(url: string, options: RequestOptions = {}): Promise<LiveResponse> {
    const response = await this.request(url, options);
    this.raiseForStatus(response);
    return response;
  }

  raiseForStatus(response: LiveResponse): void {
    if (response.ok) {
      return;
    }
    response.close();
    const status = response.status;
    const message = `Download of ${getUrlLogstr(response.url)} failed with status ${status}`;
    const details = { url: getUrlLogstr(response.url) };
    const error =
      status >= 400 && status < 500
        ? new ApiClientError(message, status, details)
        : status >= 500
          ? new ApiServerError(message, status, details)
          : new ApiError(message, status, details);
    this.logger.error('Download failed', { url: details.url, status });
    throw error;
  }

  /**
   * Stream the body of the current response to a file, hashing it on the way.
   * A partial file is removed when streaming fails.
   */
  async streamToFile(url: string, destination: string): Promise<StreamResult> {
    const response = this.requireCurrent();
    const body = response.takeStream();
    const hash = createHash('md5');
    let bytes = 0;

    await fs.mkdir(path.dirname(destination), { recursive: true });
    try {
      await pipeline(
        body,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            hash.update(chunk);
            bytes += chunk.length;
            yield chunk;
          }
        },
        createWriteStream(destination)
      );
    } catch (error: unknown) {
      await fs.rm(destination, { force: true });
      this.logger.error('Streaming to file failed', { url: getUrlLogstr(url), path: destination });
      throw new NetworkError(`Failed to stream ${getUrlLogstr(url)} to ${destination}: ${errorMessage(error)}`, {
        url: getUrlLogstr(url),
        path: destination,
      });
    } finally {
      response.close();
    }

    this.metrics.incrementCounter('bytes_streamed', { host: this.hostOf(response.url) }, bytes);
    return { path: destination, contentHash: hash.digest('hex'), bytes };
  }

  /**
   * Download a url and return the MD5 hex digest of its body without saving it.
   */
  async hashStream(url: string, options: RequestOptions = {}): Promise<string> {
    const response = await this.download(url, options);
    const hash = createHash('md5');
    try {
      for await (const chunk of response.takeStream()) {
        hash.update(chunk);
      }
    } catch (error: unknown) {
      throw new NetworkError(`Failed to hash ${getUrlLogstr(url)}: ${errorMessage(error)}`, { url: getUrlLogstr(url) });
    } finally {
      response.close();
    }
    return hash.digest('hex');
  }

  /**
   * Download a url to disk and return the path written.
   */
  async downloadFile(url: string, options: DownloadFileOptions = {}): Promise<string> {
    const { folder, filename, path: filePath, overwrite, ...requestOptions } = options;
    await this.download(url, requestOptions);
    const destination = await getPathForUrl(url, { folder, filename, path: filePath, overwrite });
    const result = await this.streamToFile(url, destination);
    return result.path;
  }

  async downloadText(url: string, options: RequestOptions = {}): Promise<string> {
    await this.download(url, options);
    return this.decodedText();
  }

  async downloadJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    await this.download(url, options);
    return this.decodedJson();
  }

  async downloadYaml(url: string, options: RequestOptions = {}): Promise<unknown> {
    await this.download(url, options);
    return this.decodedYaml();
  }

  async decodedText(): Promise<string> {
    return this.requireCurrent().text();
  }

  async decodedJson(): Promise<unknown> {
    return this.requireCurrent().json();
  }

  async decodedYaml(): Promise<unknown> {
    return this.requireCurrent().yaml();
  }

  /** The current response, for readers that consume its stream */
  getResponse(): LiveResponse {
    return this.requireCurrent();
  }

  getStatus(): number {
    return this.requireCurrent().status;
  }

  getHeader(name: string): string | undefined {
    return this.requireCurrent().getHeader(name);
  }

  getHeaders(): Readonly<Record<string, string>> {
    return this.requireCurrent().headers;
  }

  hasOpenCursor(): boolean {
    return this.cursorToken !== undefined;
  }

  /**
   * Reserve the single cursor slot of this client.
   *
   * @throws {StateError} when a cursor is already open
   */
  claimCursor(): symbol {
    if (this.cursorToken) {
      throw new StateError('A row cursor is already open on this client');
    }
    this.cursorToken = Symbol('cursor');
    return this.cursorToken;
  }

  releaseCursor(token: symbol): void {
    if (this.cursorToken === token) {
      this.cursorToken = undefined;
    }
  }

  isCursorValid(token: symbol): boolean {
    return this.cursorToken === token;
  }

  /**
   * Release the current response, any cursor and the keep-alive sockets.
   * Idempotent.
   */
  close(): void {
    if (this.closed) return;
    this.releaseCurrent();
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.logger.debug('HTTP client closed');
  }

  private async execute(
    url: string,
    target: string,
    method: HttpMethod,
    data: URLSearchParams | undefined,
    options: RequestOptions
  ): Promise<AxiosResponse<Readable>> {
    const host = this.hostOf(target);
    const logstr = getUrlLogstr(url);
    const requestId = generateCorrelationId();

    return withHttpSpan(method, logstr, async (span) => {
      const startTime = performance.now();
      let attempt = 0;

      for (;;) {
        attempt += 1;
        const waited = await this.rateLimiter.acquire();
        if (this.rateLimiter.enabled) {
          this.metrics.recordLatency('rate_limit_wait', waited, { host });
        }

        this.logger.info('Downloading', { url: logstr, method, attempt, requestId });
        let response: AxiosResponse<Readable> | undefined;
        let failure: unknown;
        try {
          response = await this.axiosInstance.request<Readable>({
            url: target,
            method,
            data,
            headers: { ...this.context.headers, 'X-Request-ID': requestId, ...options.headers },
            auth: this.context.credentials ? { ...this.context.credentials } : undefined,
            timeout: options.timeout ?? this.context.timeout ?? 0,
            responseType: 'stream',
            validateStatus: () => true,
          });
          this.metrics.incrementCounter('http_requests_total', { host, method, status: response.status });
        } catch (error: unknown) {
          failure = error;
          this.metrics.incrementCounter('http_requests_total', { host, method, status: 'error' });
        }

        const outcome: AttemptOutcome = response
          ? { kind: 'response', status: response.status, retryAfter: this.headerValue(response.headers['retry-after']) }
          : { kind: 'transport', error: failure };
        const decision = this.retryPolicy.shouldRetry(attempt, outcome, method);

        if (decision.retry) {
          response?.data.destroy();
          const reason = outcome.kind === 'transport' ? errorMessage(outcome.error) : `status ${outcome.status}`;
          this.metrics.incrementCounter('http_retries', {
            host,
            reason: outcome.kind === 'transport' ? 'transport' : String(outcome.status),
          });
          this.logger.warn('Retrying request', { url: logstr, attempt, delayMs: Math.round(decision.delayMs), reason });
          await sleep(decision.delayMs);
          continue;
        }

        this.metrics.recordLatency('http_request_duration', performance.now() - startTime, {
          host,
          status: response?.status ?? 'error',
        });

        if (!response) {
          throw this.fail(this.transportError(failure, logstr, attempt), host);
        }
        if (this.retryPolicy.isRetryableStatus(response.status) && this.retryPolicy.isRetryableMethod(method)) {
          response.data.destroy();
          throw this.fail(
            new RetryExhaustedError(
              `Giving up on ${logstr} after ${attempt} attempts with status ${response.status}`,
              response.status,
              attempt,
              { url: logstr }
            ),
            host
          );
        }

        span?.setAttribute('http.status_code', response.status);
        span?.setAttribute('http.attempts', attempt);
        return response;
      }
    });
  }

  private transportError(error: unknown, logstr: string, attempts: number): NetworkError {
    const code = axios.isAxiosError(error) ? error.code : undefined;
    if (code && TIMEOUT_CODES.has(code)) {
      return new NetworkTimeoutError(`Request to ${logstr} timed out`, { url: logstr, attempts });
    }
    return new NetworkError(`Request to ${logstr} failed: ${errorMessage(error)}`, {
      url: logstr,
      attempts,
      cause: code ?? errorMessage(error),
    });
  }

  private fail(error: SDKError, host: string): SDKError {
    this.metrics.incrementCounter('http_errors', { host, code: error.code });
    this.logger.error('Request failed', { code: error.code, message: error.message, ...error.details });
    return error;
  }

  private releaseCurrent(): void {
    this.cursorToken = undefined;
    this.current?.close();
    this.current = undefined;
  }

  private requireCurrent(): LiveResponse {
    if (!this.current) {
      throw new StateError('No current response: call request() or download() first');
    }
    return this.current;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StateError('HTTP client has been closed');
    }
  }

  private hostOf(url: string): string {
    try {
      return new URL(url).host || 'local';
    } catch {
      return 'local';
    }
  }

  private headerValue(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (Array.isArray(value)) return value.join(', ');
    return undefined;
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      const text = this.headerValue(value);
      if (text !== undefined) {
        record[key.toLowerCase()] = text;
      }
    }
    return record;
  }

  private static withScheme(url: string): string {
    return SCHEME.test(url) ? url : `http://${url}`;
  }
}

/**
 * Run fn with a fresh client that is closed afterwards, whatever happens.
 */
export async function withHttpClient<T>(
  config: HttpClientConfig,
  deps: HttpClientDeps,
  fn: (client: HttpClient) => Promise<T>
): Promise<T> {
  const client = await HttpClient.create(config, deps);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

// src/core/retrieval/RetrievalCache.ts

import { promises as fs } from 'fs';
import type { HttpClient } from '../http/HttpClient';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { RetrievalPolicyInput } from '../../config/ConfigValidator';
import type { RequestOptions } from '../http/types';
import type { DictRow, DictRowsOptions, ListRow, ListRowsOptions, TabularRows } from '../tabular/types';
import type { RetrievalPolicy, RetrievalSource, RetrieveKind, RetrieveOptions } from './types';
import { validateRetrievalPolicy } from '../../config/ConfigValidator';
import { CacheKeyRegistry, defaultCacheKeyRegistry } from './CacheKey';
import { TabularReader } from '../tabular/TabularReader';
import { CacheMissError, SDKError, errorMessage, isRecoverableRetrievalError } from '../../utils/errors';
import { fileExists, loadJson, loadText, loadYaml, saveBytes } from '../../utils/files';
import { getTempRoot, getUrlLogstr } from '../../utils/path';
import { recordRetrievalSource, withRetrievalSpan } from '../../observability/tracing';

export interface RetrievalCacheDeps {
  logger: Logger;
  metrics: MetricsCollector;
  registry?: CacheKeyRegistry;
  /** Source of TEMP_DIR when the policy names no tempDir */
  env?: NodeJS.ProcessEnv;
}

type TabularRetrieveOptions = { fallback?: boolean; logstr?: string };

/**
 * Retrieves files, text, JSON and YAML either from the network, from copies
 * saved by an earlier run, or from static fallback data.
 *
 * - `save`: downloads are kept in savedDir (emptied on creation)
 * - `useSaved`: only savedDir is read, the network is never touched
 * - neither: downloads land in tempDir
 *
 * @example
 * ```typescript
 * const retriever = await RetrievalCache.create(client, {
 *   fallbackDir: 'config/fallback',
 *   savedDir: 'saved_data',
 *   save: true,
 * }, { logger, metrics });
 * const data = await retriever.retrieveJson('https://example.com/data.json', 'data.json', { fallback: true });
 * ```
 */
export class RetrievalCache {
  private registry: CacheKeyRegistry;
  private logger: Logger;
  private metrics: MetricsCollector;

  private constructor(
    readonly client: HttpClient,
    readonly policy: Readonly<RetrievalPolicy>,
    deps: RetrievalCacheDeps
  ) {
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.registry = deps.registry ?? defaultCacheKeyRegistry;
  }

  /**
   * @throws {ConfigurationError} when save and useSaved are both set
   */
  static async create(
    client: HttpClient,
    policy: RetrievalPolicyInput,
    deps: RetrievalCacheDeps
  ): Promise<RetrievalCache> {
    const validated = validateRetrievalPolicy(policy);
    const resolved: RetrievalPolicy = Object.freeze({
      ...validated,
      tempDir: validated.tempDir ?? getTempRoot(deps.env),
    });

    if (resolved.save) {
      await fs.rm(resolved.savedDir, { recursive: true, force: true });
      await fs.mkdir(resolved.savedDir, { recursive: true });
      deps.logger.info('Emptied saved data folder', { savedDir: resolved.savedDir });
    }
    return new RetrievalCache(client, resolved, deps);
  }

  static getUrlLogstr(url: string): string {
    return getUrlLogstr(url);
  }

  /**
   * Retrieve a url as a local file, text, JSON or YAML.
   *
   * @param filename - name of the cache entry; derived from the url when omitted
   * @throws {CacheMissError} under useSaved when no saved copy exists
   * @throws the original retrieval error when there is no usable fallback
   */
  fetch(url: string, filename: string | undefined, kind: 'file' | 'text', options?: RetrieveOptions): Promise<string>;
  fetch(url: string, filename: string | undefined, kind: 'json' | 'yaml', options?: RetrieveOptions): Promise<unknown>;
  async fetch(
    url: string,
    filename: string | undefined,
    kind: RetrieveKind,
    options: RetrieveOptions = {}
  ): Promise<unknown> {
    const { fallback = false, logstr, ...requestOptions } = options;
    const label = logstr ?? filename ?? getUrlLogstr(url);

    return withRetrievalSpan(kind, filename ?? getUrlLogstr(url), async () => {
      if (this.policy.useSaved) {
        const savedPath = this.registry.resolve(this.policy.savedDir, url, filename);
        if (!(await fileExists(savedPath))) {
          throw new CacheMissError(`No saved copy of ${label} at ${savedPath}`, savedPath);
        }
        this.logger.info(`Using saved ${kind}`, { label, path: savedPath });
        const result = await this.decodeLocal(savedPath, kind, requestOptions.encoding);
        this.recordSource(kind, 'saved', savedPath);
        return result;
      }

      try {
        const result = await this.fromNetwork(url, filename, kind, label, requestOptions);
        this.recordSource(kind, 'network');
        return result;
      } catch (error: unknown) {
        if (!fallback || !isRecoverableRetrievalError(error)) {
          throw error;
        }
        return this.fromFallback(url, filename, kind, label, error, requestOptions.encoding);
      }
    });
  }

  async retrieveFile(url: string, filename?: string, options: RetrieveOptions = {}): Promise<string> {
    return this.fetch(url, filename, 'file', options);
  }

  async retrieveText(url: string, filename?: string, options: RetrieveOptions = {}): Promise<string> {
    return this.fetch(url, filename, 'text', options);
  }

  async retrieveJson(url: string, filename?: string, options: RetrieveOptions = {}): Promise<unknown> {
    return this.fetch(url, filename, 'json', options);
  }

  async retrieveYaml(url: string, filename?: string, options: RetrieveOptions = {}): Promise<unknown> {
    return this.fetch(url, filename, 'yaml', options);
  }

  /**
   * Retrieve a tabular file, then open a row cursor over the local copy.
   */
  retrieveTabularRows(
    url: string,
    filename: string | undefined,
    options?: ListRowsOptions & TabularRetrieveOptions
  ): Promise<TabularRows<ListRow>>;
  retrieveTabularRows(
    url: string,
    filename: string | undefined,
    options: DictRowsOptions & TabularRetrieveOptions
  ): Promise<TabularRows<DictRow>>;
  async retrieveTabularRows(
    url: string,
    filename: string | undefined,
    options: (ListRowsOptions | DictRowsOptions) & TabularRetrieveOptions = {}
  ): Promise<TabularRows<ListRow> | TabularRows<DictRow>> {
    const path = await this.retrieveFile(url, filename, {
      ...options.request,
      fallback: options.fallback,
      logstr: options.logstr,
    });
    const reader = new TabularReader(this.client, this.logger);
    if (options.dictForm === true) {
      return reader.openRows(path, { ...options, request: undefined });
    }
    return reader.openRows(path, { ...options, request: undefined });
  }

  private async fromNetwork(
    url: string,
    filename: string | undefined,
    kind: RetrieveKind,
    label: string,
    options: RequestOptions
  ): Promise<unknown> {
    const root = this.policy.save ? this.policy.savedDir : this.policy.tempDir;
    const destination = this.registry.resolve(root, url, filename);
    this.logger.info(`Downloading ${kind} from ${label}`, { url: getUrlLogstr(url), path: destination });

    const response = await this.client.download(url, options);
    if (kind === 'file') {
      const result = await this.client.streamToFile(url, destination);
      return result.path;
    }

    let decoded: unknown;
    switch (kind) {
      case 'text':
        decoded = await response.text();
        break;
      case 'json':
        decoded = await response.json();
        break;
      case 'yaml':
        decoded = await response.yaml();
        break;
    }
    await saveBytes(destination, await response.buffer());
    return decoded;
  }

  private async fromFallback(
    url: string,
    filename: string | undefined,
    kind: RetrieveKind,
    label: string,
    original: SDKError,
    encoding?: BufferEncoding
  ): Promise<unknown> {
    const fallbackPath = this.registry.resolve(this.policy.fallbackDir, url, filename);
    this.logger.warn(`Using static fallback ${kind} for ${label}`, {
      path: fallbackPath,
      code: original.code,
      error: original.message,
    });

    try {
      if (!(await fileExists(fallbackPath))) {
        throw new CacheMissError(`No fallback for ${label} at ${fallbackPath}`, fallbackPath);
      }
      const result = await this.decodeLocal(fallbackPath, kind, encoding);
      this.recordSource(kind, 'fallback', fallbackPath);
      return result;
    } catch (fallbackError: unknown) {
      original.details = {
        ...original.details,
        fallbackAttempted: true,
        fallbackPath,
        fallbackError: errorMessage(fallbackError),
      };
      this.logger.error(`Fallback for ${label} failed`, {
        path: fallbackPath,
        error: errorMessage(fallbackError),
      });
      throw original;
    }
  }

  private async decodeLocal(filePath: string, kind: RetrieveKind, encoding?: BufferEncoding): Promise<unknown> {
    switch (kind) {
      case 'file':
        return filePath;
      case 'text':
        return loadText(filePath, encoding);
      case 'json':
        return loadJson(filePath);
      case 'yaml':
        return loadYaml(filePath);
    }
  }

  private recordSource(kind: RetrieveKind, source: RetrievalSource, filePath?: string): void {
    this.metrics.incrementCounter('retrievals_total', { kind, source });
    recordRetrievalSource(source, filePath);
  }
}

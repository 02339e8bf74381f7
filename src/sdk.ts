// src/sdk.ts

import type { InitConfig, RetrievalPolicyInput } from './config/ConfigValidator';
import { validateConfig } from './config/ConfigValidator';
import { HttpClient, type HttpClientDeps } from './core/http/HttpClient';
import { TabularReader } from './core/tabular/TabularReader';
import { RetrievalCache } from './core/retrieval/RetrievalCache';
import { CacheKeyRegistry, defaultCacheKeyRegistry } from './core/retrieval/CacheKey';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { StateError } from './utils/errors';

export const DEFAULT_CLIENT = 'default';

export interface SDKOptions {
  env?: NodeJS.ProcessEnv;
  registry?: CacheKeyRegistry;
}

/**
 * Entry point wiring logging, metrics and a set of named HTTP clients.
 * Custom clients inherit the default client's configuration and override
 * the keys they set.
 */
export class RetrievalSDK {
  private clients: Map<string, HttpClient> = new Map();

  private constructor(
    readonly logger: Logger,
    readonly metrics: MetricsCollector,
    private registry: CacheKeyRegistry,
    private env?: NodeJS.ProcessEnv
  ) {}

  /**
   * Initialize the retrieval SDK
   *
   * @param config - default client configuration, custom clients, logging and metrics
   * @returns Promise that resolves to an SDK instance with every client created
   * @throws {ConfigurationError} If configuration is invalid or credentials cannot be resolved
   *
   * @example
   * ```typescript
   * const sdk = await RetrievalSDK.init({
   *   client: {
   *     userAgent: 'my-app',
   *     rateLimit: { calls: 1, period: 0.5 },
   *     retry: { maxAttempts: 3 },
   *   },
   *   customClients: {
   *     authenticated: { basicAuthFile: '/etc/my-app/basic_auth.txt' },
   *   },
   * });
   * const retriever = await sdk.createRetriever({ fallbackDir: 'fallback', savedDir: 'saved' });
   * ```
   */
  static async init(config: InitConfig, options: SDKOptions = {}): Promise<RetrievalSDK> {
    const validated = validateConfig(config);
    const logger = new Logger(validated.logging);
    const metrics = new MetricsCollector(validated.metrics);
    const sdk = new RetrievalSDK(logger, metrics, options.registry ?? defaultCacheKeyRegistry, options.env);
    const deps: HttpClientDeps = { logger, metrics, env: options.env };

    try {
      sdk.clients.set(DEFAULT_CLIENT, await HttpClient.create(validated.client, deps));
      for (const [name, custom] of Object.entries(validated.customClients ?? {})) {
        sdk.clients.set(name, await HttpClient.create({ ...validated.client, ...custom }, deps));
      }
    } catch (error: unknown) {
      sdk.close();
      throw error;
    }

    logger.info('SDK initialized', { clients: Array.from(sdk.clients.keys()) });
    return sdk;
  }

  /**
   * Named client, or the default one when the name is absent or unknown.
   */
  getClient(name?: string): HttpClient {
    const client = (name && this.clients.get(name)) || this.clients.get(DEFAULT_CLIENT);
    if (!client) {
      throw new StateError('SDK has been closed');
    }
    return client;
  }

  getClientNames(): string[] {
    return Array.from(this.clients.keys());
  }

  async createRetriever(policy: RetrievalPolicyInput, clientName?: string): Promise<RetrievalCache> {
    return RetrievalCache.create(this.getClient(clientName), policy, {
      logger: this.logger,
      metrics: this.metrics,
      registry: this.registry,
      env: this.env,
    });
  }

  createTabularReader(clientName?: string): TabularReader {
    return new TabularReader(this.getClient(clientName), this.logger);
  }

  /**
   * Prometheus text exposition of the collected metrics
   */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  /**
   * Close every client. Idempotent.
   */
  close(): void {
    for (const client of this.clients.values()) {
      client.close();
    }
    this.clients.clear();
  }
}

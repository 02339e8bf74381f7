// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const HTTP_METHODS = ['GET', 'HEAD', 'OPTIONS', 'TRACE', 'PUT', 'DELETE', 'POST', 'PATCH'] as const;

export const DEFAULT_RETRY_STATUSES = [429, 500, 502, 503, 504];
export const DEFAULT_RETRY_METHODS: Array<(typeof HTTP_METHODS)[number]> = ['GET', 'HEAD', 'OPTIONS', 'TRACE'];

// Retry Configuration Schema
export const RetrySpecSchema = z
  .object({
    statuses: z.array(z.number().int().min(100).max(599)).default(DEFAULT_RETRY_STATUSES),
    methods: z.array(z.enum(HTTP_METHODS)).default(DEFAULT_RETRY_METHODS),
    maxAttempts: z.number().int().min(1).max(20).default(5),
    baseDelay: z.number().nonnegative().default(400),
    maxDelay: z.number().nonnegative().default(10000),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Rate Limit Configuration Schema (period in seconds)
export const RateLimitSpecSchema = z.object({
  calls: z.number().int().positive(),
  period: z.number().positive(),
});

// User agent: a plain string or the parts to build one from
export const UserAgentOptionsSchema = z.object({
  userAgent: z.string().min(1).optional(),
  configYaml: z.string().min(1).optional(),
  lookup: z.string().min(1).optional(),
  prefix: z.string().optional(),
  preprefix: z.string().optional(),
});

// HTTP client configuration as handed over by a configuration loader
export const HttpClientConfigSchema = z.object({
  userAgent: z.union([z.string().min(1), UserAgentOptionsSchema]).optional(),
  auth: z.tuple([z.string(), z.string()]).optional(),
  basicAuth: z.string().min(1).optional(),
  basicAuthFile: z.string().min(1).optional(),
  extraParamsDict: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
  extraParamsJson: z.string().min(1).optional(),
  extraParamsYaml: z.string().min(1).optional(),
  extraParamsLookup: z.string().min(1).optional(),
  headers: z.record(z.string(), z.string()).optional(),
  rateLimit: RateLimitSpecSchema.nullable().optional(),
  retry: RetrySpecSchema.default({}),
  timeout: z.number().positive().optional(),
  useEnv: z.boolean().default(true),
  failOnMissingFile: z.boolean().default(true),
});

// Retrieval policy
export const RetrievalPolicySchema = z
  .object({
    fallbackDir: z.string().min(1),
    savedDir: z.string().min(1),
    tempDir: z.string().min(1).optional(),
    save: z.boolean().default(false),
    useSaved: z.boolean().default(false),
  })
  .refine((data) => !(data.save && data.useSaved), {
    message: 'Either the save or useSaved flags can be set to true, not both',
  });

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    prefix: z.string().optional(),
  })
  .optional();

// Complete Init Configuration Schema
export const InitConfigSchema = z.object({
  client: HttpClientConfigSchema,
  customClients: z.record(z.string().min(1), HttpClientConfigSchema.partial()).optional(),
  metrics: MetricsConfigSchema,
  logging: LoggerConfigSchema,
});

export type HttpClientConfig = z.input<typeof HttpClientConfigSchema>;
export type ValidatedHttpClientConfig = z.output<typeof HttpClientConfigSchema>;
export type RetrySpecInput = z.input<typeof RetrySpecSchema>;
export type RetrievalPolicyInput = z.input<typeof RetrievalPolicySchema>;
export type InitConfig = z.input<typeof InitConfigSchema>;
export type ValidatedInitConfig = z.output<typeof InitConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, config: unknown, what: string): z.output<S> {
  const result = schema.safeParse(config);
  if (!result.success) {
    const errors = formatIssues(result.error);
    throw new ConfigurationError(`Invalid ${what}: ${errors.join('; ')}`, { errors });
  }
  return result.data;
}

/**
 * Validate an HTTP client configuration, filling in defaults.
 *
 * @throws {ConfigurationError} listing every offending path
 */
export function validateClientConfig(config: unknown): ValidatedHttpClientConfig {
  return parseOrThrow(HttpClientConfigSchema, config, 'client configuration');
}

export function validateRetrievalPolicy(policy: unknown): z.output<typeof RetrievalPolicySchema> {
  return parseOrThrow(RetrievalPolicySchema, policy, 'retrieval policy');
}

/**
 * Validate SDK initialization configuration
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: unknown): ValidatedInitConfig {
  return parseOrThrow(InitConfigSchema, config, 'configuration');
}

/**
 * Validate configuration and return user-friendly errors
 *
 * @returns Object with { success: boolean, data?: Config, errors?: string[] }
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ValidatedInitConfig } | { success: false; errors: string[] } {
  const result = InitConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}

// src/core/auth/AuthResolver.ts

import type { Logger } from '../../observability/Logger';
import type { ValidatedHttpClientConfig } from '../../config/ConfigValidator';
import type {
  AuthSource,
  AuthSources,
  Credentials,
  ExtraParamsSource,
  RequestDecoration,
} from './types';
import { ConfigurationError } from '../../utils/errors';
import { fileExists, loadJson, loadText, loadYaml } from '../../utils/files';

export const ENV_BASIC_AUTH = 'RETRIEVER_BASIC_AUTH';
export const ENV_EXTRA_PARAMS = 'RETRIEVER_EXTRA_PARAMS';

export type AuthConfig = Pick<
  ValidatedHttpClientConfig,
  | 'auth'
  | 'basicAuth'
  | 'basicAuthFile'
  | 'extraParamsDict'
  | 'extraParamsJson'
  | 'extraParamsYaml'
  | 'extraParamsLookup'
  | 'useEnv'
  | 'failOnMissingFile'
>;

type ParamValue = string | number | boolean;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turns the loose auth and extra-parameter options of a client into the
 * credential and query parameters every request carries.
 *
 * Precedence: explicit credential, then explicit extra parameters (which may
 * carry a `basic_auth` entry), then environment variables, then nothing.
 */
export class AuthResolver {
  constructor(
    private logger: Logger,
    private env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Classify the configured sources, rejecting mutually exclusive ones.
   */
  classify(config: AuthConfig): AuthSources {
    const authSources: AuthSource[] = [];
    if (config.auth) {
      authSources.push({ kind: 'credentials', username: config.auth[0], password: config.auth[1] });
    }
    if (config.basicAuth) {
      authSources.push({ kind: 'basic', value: config.basicAuth });
    }
    if (config.basicAuthFile) {
      authSources.push({ kind: 'basicFile', path: config.basicAuthFile });
    }
    if (authSources.length > 1) {
      throw new ConfigurationError('More than one authorisation given!', {
        sources: authSources.map((source) => source.kind),
      });
    }

    const lookup = config.extraParamsLookup;
    const paramSources: ExtraParamsSource[] = [];
    if (config.extraParamsDict) {
      paramSources.push({ kind: 'inline', params: this.stringify(config.extraParamsDict), lookup });
    }
    if (config.extraParamsJson) {
      paramSources.push({ kind: 'jsonFile', path: config.extraParamsJson, lookup });
    }
    if (config.extraParamsYaml) {
      paramSources.push({ kind: 'yamlFile', path: config.extraParamsYaml, lookup });
    }
    if (paramSources.length > 1) {
      throw new ConfigurationError('More than one set of extra parameters given!', {
        sources: paramSources.map((source) => source.kind),
      });
    }

    let auth: AuthSource = authSources[0] ?? { kind: 'none' };
    let extraParams: ExtraParamsSource = paramSources[0] ?? { kind: 'none' };

    if (config.useEnv) {
      const envAuth = this.env[ENV_BASIC_AUTH];
      if (auth.kind === 'none' && envAuth) {
        auth = { kind: 'env', variable: ENV_BASIC_AUTH, value: envAuth };
      }
      const envParams = this.env[ENV_EXTRA_PARAMS];
      if (extraParams.kind === 'none' && envParams) {
        extraParams = { kind: 'env', variable: ENV_EXTRA_PARAMS, value: envParams };
      }
    }

    return { auth, extraParams };
  }

  async resolve(config: AuthConfig): Promise<RequestDecoration> {
    const sources = this.classify(config);
    const extraParams = await this.loadExtraParams(sources.extraParams, config.failOnMissingFile);

    let auth = sources.auth;
    const lifted = extraParams.basic_auth;
    if (lifted !== undefined) {
      delete extraParams.basic_auth;
      if (auth.kind !== 'none' && auth.kind !== 'env') {
        throw new ConfigurationError('More than one authorisation given!', {
          sources: [auth.kind, 'extraParams'],
        });
      }
      this.logger.info('Loading authorisation from basic_auth parameter');
      auth = { kind: 'basic', value: lifted };
    }

    const credentials = await this.loadCredentials(auth, config.failOnMissingFile);
    return { credentials, extraParams };
  }

  /**
   * Decode a basic auth string ("Basic <base64 of user:pass>").
   */
  static decodeBasicAuth(value: string): Credentials {
    const parts = value.trim().split(/\s+/);
    const token = parts.length === 2 && parts[0].toLowerCase() === 'basic' ? parts[1] : parts[0];
    if (parts.length > 2 || !token || !/^[A-Za-z0-9+/]+={0,2}$/.test(token)) {
      throw new ConfigurationError('Basic auth string is malformed');
    }
    const decoded = Buffer.from(token, 'base64').toString('utf8');
    const separator = decoded.indexOf(':');
    if (separator < 0) {
      throw new ConfigurationError('Basic auth string does not contain username:password');
    }
    return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
  }

  private async loadCredentials(source: AuthSource, failOnMissing: boolean): Promise<Credentials | undefined> {
    switch (source.kind) {
      case 'none':
        return undefined;
      case 'credentials':
        this.logger.info('Loading authorisation from auth argument');
        return { username: source.username, password: source.password };
      case 'basic':
        return AuthResolver.decodeBasicAuth(source.value);
      case 'env':
        this.logger.info('Loading authorisation from environment', { variable: source.variable });
        return AuthResolver.decodeBasicAuth(source.value);
      case 'basicFile': {
        if (!(await this.checkFile(source.path, failOnMissing))) {
          return undefined;
        }
        this.logger.info('Loading authorisation from file', { path: source.path });
        return AuthResolver.decodeBasicAuth(await loadText(source.path));
      }
    }
  }

  private async loadExtraParams(source: ExtraParamsSource, failOnMissing: boolean): Promise<Record<string, string>> {
    let loaded: unknown;
    let lookup: string | undefined;
    switch (source.kind) {
      case 'none':
        return {};
      case 'env':
        this.logger.info('Loading extra parameters from environment', { variable: source.variable });
        return Object.fromEntries(new URLSearchParams(source.value));
      case 'inline':
        this.logger.info('Loading extra parameters from dictionary');
        loaded = source.params;
        lookup = source.lookup;
        break;
      case 'jsonFile':
      case 'yamlFile':
        if (!(await this.checkFile(source.path, failOnMissing))) {
          return {};
        }
        this.logger.info('Loading extra parameters from file', { path: source.path });
        loaded = source.kind === 'jsonFile' ? await loadJson(source.path) : await loadYaml(source.path);
        lookup = source.lookup;
        break;
    }

    if (!isRecord(loaded)) {
      throw new ConfigurationError('Extra parameters must be a mapping');
    }
    let params: Record<string, unknown> = loaded;
    if (lookup) {
      const nested = params[lookup];
      if (!isRecord(nested)) {
        throw new ConfigurationError(`${lookup} does not exist in extra params!`);
      }
      params = nested;
    }
    return this.stringify(params);
  }

  private async checkFile(path: string, failOnMissing: boolean): Promise<boolean> {
    if (await fileExists(path)) {
      return true;
    }
    if (failOnMissing) {
      throw new ConfigurationError(`Configuration file ${path} does not exist`, { path });
    }
    this.logger.warn('Configuration file missing, skipping', { path });
    return false;
  }

  private stringify(params: Record<string, unknown>): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(params)) {
      if (!this.isParamValue(value)) {
        throw new ConfigurationError(`Extra parameter ${key} must be a string, number or boolean`);
      }
      result[key] = String(value);
    }
    return result;
  }

  private isParamValue(value: unknown): value is ParamValue {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
  }
}

// src/core/auth/UserAgent.ts

import type { UserAgentOptions } from './types';
import { ConfigurationError, DecodeError } from '../../utils/errors';
import { fileExists, loadYaml } from '../../utils/files';

export const DEFAULT_PREFIX = 'TabularRetriever/1.0.0';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, key: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`User agent setting ${key} must be a string`);
  }
  return value;
}

/**
 * Builds the User-Agent header value sent by every client.
 *
 * @example
 * ```typescript
 * await UserAgent.create({ userAgent: 'my-app', preprefix: 'team' });
 * // 'team:TabularRetriever/1.0.0-my-app'
 * ```
 */
export class UserAgent {
  private static globalUserAgent?: string;

  /**
   * Resolve the full user agent string. USER_AGENT and PREPREFIX in the
   * environment win over every other source.
   */
  static async create(options: UserAgentOptions = {}, env: NodeJS.ProcessEnv = process.env): Promise<string> {
    let userAgent = env.USER_AGENT || options.userAgent;
    let preprefix = options.preprefix;

    if (!userAgent && options.configYaml) {
      const fromFile = await UserAgent.loadConfig(options.configYaml, options.lookup);
      userAgent = fromFile.userAgent;
      preprefix = preprefix ?? fromFile.preprefix;
    }
    if (!userAgent) {
      throw new ConfigurationError('No user agent given!');
    }
    if (env.PREPREFIX) {
      preprefix = env.PREPREFIX;
    }

    const prefix = options.prefix ?? DEFAULT_PREFIX;
    let full = prefix ? `${prefix}-${userAgent}` : userAgent;
    if (preprefix) {
      full = `${preprefix}:${full}`;
    }
    return full;
  }

  /**
   * Set the process-wide user agent used by clients constructed without one.
   */
  static async setGlobal(options: UserAgentOptions, env: NodeJS.ProcessEnv = process.env): Promise<void> {
    UserAgent.globalUserAgent = await UserAgent.create(options, env);
  }

  static clearGlobal(): void {
    UserAgent.globalUserAgent = undefined;
  }

  /**
   * Resolve a user agent, falling back to the process-wide default when
   * no source is configured.
   */
  static async get(options: UserAgentOptions = {}, env: NodeJS.ProcessEnv = process.env): Promise<string> {
    const configured = options.userAgent || options.configYaml || env.USER_AGENT;
    if (!configured && UserAgent.globalUserAgent) {
      return UserAgent.globalUserAgent;
    }
    return UserAgent.create(options, env);
  }

  private static async loadConfig(
    path: string,
    lookup?: string
  ): Promise<{ userAgent?: string; preprefix?: string }> {
    if (!(await fileExists(path))) {
      throw new ConfigurationError(`User agent configuration ${path} does not exist`, { path });
    }
    let config: unknown;
    try {
      config = await loadYaml(path);
    } catch (error: unknown) {
      if (error instanceof DecodeError) {
        throw new ConfigurationError(`User agent configuration ${path} is not valid YAML`, {
          path,
          ...error.position,
        });
      }
      throw error;
    }
    if (lookup) {
      if (!isRecord(config) || !isRecord(config[lookup])) {
        throw new ConfigurationError(`No user agent or preprefix with key ${lookup}`, { path });
      }
      config = config[lookup];
    }
    if (!isRecord(config)) {
      throw new ConfigurationError(`User agent configuration ${path} must be a mapping`, { path });
    }
    return {
      userAgent: optionalString(config.user_agent, 'user_agent'),
      preprefix: optionalString(config.preprefix, 'preprefix'),
    };
  }
}

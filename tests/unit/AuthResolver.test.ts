// tests/unit/AuthResolver.test.ts

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { AuthResolver, ENV_BASIC_AUTH, ENV_EXTRA_PARAMS } from '../../src/core/auth/AuthResolver';
import { validateClientConfig, type HttpClientConfig } from '../../src/config/ConfigValidator';
import { Logger } from '../../src/observability/Logger';
import { ConfigurationError } from '../../src/utils/errors';
import { makeTempDir, removeDir } from '../helpers/deps';

const basic = (credentials: string) => `Basic ${Buffer.from(credentials).toString('base64')}`;

describe('AuthResolver', () => {
  const logger = new Logger({ silent: true });
  let dir: string;

  const resolve = (config: HttpClientConfig, env: NodeJS.ProcessEnv = {}) =>
    new AuthResolver(logger, env).resolve(validateClientConfig(config));

  beforeAll(async () => {
    dir = await makeTempDir();
    await fs.writeFile(path.join(dir, 'params.yaml'), 'myparams:\n  api_key: test-key\n  limit: 10\n');
    await fs.writeFile(path.join(dir, 'params.json'), '{"api_key": "test-key", "basic_auth": "' + basic('user:test-secret') + '"}');
    await fs.writeFile(path.join(dir, 'basic_auth.txt'), basic('fileuser:test-secret') + '\n');
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  it('should resolve nothing by default', async () => {
    expect(await resolve({})).toEqual({ credentials: undefined, extraParams: {} });
  });

  it('should use an explicit user and password', async () => {
    const decoration = await resolve({ auth: ['user', 'test-secret'] });

    expect(decoration.credentials).toEqual({ username: 'user', password: 'test-secret' });
  });

  it('should decode a basic auth string', async () => {
    const decoration = await resolve({ basicAuth: basic('user:test-secret') });

    expect(decoration.credentials).toEqual({ username: 'user', password: 'test-secret' });
  });

  it('should read a basic auth file', async () => {
    const decoration = await resolve({ basicAuthFile: path.join(dir, 'basic_auth.txt') });

    expect(decoration.credentials).toEqual({ username: 'fileuser', password: 'test-secret' });
  });

  it('should reject more than one authorisation', async () => {
    await expect(resolve({ auth: ['user', 'test-secret'], basicAuth: basic('user:test-secret') })).rejects.toThrow(
      'More than one authorisation given!'
    );
  });

  it('should reject more than one set of extra parameters', async () => {
    await expect(
      resolve({ extraParamsDict: { key: 'value' }, extraParamsJson: path.join(dir, 'params.json') })
    ).rejects.toThrow('More than one set of extra parameters given!');
  });

  it('should stringify inline extra parameters', async () => {
    const decoration = await resolve({ extraParamsDict: { key: 'value', page: 2, flag: true } });

    expect(decoration.extraParams).toEqual({ key: 'value', page: '2', flag: 'true' });
  });

  it('should read extra parameters from YAML under a lookup key', async () => {
    const decoration = await resolve({
      extraParamsYaml: path.join(dir, 'params.yaml'),
      extraParamsLookup: 'myparams',
    });

    expect(decoration.extraParams).toEqual({ api_key: 'test-key', limit: '10' });
  });

  it('should fail on an absent lookup key', async () => {
    await expect(
      resolve({ extraParamsYaml: path.join(dir, 'params.yaml'), extraParamsLookup: 'nothere' })
    ).rejects.toThrow('nothere does not exist in extra params!');
  });

  it('should lift basic_auth out of extra parameters', async () => {
    const decoration = await resolve({ extraParamsJson: path.join(dir, 'params.json') });

    expect(decoration.credentials).toEqual({ username: 'user', password: 'test-secret' });
    expect(decoration.extraParams).toEqual({ api_key: 'test-key' });
  });

  it('should reject basic_auth in extra parameters next to an explicit credential', async () => {
    await expect(
      resolve({ auth: ['user', 'test-secret'], extraParamsJson: path.join(dir, 'params.json') })
    ).rejects.toThrow('More than one authorisation given!');
  });

  it('should fail on a missing file by default', async () => {
    await expect(resolve({ extraParamsJson: path.join(dir, 'missing.json') })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('should skip a missing file with a warning when allowed', async () => {
    const warn = vi.spyOn(logger, 'warn');

    const decoration = await resolve({
      basicAuthFile: path.join(dir, 'missing.txt'),
      failOnMissingFile: false,
    });

    expect(decoration).toEqual({ credentials: undefined, extraParams: {} });
    expect(warn).toHaveBeenCalledWith('Configuration file missing, skipping', { path: path.join(dir, 'missing.txt') });
    warn.mockRestore();
  });

  it('should read the environment when nothing explicit is given', async () => {
    const env = { [ENV_BASIC_AUTH]: basic('envuser:test-secret'), [ENV_EXTRA_PARAMS]: 'a=1&b=two' };

    const decoration = await resolve({}, env);

    expect(decoration.credentials).toEqual({ username: 'envuser', password: 'test-secret' });
    expect(decoration.extraParams).toEqual({ a: '1', b: 'two' });
  });

  it('should prefer explicit sources over the environment', async () => {
    const env = { [ENV_BASIC_AUTH]: basic('envuser:test-secret'), [ENV_EXTRA_PARAMS]: 'a=1' };

    const decoration = await resolve({ auth: ['user', 'test-secret'], extraParamsDict: { key: 'value' } }, env);

    expect(decoration.credentials).toEqual({ username: 'user', password: 'test-secret' });
    expect(decoration.extraParams).toEqual({ key: 'value' });
  });

  it('should ignore the environment when useEnv is false', async () => {
    const env = { [ENV_BASIC_AUTH]: basic('envuser:test-secret') };

    expect(await resolve({ useEnv: false }, env)).toEqual({ credentials: undefined, extraParams: {} });
  });

  describe('decodeBasicAuth', () => {
    it('should accept the token without the Basic prefix', () => {
      expect(AuthResolver.decodeBasicAuth(Buffer.from('a:b:c').toString('base64'))).toEqual({
        username: 'a',
        password: 'b:c',
      });
    });

    it('should reject malformed strings', () => {
      expect(() => AuthResolver.decodeBasicAuth('Basic !!!')).toThrow('Basic auth string is malformed');
      expect(() => AuthResolver.decodeBasicAuth('Basic a b')).toThrow('Basic auth string is malformed');
      expect(() => AuthResolver.decodeBasicAuth(basic('nocolon'))).toThrow(
        'Basic auth string does not contain username:password'
      );
    });
  });
});

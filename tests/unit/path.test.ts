// tests/unit/path.test.ts

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import {
  getFilenameExtensionFromUrl,
  getFilenameFromUrl,
  getPathForUrl,
  getTempDir,
  getUrlLogstr,
  withTempDir,
} from '../../src/utils/path';
import { InvalidArgumentError } from '../../src/utils/errors';
import { fileExists } from '../../src/utils/files';
import { makeTempDir, removeDir } from '../helpers/deps';

async function dirExists(dirPath: string): Promise<boolean> {
  return fs.stat(dirPath).then(
    (stats) => stats.isDirectory(),
    () => false
  );
}

describe('path utilities', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTempDir();
  });

  afterAll(async () => {
    await removeDir(dir);
  });

  describe('getFilenameExtensionFromUrl', () => {
    it('should split the last path segment', () => {
      expect(getFilenameExtensionFromUrl('http://x.test/a/b/data.csv')).toEqual({ filename: 'data', extension: '.csv' });
    });

    it('should prefix the second last segment when asked', () => {
      expect(getFilenameExtensionFromUrl('http://x.test/a/b/data.csv', { secondLast: true })).toEqual({
        filename: 'b_data',
        extension: '.csv',
      });
    });

    it('should append the query when asked', () => {
      expect(getFilenameExtensionFromUrl('http://x.test/data.csv?x=1&y=2', { useQuery: true })).toEqual({
        filename: 'data_x-1-y-2',
        extension: '.csv',
      });
    });

    it('should name a bare path after its query', () => {
      expect(getFilenameExtensionFromUrl('http://x.test/?q=abc')).toEqual({ filename: 'q-abc', extension: '' });
    });

    it('should decode escaped characters', () => {
      expect(getFilenameFromUrl('http://x.test/my%20file.csv')).toBe('my file.csv');
    });
  });

  describe('getPathForUrl', () => {
    it('should not clobber an existing file', async () => {
      const folder = path.join(dir, 'downloads');
      await fs.mkdir(folder, { recursive: true });

      const first = await getPathForUrl('http://x.test/data.csv', { folder });
      await fs.writeFile(first, 'taken');
      const second = await getPathForUrl('http://x.test/data.csv', { folder });

      expect(first).toBe(path.join(folder, 'data.csv'));
      expect(second).toBe(path.join(folder, 'data1.csv'));
    });

    it('should remove the existing file when overwriting', async () => {
      const target = path.join(dir, 'old.csv');
      await fs.writeFile(target, 'old');

      expect(await getPathForUrl('http://x.test/data.csv', { path: target, overwrite: true })).toBe(target);
      expect(await fileExists(target)).toBe(false);
    });

    it('should reject path together with folder', async () => {
      await expect(getPathForUrl('http://x.test/data.csv', { path: 'a.csv', folder: dir })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
    });
  });

  describe('temporary folders', () => {
    it('should create a named folder', async () => {
      const created = await getTempDir('named', { tempDir: dir });

      expect(created).toBe(path.join(dir, 'named'));
      expect(await dirExists(created)).toBe(true);
    });

    it('should remove the folder after use', async () => {
      const used = await withTempDir(
        'scoped',
        async (scoped) => {
          await fs.writeFile(path.join(scoped, 'file.txt'), 'x');
          return scoped;
        },
        { tempDir: dir }
      );

      expect(await dirExists(used)).toBe(false);
    });

    it('should keep the folder on failure when asked', async () => {
      await expect(
        withTempDir(
          'kept',
          async () => {
            throw new Error('failed');
          },
          { tempDir: dir, deleteOnFailure: false }
        )
      ).rejects.toThrow('failed');

      expect(await dirExists(path.join(dir, 'kept'))).toBe(true);
    });
  });

  it('should shorten long urls for logs', () => {
    expect(getUrlLogstr('http://x.test/abcdef', 10)).toBe('http://x.t...');
  });
});

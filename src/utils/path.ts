// src/utils/path.ts

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { InvalidArgumentError } from './errors';

export interface FilenameOptions {
  /** Prefix the filename with the second last path segment */
  secondLast?: boolean;
  /** Append the slugified query string to the filename */
  useQuery?: boolean;
}

export interface PathForUrlOptions {
  folder?: string;
  filename?: string;
  path?: string;
  overwrite?: boolean;
}

export interface TempDirOptions {
  deleteIfExists?: boolean;
  tempDir?: string;
}

/**
 * Root temporary directory: TEMP_DIR when set, otherwise the OS default.
 */
export function getTempRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env.TEMP_DIR || os.tmpdir();
}

/**
 * Get a temporary directory, optionally creating a named folder inside it.
 */
export async function getTempDir(folder?: string, options: TempDirOptions = {}): Promise<string> {
  let tempDir = options.tempDir ?? getTempRoot();
  if (folder) {
    tempDir = path.join(tempDir, folder);
    if (options.deleteIfExists) {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
    await fs.mkdir(tempDir, { recursive: true });
  }
  return tempDir;
}

/**
 * Run fn with a temporary folder that is removed afterwards.
 */
export async function withTempDir<T>(
  folder: string,
  fn: (dir: string) => Promise<T>,
  options: TempDirOptions & { deleteOnSuccess?: boolean; deleteOnFailure?: boolean } = {}
): Promise<T> {
  const dir = await getTempDir(folder, { deleteIfExists: true, tempDir: options.tempDir });
  let succeeded = false;
  try {
    const result = await fn(dir);
    succeeded = true;
    return result;
  } finally {
    const remove = succeeded ? options.deleteOnSuccess !== false : options.deleteOnFailure !== false;
    if (remove) {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}

function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function safeDecode(text: string): string {
  try {
    return decodeURIComponent(text.replace(/\+/g, ' '));
  } catch {
    return text;
  }
}

/**
 * Split the filename carried by a url into name and extension.
 */
export function getFilenameExtensionFromUrl(
  url: string,
  options: FilenameOptions = {}
): { filename: string; extension: string } {
  const parsed = new URL(url, 'http://localhost');
  const urlPath = safeDecode(parsed.pathname);
  const lastPart = path.posix.basename(urlPath);
  const secondLastPart = path.posix.basename(path.posix.dirname(urlPath));
  const queryPart = slugify(safeDecode(parsed.search.replace(/^\?/, '')));

  const extension = path.posix.extname(lastPart);
  let filename = lastPart.slice(0, lastPart.length - extension.length);

  if (queryPart) {
    if (!filename) {
      filename = queryPart;
    } else if (options.useQuery) {
      filename = `${filename}_${queryPart}`;
    }
  }
  if (secondLastPart) {
    if (!filename) {
      filename = secondLastPart;
    } else if (options.secondLast) {
      filename = `${secondLastPart}_${filename}`;
    }
  }
  return { filename, extension };
}

export function getFilenameFromUrl(url: string, options: FilenameOptions = {}): string {
  const { filename, extension } = getFilenameExtensionFromUrl(url, options);
  return `${filename}${extension}`;
}

/**
 * Destination path for a download. Without overwrite, an existing file is
 * never clobbered: a counter is appended to the name until it is free.
 */
export async function getPathForUrl(url: string, options: PathForUrlOptions = {}): Promise<string> {
  let folder = options.folder;
  let filename = options.filename;
  if (options.path) {
    if (folder || filename) {
      throw new InvalidArgumentError('Cannot use folder or filename and path arguments together!');
    }
    folder = path.dirname(options.path);
    filename = path.basename(options.path);
  }
  if (!filename) {
    filename = getFilenameFromUrl(url) || 'download';
  }
  if (!folder) {
    folder = getTempRoot();
  }
  const extension = path.extname(filename);
  const stem = filename.slice(0, filename.length - extension.length);

  let candidate = path.join(folder, filename);
  if (options.overwrite) {
    await fs.rm(candidate, { force: true });
    return candidate;
  }
  let count = 0;
  while (await pathExists(candidate)) {
    count += 1;
    candidate = path.join(folder, `${stem}${count}${extension}`);
  }
  return candidate;
}

async function pathExists(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate);
    return true;
  } catch {
    return false;
  }
}

/**
 * Shorten a url for log messages.
 */
export function getUrlLogstr(url: string, maxLength = 100): string {
  return url.length > maxLength ? `${url.slice(0, maxLength)}...` : url;
}

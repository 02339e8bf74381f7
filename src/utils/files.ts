// src/utils/files.ts

import { promises as fs } from 'fs';
import path from 'path';
import { decodeJson, decodeText, decodeYaml } from './decode';

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (error: unknown) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadBytes(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}

export async function loadText(filePath: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  return decodeText(await fs.readFile(filePath), encoding);
}

export async function loadJson(filePath: string): Promise<unknown> {
  return decodeJson(await loadText(filePath), filePath);
}

export async function loadYaml(filePath: string): Promise<unknown> {
  return decodeYaml(await loadText(filePath), filePath);
}

/**
 * Write bytes, creating the parent directory when needed.
 */
export async function saveBytes(filePath: string, data: Buffer | string): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, data);
  return filePath;
}

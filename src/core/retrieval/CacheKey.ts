// src/core/retrieval/CacheKey.ts

import { createHash } from 'crypto';
import path from 'path';
import { getFilenameExtensionFromUrl } from '../../utils/path';
import { InvalidArgumentError } from '../../utils/errors';

const SHORT_DIGEST = 8;

/**
 * Name of the cache entry derived from a url alone: the url's own filename
 * stem followed by a digest of the full url, so two urls ending in the same
 * filename never share an entry and every run derives the same name.
 *
 * @example
 * ```typescript
 * derivedFilename('https://example.com/a/data.csv'); // 'data-<8 hex chars>.csv'
 * ```
 */
export function derivedFilename(url: string, digestLength = SHORT_DIGEST): string {
  const { filename, extension } = getFilenameExtensionFromUrl(url);
  const digest = createHash('sha256').update(url).digest('hex').slice(0, digestLength);
  return `${filename || 'download'}-${digest}${extension}`;
}

/**
 * Remembers which url owns each path under each root. Explicit filenames
 * are claimed as well, so a derived name never lands on a path another url
 * already holds in this process.
 */
export class CacheKeyRegistry {
  private resolved = new Map<string, string>();
  private claimed = new Map<string, string>();

  resolve(root: string, url: string, filename?: string): string {
    if (filename) {
      const explicit = path.join(root, filename);
      this.claimed.set(explicit, url);
      return explicit;
    }

    const memoKey = `${root}\n${url}`;
    const existing = this.resolved.get(memoKey);
    if (existing) {
      return existing;
    }

    // A clash needs a matching stem and digest prefix; widen the digest until it is gone
    let digestLength = SHORT_DIGEST;
    let candidate = path.join(root, derivedFilename(url, digestLength));
    while (this.isHeldByOther(candidate, url)) {
      if (digestLength >= 64) {
        throw new InvalidArgumentError(`Cache path ${candidate} is already taken`, { url });
      }
      digestLength *= 2;
      candidate = path.join(root, derivedFilename(url, digestLength));
    }

    this.claimed.set(candidate, url);
    this.resolved.set(memoKey, candidate);
    return candidate;
  }

  clear(): void {
    this.resolved.clear();
    this.claimed.clear();
  }

  private isHeldByOther(candidate: string, url: string): boolean {
    const owner = this.claimed.get(candidate);
    return owner !== undefined && owner !== url;
  }
}

export const defaultCacheKeyRegistry = new CacheKeyRegistry();

/**
 * Path of the cache entry for a url under root. An explicit filename is used
 * as is; otherwise the name is derived from the url.
 */
export function cacheKey(
  root: string,
  url: string,
  filename?: string,
  registry: CacheKeyRegistry = defaultCacheKeyRegistry
): string {
  return registry.resolve(root, url, filename);
}

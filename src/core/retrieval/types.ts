// src/core/retrieval/types.ts

import type { RequestOptions } from '../http/types';

export type RetrieveKind = 'file' | 'text' | 'json' | 'yaml';

/** Which store satisfied a retrieval */
export type RetrievalSource = 'network' | 'saved' | 'fallback';

export interface RetrievalPolicy {
  /** Static data used when the network fails */
  fallbackDir: string;
  /** Persisted copies reused across runs */
  savedDir: string;
  /** Ephemeral copies of downloads made without save */
  tempDir: string;
  save: boolean;
  useSaved: boolean;
}

export interface RetrieveOptions extends RequestOptions {
  /** Substitute the copy in fallbackDir when retrieval fails */
  fallback?: boolean;
  /** Label used in log messages instead of the url */
  logstr?: string;
}

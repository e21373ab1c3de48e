/**
 * Query result cache types
 */

import { QueryParameters, StandardResult } from './connector';

/**
 * A cached connector result keyed by its fingerprint
 */
export interface CacheEntry {
  queryHash: string;
  sourceId: string;
  parameters: QueryParameters;
  result: StandardResult;
  createdAt: string;
  expiresAt: string;
  /** Epoch seconds, used by the store's native TTL sweep */
  expiresAtEpoch: number;
  hitCount: number;
  queryId?: string;
}

export interface CacheStats {
  totalEntries: number;
  activeEntries: number;
  expiredEntries: number;
  totalHits: number;
}

/**
 * Persistence behind the cache store
 */
export interface CacheBackend {
  getEntry(queryHash: string): Promise<CacheEntry | null>;
  putEntry(entry: CacheEntry): Promise<void>;
  incrementHitCount(queryHash: string): Promise<void>;
  deleteEntry(queryHash: string): Promise<boolean>;
  listBySource(sourceId: string): Promise<CacheEntry[]>;
  listAll(): Promise<CacheEntry[]>;
}

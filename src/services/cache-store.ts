/**
 * Cache Store - content-addressed cache of connector results
 *
 * Entries are keyed by a fingerprint of (sourceId, parameters). Reads
 * ignore entries at or past expiresAt even when they have not been purged
 * yet; purgeExpired() removes them physically.
 */

import * as crypto from 'crypto';
import { QueryParameters, StandardResult } from '../types/connector';
import { CacheBackend, CacheEntry, CacheStats } from '../types/cache';
import { DEFAULT_SERVICE_CONFIG } from '../config';

export interface CacheStoreConfig {
  /** TTL used when set() is called without one */
  defaultTtlSeconds: number;
  /** Clock in epoch milliseconds */
  now: () => number;
}

const DEFAULT_CONFIG: CacheStoreConfig = {
  defaultTtlSeconds: DEFAULT_SERVICE_CONFIG.cacheTtlSeconds,
  now: () => Date.now()
};

/**
 * JSON with object keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * SHA-256 hex digest of the canonical (sourceId, parameters) pair
 */
export function fingerprint(sourceId: string, parameters: QueryParameters): string {
  const canonical = canonicalJson({ parameters, sourceId });
  return crypto.createHash('sha256').update(canonical).digest('hex');
}

export class CacheStore {
  private readonly config: CacheStoreConfig;

  constructor(
    private readonly backend: CacheBackend,
    config: Partial<CacheStoreConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  fingerprint(sourceId: string, parameters: QueryParameters): string {
    return fingerprint(sourceId, parameters);
  }

  /**
   * Cached result, or null on miss or expiry. A hit increments hitCount.
   */
  async get(sourceId: string, parameters: QueryParameters): Promise<StandardResult | null> {
    const queryHash = fingerprint(sourceId, parameters);
    const entry = await this.backend.getEntry(queryHash);

    if (!entry || !this.isLive(entry)) {
      return null;
    }

    await this.backend.incrementHitCount(queryHash);
    return entry.result;
  }

  /**
   * Upsert the entry for (sourceId, parameters); expiresAt = now + ttl
   */
  async set(
    sourceId: string,
    parameters: QueryParameters,
    result: StandardResult,
    ttlSeconds?: number,
    queryId?: string
  ): Promise<CacheEntry> {
    const ttl = ttlSeconds ?? this.config.defaultTtlSeconds;
    const createdAtMs = this.config.now();
    const expiresAtMs = createdAtMs + ttl * 1000;

    const entry: CacheEntry = {
      queryHash: fingerprint(sourceId, parameters),
      sourceId,
      parameters,
      result,
      createdAt: new Date(createdAtMs).toISOString(),
      expiresAt: new Date(expiresAtMs).toISOString(),
      expiresAtEpoch: Math.ceil(expiresAtMs / 1000),
      hitCount: 0,
      ...(queryId !== undefined && { queryId })
    };

    await this.backend.putEntry(entry);
    return entry;
  }

  /**
   * Delete one fingerprinted entry, or every entry of the source
   *
   * @returns Number of entries removed
   */
  async invalidate(sourceId: string, parameters?: QueryParameters): Promise<number> {
    if (parameters !== undefined) {
      const removed = await this.backend.deleteEntry(fingerprint(sourceId, parameters));
      return removed ? 1 : 0;
    }

    const entries = await this.backend.listBySource(sourceId);
    let count = 0;
    for (const entry of entries) {
      if (await this.backend.deleteEntry(entry.queryHash)) {
        count++;
      }
    }
    console.log('[CacheStore] Invalidated cache entries', { sourceId, count });
    return count;
  }

  async stats(): Promise<CacheStats> {
    const entries = await this.backend.listAll();
    const active = entries.filter(entry => this.isLive(entry)).length;

    return {
      totalEntries: entries.length,
      activeEntries: active,
      expiredEntries: entries.length - active,
      totalHits: entries.reduce((sum, entry) => sum + (entry.hitCount || 0), 0)
    };
  }

  /**
   * Physically remove expired entries
   *
   * @returns Number of entries removed
   */
  async purgeExpired(): Promise<number> {
    const entries = await this.backend.listAll();
    let count = 0;
    for (const entry of entries) {
      if (!this.isLive(entry) && (await this.backend.deleteEntry(entry.queryHash))) {
        count++;
      }
    }
    return count;
  }

  private isLive(entry: CacheEntry): boolean {
    return this.config.now() < new Date(entry.expiresAt).getTime();
  }
}

/**
 * Map-backed cache backend for tests and single-process deployments
 */
export class InMemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<string, CacheEntry>();

  async getEntry(queryHash: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(queryHash);
    return entry ? structuredClone(entry) : null;
  }

  async putEntry(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.queryHash, structuredClone(entry));
  }

  async incrementHitCount(queryHash: string): Promise<void> {
    const entry = this.entries.get(queryHash);
    if (entry) {
      entry.hitCount += 1;
    }
  }

  async deleteEntry(queryHash: string): Promise<boolean> {
    return this.entries.delete(queryHash);
  }

  async listBySource(sourceId: string): Promise<CacheEntry[]> {
    return Array.from(this.entries.values())
      .filter(entry => entry.sourceId === sourceId)
      .map(entry => structuredClone(entry));
  }

  async listAll(): Promise<CacheEntry[]> {
    return Array.from(this.entries.values()).map(entry => structuredClone(entry));
  }

  size(): number {
    return this.entries.size;
  }
}

/**
 * Transient cache for gateway responses.
 *
 * Entries are keyed by a fingerprint of (symbol, kind, period) and carry
 * their own TTL. Reads fail closed: a store error, a payload that does not
 * parse, or one that fails the caller's guard is reported as a miss.
 */

import type Database from 'better-sqlite3';
import type { CacheConfig } from '@/core/config';
import { isCacheExpired } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { openDatabase } from './db';
import {
  cleanupExpiredCache,
  clearCache,
  getCacheStats,
  readCacheRecord,
  writeCacheRecord,
  type CacheRecord,
} from './repositories/cache_repo';

const logger = createChildLogger('cache');

export type CacheKind = 'quote' | 'history' | 'news';

export interface FingerprintInput {
  symbol: string;
  kind: CacheKind;
  /** e.g. history length in days or headline count; null for point-in-time data */
  period: string | number | null;
}

/** JSON-encoded triple, so distinct inputs never share a key. */
export function buildFingerprint(input: FingerprintInput): string {
  return JSON.stringify([input.symbol, input.kind, input.period]);
}

export interface CacheStoreStats {
  totalEntries: number;
  expiredCount: number;
}

export interface CacheStore {
  read(key: string): CacheRecord | null;
  write(record: CacheRecord): void;
  clear(): number;
  cleanupExpired(now: number): number;
  stats(now: number): CacheStoreStats;
  close(): void;
}

function expired(fetchedAt: number, ttlSeconds: number, now: number): boolean {
  return isCacheExpired(new Date(fetchedAt), ttlSeconds, new Date(now));
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, { payload: string; ttlSeconds: number }>();
  private fetchedAt = new Map<string, number>();

  read(key: string): CacheRecord | null {
    const entry = this.entries.get(key);
    const fetchedAt = this.fetchedAt.get(key);
    if (!entry || fetchedAt === undefined) return null;
    return { key, payload: entry.payload, fetchedAt, ttlSeconds: entry.ttlSeconds };
  }

  write(record: CacheRecord): void {
    this.entries.set(record.key, { payload: record.payload, ttlSeconds: record.ttlSeconds });
    this.fetchedAt.set(record.key, record.fetchedAt);
  }

  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    this.fetchedAt.clear();
    return count;
  }

  cleanupExpired(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      const fetchedAt = this.fetchedAt.get(key) ?? 0;
      if (expired(fetchedAt, entry.ttlSeconds, now)) {
        this.entries.delete(key);
        this.fetchedAt.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(now: number): CacheStoreStats {
    let expiredCount = 0;
    for (const [key, entry] of this.entries) {
      if (expired(this.fetchedAt.get(key) ?? 0, entry.ttlSeconds, now)) expiredCount++;
    }
    return { totalEntries: this.entries.size, expiredCount };
  }

  close(): void {
    this.clear();
  }
}

export class SqliteCacheStore implements CacheStore {
  constructor(private db: Database.Database) {}

  static open(path: string): SqliteCacheStore {
    return new SqliteCacheStore(openDatabase(path));
  }

  read(key: string): CacheRecord | null {
    return readCacheRecord(this.db, key);
  }

  write(record: CacheRecord): void {
    writeCacheRecord(this.db, record);
  }

  clear(): number {
    return clearCache(this.db);
  }

  cleanupExpired(now: number): number {
    return cleanupExpiredCache(this.db, now);
  }

  stats(now: number): CacheStoreStats {
    return getCacheStats(this.db, now);
  }

  close(): void {
    this.db.close();
  }
}

export interface AnalysisCacheOptions extends CacheConfig {
  now?: () => Date;
}

export interface AnalysisCacheStats extends CacheStoreStats {
  enabled: boolean;
  hits: number;
  misses: number;
}

export class AnalysisCache {
  private hits = 0;
  private misses = 0;
  private readonly now: () => Date;

  constructor(
    private store: CacheStore,
    private options: AnalysisCacheOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  get<T>(fingerprint: string, guard: (value: unknown) => value is T): T | null {
    if (!this.options.enabled) {
      this.misses++;
      return null;
    }

    let record: CacheRecord | null;
    try {
      record = this.store.read(fingerprint);
    } catch (error) {
      logger.debug({ fingerprint, error: String(error) }, 'Cache read failed');
      this.misses++;
      return null;
    }

    if (!record || expired(record.fetchedAt, record.ttlSeconds, this.now().getTime())) {
      this.misses++;
      return null;
    }

    let value: unknown;
    try {
      value = JSON.parse(record.payload);
    } catch (error) {
      logger.debug({ fingerprint, error: String(error) }, 'Cache payload unparsable');
      this.misses++;
      return null;
    }

    if (!guard(value)) {
      logger.debug({ fingerprint }, 'Cache payload has unexpected shape');
      this.misses++;
      return null;
    }

    this.hits++;
    return value;
  }

  put(fingerprint: string, value: unknown): void {
    if (!this.options.enabled) return;

    try {
      this.store.write({
        key: fingerprint,
        payload: JSON.stringify(value),
        fetchedAt: this.now().getTime(),
        ttlSeconds: this.options.ttlSeconds,
      });
    } catch (error) {
      logger.warn({ fingerprint, error: String(error) }, 'Cache write failed');
    }
  }

  clear(): number {
    const removed = this.store.clear();
    logger.info({ removed }, 'Cache cleared');
    return removed;
  }

  cleanupExpired(): number {
    return this.store.cleanupExpired(this.now().getTime());
  }

  stats(): AnalysisCacheStats {
    return {
      ...this.store.stats(this.now().getTime()),
      enabled: this.options.enabled,
      hits: this.hits,
      misses: this.misses,
    };
  }

  close(): void {
    this.store.close();
  }
}

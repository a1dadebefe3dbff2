/**
 * Cache repository for the analysis_cache table
 */

import type Database from 'better-sqlite3';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('cache_repo');

export interface CacheRecord {
  key: string;
  payload: string;
  /** ms since epoch */
  fetchedAt: number;
  ttlSeconds: number;
}

export function readCacheRecord(db: Database.Database, key: string): CacheRecord | null {
  const stmt = db.prepare<[string], CacheRecord>(`
    SELECT key, payload, fetched_at as fetchedAt, ttl_seconds as ttlSeconds
    FROM analysis_cache
    WHERE key = ?
  `);

  return stmt.get(key) ?? null;
}

export function writeCacheRecord(db: Database.Database, record: CacheRecord): void {
  const stmt = db.prepare<[string, string, number, number]>(`
    INSERT INTO analysis_cache (key, payload, fetched_at, ttl_seconds)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(key) DO UPDATE SET
      payload = excluded.payload,
      fetched_at = excluded.fetched_at,
      ttl_seconds = excluded.ttl_seconds
  `);

  stmt.run(record.key, record.payload, record.fetchedAt, record.ttlSeconds);
}

export function clearCache(db: Database.Database): number {
  return db.prepare('DELETE FROM analysis_cache').run().changes;
}

export function getCacheStats(
  db: Database.Database,
  now: number = Date.now()
): { totalEntries: number; expiredCount: number } {
  const totalStmt = db.prepare<[], { count: number }>(
    'SELECT COUNT(*) as count FROM analysis_cache'
  );
  const expiredStmt = db.prepare<[number], { count: number }>(`
    SELECT COUNT(*) as count
    FROM analysis_cache
    WHERE fetched_at + (ttl_seconds * 1000) < ?
  `);

  return {
    totalEntries: totalStmt.get()?.count ?? 0,
    expiredCount: expiredStmt.get(now)?.count ?? 0,
  };
}

export function cleanupExpiredCache(db: Database.Database, now: number = Date.now()): number {
  const stmt = db.prepare<[number]>(`
    DELETE FROM analysis_cache
    WHERE fetched_at + (ttl_seconds * 1000) < ?
  `);

  const result = stmt.run(now);
  if (result.changes > 0) {
    logger.info({ removed: result.changes }, 'Cleaned up expired cache entries');
  }

  return result.changes;
}

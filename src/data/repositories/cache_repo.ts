/**
 * Cache repository for provider payloads (overview, statements)
 */

import { getDatabase } from '../db';
import { isCacheExpired } from '@/core/time';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('cache_repo');

export type CacheKind = 'overview' | 'financials';

export interface CacheEntry<T> {
  symbol: string;
  kind: CacheKind;
  source: string;
  fetchedAt: number;
  ttlSeconds: number;
  hitCount: number;
  data: T;
}

interface CacheRow {
  symbol: string;
  kind: CacheKind;
  source: string;
  fetchedAt: number;
  ttlSeconds: number;
  hitCount: number;
  data_json: string;
}

function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

function getRow(symbol: string, kind: CacheKind, source: string): CacheRow | null {
  const db = getDatabase();
  const stmt = db.prepare<[string, CacheKind, string], CacheRow>(`
    SELECT symbol, kind, source, fetched_at as fetchedAt, ttl_seconds as ttlSeconds,
           hit_count as hitCount, data_json
    FROM provider_cache
    WHERE symbol = ? AND kind = ? AND source = ?
  `);

  return stmt.get(normalizeSymbol(symbol), kind, source) ?? null;
}

/**
 * Returns the cached payload when present and not expired. Unparseable rows are
 * dropped and reported as a miss.
 */
export function getCachedPayload<T>(
  symbol: string,
  kind: CacheKind,
  source: string,
  now: number = Date.now()
): CacheEntry<T> | null {
  const row = getRow(symbol, kind, source);
  if (!row) return null;

  if (isCacheExpired(new Date(row.fetchedAt), row.ttlSeconds, new Date(now))) {
    logger.debug({ symbol, kind, source }, 'Cache entry expired');
    return null;
  }

  let data: T;
  try {
    data = JSON.parse(row.data_json) as T;
  } catch (error) {
    logger.warn({ symbol, kind, source, error }, 'Discarding unreadable cache entry');
    invalidateCache(symbol, kind, source);
    return null;
  }

  incrementCacheHit(symbol, kind, source);
  return {
    symbol: row.symbol,
    kind: row.kind,
    source: row.source,
    fetchedAt: row.fetchedAt,
    ttlSeconds: row.ttlSeconds,
    hitCount: row.hitCount + 1,
    data,
  };
}

export function saveCachedPayload<T>(
  symbol: string,
  kind: CacheKind,
  source: string,
  data: T,
  ttlSeconds: number,
  now: number = Date.now()
): void {
  const db = getDatabase();
  const stmt = db.prepare(`
    INSERT INTO provider_cache (symbol, kind, source, fetched_at, ttl_seconds, hit_count, data_json)
    VALUES (?, ?, ?, ?, ?, 0, ?)
    ON CONFLICT(symbol, kind, source) DO UPDATE SET
      fetched_at = excluded.fetched_at,
      ttl_seconds = excluded.ttl_seconds,
      hit_count = 0,
      data_json = excluded.data_json
  `);

  stmt.run(normalizeSymbol(symbol), kind, source, now, Math.round(ttlSeconds), JSON.stringify(data));
  logger.debug({ symbol, kind, source }, 'Saved provider payload');
}

function incrementCacheHit(symbol: string, kind: CacheKind, source: string): void {
  const db = getDatabase();
  const stmt = db.prepare(`
    UPDATE provider_cache
    SET hit_count = hit_count + 1
    WHERE symbol = ? AND kind = ? AND source = ?
  `);

  stmt.run(normalizeSymbol(symbol), kind, source);
}

export function invalidateCache(symbol: string, kind?: CacheKind, source?: string): number {
  const db = getDatabase();
  const stmt = db.prepare(`
    DELETE FROM provider_cache
    WHERE symbol = ?
      AND (? IS NULL OR kind = ?)
      AND (? IS NULL OR source = ?)
  `);
  const k = kind ?? null;
  const s = source ?? null;
  return stmt.run(normalizeSymbol(symbol), k, k, s, s).changes;
}

export function getCacheStats(now: number = Date.now()): {
  totalEntries: number;
  totalHits: number;
  expiredCount: number;
} {
  const db = getDatabase();

  const totalStmt = db.prepare<[], { count: number }>(
    'SELECT COUNT(*) as count FROM provider_cache'
  );
  const hitsStmt = db.prepare<[], { total: number | null }>(
    'SELECT SUM(hit_count) as total FROM provider_cache'
  );
  const expiredStmt = db.prepare<[number], { count: number }>(`
    SELECT COUNT(*) as count
    FROM provider_cache
    WHERE fetched_at + (ttl_seconds * 1000) <= ?
  `);

  const total = totalStmt.get()?.count ?? 0;
  const hits = hitsStmt.get()?.total ?? 0;
  const expired = expiredStmt.get(now)?.count ?? 0;

  return {
    totalEntries: total,
    totalHits: hits,
    expiredCount: expired,
  };
}

export function cleanupExpiredCache(now: number = Date.now()): number {
  const db = getDatabase();
  const stmt = db.prepare(`
    DELETE FROM provider_cache
    WHERE fetched_at + (ttl_seconds * 1000) <= ?
  `);

  const result = stmt.run(now);
  if (result.changes > 0) {
    logger.info({ removed: result.changes }, 'Cleaned up expired cache entries');
  }

  return result.changes;
}

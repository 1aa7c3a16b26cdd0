import {
  getCachedPayload,
  saveCachedPayload,
  type CacheEntry,
  type CacheKind,
} from '@/data/repositories/cache_repo';

/** Storage seam for provider payloads; SQLite-backed unless a test swaps it. */
export interface PayloadCache {
  get<T>(symbol: string, kind: CacheKind, source: string): CacheEntry<T> | null;
  save<T>(symbol: string, kind: CacheKind, source: string, data: T, ttlSeconds: number): void;
}

export const sqlitePayloadCache: PayloadCache = {
  get: <T>(symbol: string, kind: CacheKind, source: string) =>
    getCachedPayload<T>(symbol, kind, source),
  save: <T>(symbol: string, kind: CacheKind, source: string, data: T, ttlSeconds: number) =>
    saveCachedPayload<T>(symbol, kind, source, data, ttlSeconds),
};

import type { CachedSearchResult, SearchSource } from '@factlens/shared/src/types/verification.types.js';

export const DEFAULT_SEARCH_CACHE_TTL_MS = 7 * 24 * 60 * 60 * 1000; // 7 days

export interface SearchCacheRepository {
  get(query: string): Promise<CachedSearchResult | null>;
  set(
    query: string,
    result: { content: string; sources: readonly SearchSource[] },
  ): Promise<void>;
}

export interface SearchCacheOptions {
  readonly ttlMs?: number;
}

export function normalizeQuery(query: string): string {
  return query.toLowerCase().trim();
}

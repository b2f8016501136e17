import { randomUUID } from 'node:crypto';
import type { CachedSearchResult, SearchSource } from '@factlens/shared/src/types/verification.types.js';
import {
  DEFAULT_SEARCH_CACHE_TTL_MS,
  normalizeQuery,
  type SearchCacheOptions,
  type SearchCacheRepository,
} from './search-cache.repository.js';

export function createInMemorySearchCacheRepository(
  options: SearchCacheOptions = {},
): SearchCacheRepository {
  const ttlMs = options.ttlMs ?? DEFAULT_SEARCH_CACHE_TTL_MS;
  const cache = new Map<string, CachedSearchResult>();

  return {
    get(query: string): Promise<CachedSearchResult | null> {
      const key = normalizeQuery(query);
      const entry = cache.get(key);

      if (!entry) {
        return Promise.resolve(null);
      }

      if (entry.expiresAt.getTime() < Date.now()) {
        cache.delete(key);
        return Promise.resolve(null);
      }

      return Promise.resolve(entry);
    },

    set(
      query: string,
      result: { content: string; sources: readonly SearchSource[] },
    ): Promise<void> {
      const key = normalizeQuery(query);
      const now = Date.now();
      cache.set(key, {
        id: randomUUID(),
        query: key,
        content: result.content,
        sources: result.sources,
        cachedAt: new Date(now),
        expiresAt: new Date(now + ttlMs),
      });
      return Promise.resolve();
    },
  };
}

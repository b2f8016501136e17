import { createHash } from 'node:crypto';
import type { Firestore } from '@google-cloud/firestore';
import { Timestamp } from '@google-cloud/firestore';
import type { CachedSearchResult, SearchSource } from '@factlens/shared/src/types/verification.types.js';
import {
  DEFAULT_SEARCH_CACHE_TTL_MS,
  normalizeQuery,
  type SearchCacheOptions,
  type SearchCacheRepository,
} from '../repositories/search-cache.repository.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';

const log = createChildLogger('firestore:search-cache');

const COLLECTION = 'search-cache';

interface CacheDocument {
  query: string;
  content: string;
  sources: SearchSource[];
  cachedAt: Timestamp;
  expiresAt: Timestamp;
}

function hashQuery(query: string): string {
  return createHash('sha256').update(normalizeQuery(query)).digest('hex');
}

function fromDoc(id: string, data: CacheDocument): CachedSearchResult {
  return {
    id,
    query: data.query,
    content: data.content,
    sources: data.sources,
    cachedAt: data.cachedAt.toDate(),
    expiresAt: data.expiresAt.toDate(),
  };
}

export function createFirestoreSearchCacheRepository(
  db: Firestore,
  options: SearchCacheOptions = {},
): SearchCacheRepository {
  const ttlMs = options.ttlMs ?? DEFAULT_SEARCH_CACHE_TTL_MS;
  const collectionRef = db.collection(COLLECTION);

  return {
    async get(query: string): Promise<CachedSearchResult | null> {
      const doc = await collectionRef.doc(hashQuery(query)).get();

      if (!doc.exists) {
        return null;
      }

      const data = doc.data() as CacheDocument;
      const result = fromDoc(doc.id, data);

      if (result.expiresAt.getTime() < Date.now()) {
        log.debug({ query: normalizeQuery(query) }, 'Cache entry expired');
        return null;
      }

      return result;
    },

    async set(
      query: string,
      result: { content: string; sources: readonly SearchSource[] },
    ): Promise<void> {
      const now = Timestamp.now();

      const docData: CacheDocument = {
        query: normalizeQuery(query),
        content: result.content,
        sources: result.sources.map((source) => ({ ...source })),
        cachedAt: now,
        expiresAt: Timestamp.fromMillis(now.toMillis() + ttlMs),
      };

      await collectionRef.doc(hashQuery(query)).set(docData);
    },
  };
}

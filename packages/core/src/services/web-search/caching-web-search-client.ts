import { createChildLogger } from '@factlens/shared/src/logger.js';
import { errorMessage } from '@factlens/shared/src/utils/errors.js';
import type { SearchCacheRepository } from '../../repositories/search-cache.repository.js';
import { hasEvidence } from '../fact-check/search-results.js';
import type { WebSearchClient, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:cache');

/**
 * Wraps a search client with a read-through cache. A broken cache degrades to
 * uncached searches.
 */
export function createCachingWebSearchClient(
  inner: WebSearchClient,
  cache: SearchCacheRepository,
): WebSearchClient {
  return {
    async search(query: string, systemContext?: string): Promise<WebSearchResult> {
      try {
        const cached = await cache.get(query);
        if (cached) {
          log.debug({ query }, 'Search cache hit');
          return { query, content: cached.content, sources: cached.sources };
        }
      } catch (error) {
        log.warn({ query, error: errorMessage(error) }, 'Search cache read failed');
      }

      log.debug({ query }, 'Search cache miss, executing web search');
      const result = await inner.search(query, systemContext);

      // Empty results are not cached so a later search can still find evidence
      if (!hasEvidence(result)) {
        return result;
      }

      try {
        await cache.set(query, { content: result.content, sources: result.sources });
      } catch (error) {
        log.warn({ query, error: errorMessage(error) }, 'Search cache write failed');
      }

      return result;
    },
  };
}

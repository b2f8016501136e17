import { createChildLogger } from '@factlens/shared/src/logger.js';
import type { SearchSource } from '@factlens/shared/src/types/verification.types.js';
import type { WebSearchClient, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:mock');

export interface MockWebSearchResponse {
  readonly content: string;
  readonly sources: readonly SearchSource[];
}

export const DEFAULT_MOCK_SEARCH_RESPONSE: MockWebSearchResponse = {
  content: 'Mock web search result with general information about the topic.',
  sources: [
    {
      title: 'Example Source One',
      url: 'https://example.com/source1',
      snippet: 'General background information about the topic.',
    },
    {
      title: 'Example Source Two',
      url: 'https://example.com/source2',
      snippet: 'Further details related to the topic.',
    },
  ],
};

export function createMockWebSearchClient(
  responses?: Map<string, MockWebSearchResponse>,
): WebSearchClient {
  log.info('Using mock web search client');

  return {
    search(query: string): Promise<WebSearchResult> {
      log.debug({ query }, 'Mock web search');

      const response = responses?.get(query) ?? DEFAULT_MOCK_SEARCH_RESPONSE;
      return Promise.resolve({
        query,
        content: response.content,
        sources: response.sources,
      });
    },
  };
}

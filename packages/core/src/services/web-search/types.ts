import type { SearchSource } from '@factlens/shared/src/types/verification.types.js';

export interface WebSearchClient {
  search(query: string, systemContext?: string): Promise<WebSearchResult>;
}

export interface WebSearchResult {
  readonly query: string;
  /** Model-written summary of what the search found; may be empty. */
  readonly content: string;
  readonly sources: readonly SearchSource[];
}

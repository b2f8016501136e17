import type { ServerConfig } from '@factlens/schemas/src/server-config.schema.js';
import { ConfigurationError } from '@factlens/shared/src/utils/errors.js';
import { createLlmClient, type LlmClient } from '../llm/llm-client.js';
import type { WebSearchClient } from '../services/web-search/types.js';
import { createWebSearchClient } from '../services/web-search/web-search-client.js';
import { createMockWebSearchClient } from '../services/web-search/mock-web-search-client.js';
import { createCachingWebSearchClient } from '../services/web-search/caching-web-search-client.js';
import type { SearchCacheRepository } from '../repositories/search-cache.repository.js';
import { createInMemorySearchCacheRepository } from '../repositories/in-memory-search-cache.repository.js';
import { createClaimVerifier, type ClaimVerifier } from '../services/fact-check/claim-verifier.js';
import {
  createCitationVerifier,
  type CitationVerifier,
} from '../services/citations/citation-verifier.js';
import { createFirestoreClient } from './firestore-client.js';
import { createFirestoreSearchCacheRepository } from './firestore-search-cache.repository.js';

const MS_PER_HOUR = 60 * 60 * 1000;

export interface VerificationServices {
  readonly llmClient: LlmClient;
  readonly webSearchClient: WebSearchClient;
  readonly claimVerifier: ClaimVerifier;
  readonly citationVerifier: CitationVerifier;
}

function createSearchCache(config: ServerConfig): SearchCacheRepository {
  const ttlMs = config.searchCacheTtlHours * MS_PER_HOUR;

  if (config.searchCache === 'memory') {
    return createInMemorySearchCacheRepository({ ttlMs });
  }
  if (!config.gcpProjectId) {
    throw new ConfigurationError('The firestore search cache needs a GCP project ID');
  }
  return createFirestoreSearchCacheRepository(createFirestoreClient(config.gcpProjectId), { ttlMs });
}

function createSearchClient(config: ServerConfig): WebSearchClient {
  if (config.mockLlm) {
    return createMockWebSearchClient();
  }
  if (!config.gcpProjectId) {
    throw new ConfigurationError('A GCP project ID is required for grounded web search');
  }
  return createWebSearchClient({
    projectId: config.gcpProjectId,
    location: config.vertexLocation,
    model: config.searchModel,
  });
}

/** Builds the model and search clients and both verifiers from validated config. */
export async function createVerificationServices(
  config: ServerConfig,
): Promise<VerificationServices> {
  const llmClient = await createLlmClient({
    mock: config.mockLlm,
    projectId: config.gcpProjectId,
    location: config.vertexLocation,
    model: config.llmModel,
  });

  const webSearchClient = createCachingWebSearchClient(
    createSearchClient(config),
    createSearchCache(config),
  );

  const deps = { llmClient, webSearchClient };

  return {
    llmClient,
    webSearchClient,
    claimVerifier: createClaimVerifier(deps, {
      maxClaims: config.maxClaims,
      maxSources: config.maxSources,
      votingTemperatures: config.votingTemperatures,
    }),
    citationVerifier: createCitationVerifier(deps, {
      maxCitations: config.maxCitations,
      maxSources: config.maxSources,
    }),
  };
}

import type {
  ClaimVerificationResult,
  ExtractedClaim,
} from '@factlens/shared/src/types/verification.types.js';
import { errorMessage } from '@factlens/shared/src/utils/errors.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import type { LlmClient } from '../../llm/llm-client.js';
import type { WebSearchClient, WebSearchResult } from '../web-search/types.js';
import { extractClaims, DEFAULT_MAX_CLAIMS } from './claim-extractor.js';
import { checkFact, DEFAULT_VOTING_TEMPERATURES } from './fact-checker.js';
import { toSourceReferences } from './search-results.js';
import { truncateReason } from './verdict-fields.js';

const log = createChildLogger('fact-check:claim-verifier');

const DEFAULT_MAX_SOURCES = 3;

export interface ClaimVerifierDeps {
  readonly llmClient: LlmClient;
  readonly webSearchClient: WebSearchClient;
}

export interface ClaimVerifierConfig {
  readonly maxClaims?: number;
  readonly maxSources?: number;
  readonly votingTemperatures?: readonly number[];
}

export interface ClaimVerifier {
  verifyText(text: string): Promise<readonly ClaimVerificationResult[]>;
}

export function createClaimVerifier(
  deps: ClaimVerifierDeps,
  config: ClaimVerifierConfig = {},
): ClaimVerifier {
  const maxClaims = config.maxClaims ?? DEFAULT_MAX_CLAIMS;
  const maxSources = config.maxSources ?? DEFAULT_MAX_SOURCES;
  const temperatures = config.votingTemperatures ?? DEFAULT_VOTING_TEMPERATURES;

  async function verifyClaim(claim: ExtractedClaim): Promise<ClaimVerificationResult> {
    const location = { claim: claim.claim, startChar: claim.startChar, endChar: claim.endChar };

    let searchResult: WebSearchResult;
    try {
      searchResult = await deps.webSearchClient.search(
        claim.searchQuery,
        `Fact-checking the claim: "${claim.claim}"`,
      );
    } catch (error) {
      const message = errorMessage(error);
      log.warn({ claim: claim.claim, error: message }, 'Search failed, marking claim unverifiable');
      return {
        ...location,
        status: 'UNVERIFIABLE',
        reason: truncateReason(`Search failed: ${message}`),
        sources: [],
      };
    }

    const verdict = await checkFact(claim.claim, searchResult, deps.llmClient, { temperatures });

    return {
      ...location,
      status: verdict.status,
      reason: verdict.reason,
      sources: toSourceReferences(searchResult, maxSources),
    };
  }

  return {
    async verifyText(text: string): Promise<readonly ClaimVerificationResult[]> {
      const claims = await extractClaims(text, deps.llmClient, { maxClaims });

      if (claims.length === 0) {
        log.info('No checkable claims found');
        return [];
      }

      const results = await Promise.all(claims.map((claim) => verifyClaim(claim)));

      log.info(
        {
          totalClaims: results.length,
          verified: results.filter((r) => r.status === 'VERIFIED').length,
          hallucinated: results.filter((r) => r.status === 'HALLUCINATED').length,
          unverifiable: results.filter((r) => r.status === 'UNVERIFIABLE').length,
        },
        'Verification complete',
      );

      return results;
    },
  };
}

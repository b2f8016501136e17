import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  CITATION_STATUSES,
  type Citation,
  type CitationVerdict,
  type CitationVerificationResult,
} from '@factlens/shared/src/types/citation.types.js';
import type { SourceReference } from '@factlens/shared/src/types/verification.types.js';
import { errorMessage } from '@factlens/shared/src/utils/errors.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { invokeAndValidate } from '../../llm/invoke-and-validate.js';
import type { WebSearchClient } from '../web-search/types.js';
import { formatSearchResults, hasEvidence, toSourceReferences } from '../fact-check/search-results.js';
import {
  MAX_REASON_LENGTH,
  ReasonFieldSchema,
  normalizeStatusToken,
  truncateReason,
} from '../fact-check/verdict-fields.js';
import { extractCitations, DEFAULT_MAX_CITATIONS } from './citation-extractor.js';

const log = createChildLogger('citations:verifier');

const DEFAULT_MAX_SOURCES = 3;

const CITATION_CHECK_SYSTEM_PROMPT = `You are a citation verification agent. Decide whether a cited work exists and whether its details are correct, using only the search results.

Statuses:
1. VERIFIED - the work exists and the cited authors, year, title and venue match the sources.
2. PARTIALLY_VERIFIED - the work exists but at least one cited detail is wrong
   (for example the year, venue, page range or an author).
3. HALLUCINATED - the sources show no such work, or attribute the title to entirely different authors.
4. UNVERIFIABLE - the search results are not enough to decide.

List each mismatch in "errors" as "field: cited X, found Y". Use an empty array when nothing is wrong.

Respond with ONLY a JSON object: {"status": "VERIFIED|PARTIALLY_VERIFIED|HALLUCINATED|UNVERIFIABLE", "errors": [], "reason": "brief explanation under ${String(MAX_REASON_LENGTH)} characters"}`;

const CitationVerdictSchema = z.object({
  status: z.preprocess(normalizeStatusToken, z.enum(CITATION_STATUSES)).catch('UNVERIFIABLE'),
  errors: z
    .array(z.string())
    .catch([])
    .transform((errors) => errors.map((e) => e.trim()).filter((e) => e.length > 0)),
  reason: ReasonFieldSchema,
});

const CitationVerdictJsonSchema = zodToJsonSchema(
  z.object({
    status: z.enum(CITATION_STATUSES),
    errors: z.array(z.string()),
    reason: z.string().max(MAX_REASON_LENGTH),
  }),
  { name: 'CitationVerdict', $refStrategy: 'none' },
);

export interface CitationVerifierDeps {
  readonly llmClient: LlmClient;
  readonly webSearchClient: WebSearchClient;
}

export interface CitationVerifierConfig {
  readonly maxCitations?: number;
  readonly maxSources?: number;
}

export interface CitationVerifier {
  verifyText(text: string): Promise<readonly CitationVerificationResult[]>;
}

/** Title in quotes, then authors and year; the raw citation when there is no title. */
export function buildCitationQuery(citation: Citation): string {
  if (!citation.title) {
    return citation.rawCitation;
  }
  return [`"${citation.title}"`, citation.authors, citation.year]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

function describeCitation(citation: Citation): string {
  const field = (value: string | null): string => value ?? '(not given)';
  return `CITATION:
${citation.rawCitation}

CITED DETAILS:
- authors: ${field(citation.authors)}
- year: ${field(citation.year)}
- title: ${field(citation.title)}
- venue: ${field(citation.venue)}
- pages: ${field(citation.pages)}`;
}

export async function verifyCitation(
  citation: Citation,
  deps: CitationVerifierDeps,
  config: Pick<CitationVerifierConfig, 'maxSources'> = {},
): Promise<CitationVerificationResult> {
  const maxSources = config.maxSources ?? DEFAULT_MAX_SOURCES;

  let verdict: CitationVerdict;
  let sources: SourceReference[] = [];

  try {
    const searchResult = await deps.webSearchClient.search(
      buildCitationQuery(citation),
      `Checking whether this cited work exists: ${citation.rawCitation}`,
    );

    if (!hasEvidence(searchResult)) {
      verdict = {
        status: 'UNVERIFIABLE',
        errors: [],
        reason: 'No search results found for this citation',
      };
    } else {
      sources = toSourceReferences(searchResult, maxSources);
      verdict = await invokeAndValidate({
        llmClient: deps.llmClient,
        request: {
          systemPrompt: CITATION_CHECK_SYSTEM_PROMPT,
          userMessage: `${describeCitation(citation)}\n\nSEARCH RESULTS:\n${formatSearchResults(searchResult)}`,
          jsonSchema: CitationVerdictJsonSchema,
          temperature: 0.1,
        },
        schema: CitationVerdictSchema,
        agentName: 'Citation verifier',
      });
    }
  } catch (error) {
    const message = errorMessage(error);
    log.warn({ citation: citation.rawCitation, error: message }, 'Citation verification failed');
    sources = [];
    verdict = {
      status: 'UNVERIFIABLE',
      errors: [],
      reason: truncateReason(`Verification failed: ${message}`),
    };
  }

  return { ...citation, ...verdict, sources };
}

export function createCitationVerifier(
  deps: CitationVerifierDeps,
  config: CitationVerifierConfig = {},
): CitationVerifier {
  const maxCitations = config.maxCitations ?? DEFAULT_MAX_CITATIONS;
  const maxSources = config.maxSources ?? DEFAULT_MAX_SOURCES;

  return {
    async verifyText(text: string): Promise<readonly CitationVerificationResult[]> {
      const citations = await extractCitations(text, deps.llmClient, { maxCitations });

      if (citations.length === 0) {
        log.info('No citations found');
        return [];
      }

      const results = await Promise.all(
        citations.map((citation) => verifyCitation(citation, deps, { maxSources })),
      );

      log.info(
        {
          totalCitations: results.length,
          statuses: results.map((r) => r.status),
        },
        'Citation verification complete',
      );

      return results;
    },
  };
}

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ExtractedClaim } from '@factlens/shared/src/types/verification.types.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { invokeAndValidate } from '../../llm/invoke-and-validate.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';

const log = createChildLogger('fact-check:claim-extractor');

export const DEFAULT_MAX_CLAIMS = 10;

const RawClaimSchema = z.object({
  claim: z.string().trim().min(1),
  quote: z.string().nullish(),
  searchQuery: z.string().nullish(),
});

const ClaimExtractionSchema = z.object({
  claims: z.array(RawClaimSchema),
});

const ClaimExtractionJsonSchema = zodToJsonSchema(ClaimExtractionSchema, {
  name: 'ClaimExtraction',
  $refStrategy: 'none',
});

export interface ClaimExtractionOptions {
  readonly maxClaims?: number;
}

export interface TextSpan {
  readonly startChar: number | null;
  readonly endChar: number | null;
}

function buildSystemPrompt(maxClaims: number): string {
  return `You are a claim extraction agent. Extract the factual claims from the user's text so that each one can be checked against web search results.

Rules:
- Extract concrete, checkable assertions: dates, names, places, quantities, events, scientific facts, attributions
- Skip opinions, feelings, predictions, questions and subjective statements
- Rewrite each claim as a standalone sentence, resolving pronouns from context
- "quote" must be copied verbatim from the text: the shortest span that states the claim
- "searchQuery" is a concise web search query that would confirm or refute the claim
- Return at most ${String(maxClaims)} claims
- If the text contains no checkable claims, return an empty array

Respond with a JSON object: { "claims": [{ "claim", "quote", "searchQuery" }] }`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds the first candidate in `text`, trying an exact match before a
 * case-insensitive one. Offsets are UTF-16 indices into the original text;
 * `endChar` is exclusive.
 */
export function locateSpan(text: string, candidates: ReadonlyArray<string | null | undefined>): TextSpan {
  for (const candidate of candidates) {
    const needle = candidate?.trim();
    if (!needle) continue;

    const index = text.indexOf(needle);
    if (index !== -1) {
      return { startChar: index, endChar: index + needle.length };
    }

    // Matched on the original text: lower-casing can change string length
    const match = new RegExp(escapeRegExp(needle), 'iu').exec(text);
    if (match) {
      return { startChar: match.index, endChar: match.index + match[0].length };
    }
  }

  return { startChar: null, endChar: null };
}

function claimKey(claim: string): string {
  return claim
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[.!?;:,\s]+$/, '')
    .trim();
}

export async function extractClaims(
  text: string,
  llmClient: LlmClient,
  options: ClaimExtractionOptions = {},
): Promise<readonly ExtractedClaim[]> {
  const maxClaims = options.maxClaims ?? DEFAULT_MAX_CLAIMS;

  log.info({ inputLength: text.length, maxClaims }, 'Extracting checkable claims');

  const result = await invokeAndValidate({
    llmClient,
    request: {
      systemPrompt: buildSystemPrompt(maxClaims),
      userMessage: text,
      jsonSchema: ClaimExtractionJsonSchema,
    },
    schema: ClaimExtractionSchema,
    agentName: 'Claim extractor',
  });

  const seen = new Set<string>();
  const claims: ExtractedClaim[] = [];

  for (const raw of result.claims) {
    const key = claimKey(raw.claim);
    if (seen.has(key)) continue;
    seen.add(key);

    const span = locateSpan(text, [raw.quote, raw.claim]);
    const searchQuery = raw.searchQuery?.trim() || raw.claim;

    claims.push({ claim: raw.claim, ...span, searchQuery });

    if (claims.length >= maxClaims) break;
  }

  log.info(
    { returnedClaims: result.claims.length, keptClaims: claims.length },
    'Claim extraction complete',
  );

  return claims;
}

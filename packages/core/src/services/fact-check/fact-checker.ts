import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  CLAIM_STATUSES,
  type ClaimStatus,
  type FactCheckVerdict,
  type FactCheckVote,
} from '@factlens/shared/src/types/verification.types.js';
import { errorMessage } from '@factlens/shared/src/utils/errors.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { invokeAndValidate } from '../../llm/invoke-and-validate.js';
import type { WebSearchResult } from '../web-search/types.js';
import { formatSearchResults, hasEvidence } from './search-results.js';
import {
  MAX_REASON_LENGTH,
  ReasonFieldSchema,
  normalizeStatusToken,
  truncateReason,
} from './verdict-fields.js';

const log = createChildLogger('fact-check:fact-checker');

export const DEFAULT_VOTING_TEMPERATURES: readonly number[] = [0.1, 0.3, 0.5];

const MAX_OUTPUT_TOKENS = 256;

const FACT_CHECK_SYSTEM_PROMPT = `You are a rigorous fact-checking assistant. Decide whether the ENTIRE claim is supported by the search results.

Statuses:
1. VERIFIED - the search results clearly and directly support the complete claim.
   Every part must be confirmed: subject, action, object, time and place.
2. HALLUCINATED - the search results contradict the claim or show it is factually wrong.
   If any part of the claim is proven false, the whole claim is HALLUCINATED.
   Example: the claim says "X did Y" but the sources say "Z did Y".
3. UNVERIFIABLE - the results do not contain enough evidence to confirm or deny the claim,
   or they are ambiguous.

Check the complete statement, not just that the entities exist:
- "Einstein discovered penicillin" is HALLUCINATED even though Einstein existed.
- "Musk founded Google" is HALLUCINATED even though both Musk and Google exist.

Respond with ONLY a JSON object: {"status": "VERIFIED|HALLUCINATED|UNVERIFIABLE", "reason": "brief explanation under ${String(MAX_REASON_LENGTH)} characters"}`;

const VoteSchema = z.object({
  status: z.preprocess(normalizeStatusToken, z.enum(CLAIM_STATUSES)).catch('UNVERIFIABLE'),
  reason: ReasonFieldSchema,
});

const VoteJsonSchema = zodToJsonSchema(
  z.object({
    status: z.enum(CLAIM_STATUSES),
    reason: z.string().max(MAX_REASON_LENGTH),
  }),
  { name: 'FactCheckVote', $refStrategy: 'none' },
);

export interface FactCheckOptions {
  /** One model run per temperature; the runs vote on the final status. */
  readonly temperatures?: readonly number[];
}

function buildUserMessage(claim: string, evidence: string): string {
  return `CLAIM TO VERIFY:
${claim}

SEARCH RESULTS:
${evidence}`;
}

async function runVote(
  claim: string,
  evidence: string,
  temperature: number,
  llmClient: LlmClient,
): Promise<FactCheckVote> {
  try {
    const vote = await invokeAndValidate({
      llmClient,
      request: {
        systemPrompt: FACT_CHECK_SYSTEM_PROMPT,
        userMessage: buildUserMessage(claim, evidence),
        jsonSchema: VoteJsonSchema,
        temperature,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
      },
      schema: VoteSchema,
      agentName: 'Fact checker',
      maxRetries: 0,
    });
    return { ...vote, temperature };
  } catch (error) {
    const message = errorMessage(error);
    log.warn({ temperature, error: message }, 'Fact-check run failed, voting UNVERIFIABLE');
    return {
      status: 'UNVERIFIABLE',
      reason: `Model error: ${message.slice(0, 100)}`,
      temperature,
    };
  }
}

/**
 * Majority vote over independent runs. Ties go to the status seen first; the
 * reason is taken from the last run that voted for the winner.
 */
export function tallyVotes(votes: readonly FactCheckVerdict[]): FactCheckVerdict {
  if (votes.length === 0) {
    return { status: 'UNVERIFIABLE', reason: 'No fact-check runs were made' };
  }

  const counts = new Map<ClaimStatus, number>();
  const reasons = new Map<ClaimStatus, string>();

  for (const vote of votes) {
    counts.set(vote.status, (counts.get(vote.status) ?? 0) + 1);
    reasons.set(vote.status, vote.reason);
  }

  let winner: ClaimStatus = votes[0].status;
  let winnerCount = 0;
  for (const [status, count] of counts) {
    if (count > winnerCount) {
      winner = status;
      winnerCount = count;
    }
  }

  const total = votes.length;
  const reason = reasons.get(winner) ?? 'Unable to determine';

  let summary: string;
  if (total === 1) {
    summary = reason;
  } else if (winnerCount === total) {
    summary = `All ${String(total)} runs agree: ${reason}`;
  } else if (winnerCount > 1) {
    summary = `${String(winnerCount)}/${String(total)} runs agree: ${reason}`;
  } else {
    summary = `Runs disagree (1/${String(total)} each). Using ${winner}: ${reason}`;
  }

  return { status: winner, reason: truncateReason(summary) };
}

export async function checkFact(
  claim: string,
  searchResult: WebSearchResult,
  llmClient: LlmClient,
  options: FactCheckOptions = {},
): Promise<FactCheckVerdict> {
  if (!hasEvidence(searchResult)) {
    return {
      status: 'UNVERIFIABLE',
      reason: 'No search results found to verify this claim',
    };
  }

  const temperatures = options.temperatures ?? DEFAULT_VOTING_TEMPERATURES;
  const evidence = formatSearchResults(searchResult);

  const votes = await Promise.all(
    temperatures.map((temperature) => runVote(claim, evidence, temperature, llmClient)),
  );

  const verdict = tallyVotes(votes);

  log.info(
    { claim, status: verdict.status, votes: votes.map((v) => v.status) },
    'Fact check complete',
  );

  return verdict;
}

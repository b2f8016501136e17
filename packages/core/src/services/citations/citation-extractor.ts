import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Citation } from '@factlens/shared/src/types/citation.types.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { invokeAndValidate } from '../../llm/invoke-and-validate.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';

const log = createChildLogger('citations:extractor');

export const DEFAULT_MAX_CITATIONS = 20;

// Models send years as numbers and leave absent fields as "" or "N/A".
const OptionalFieldSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text === '' || /^(n\/?a|none|unknown|null)$/i.test(text) ? null : text;
  });

const RawCitationSchema = z.object({
  rawCitation: z.string().nullish().transform((value) => value?.trim() ?? ''),
  authors: OptionalFieldSchema,
  year: OptionalFieldSchema,
  title: OptionalFieldSchema,
  venue: OptionalFieldSchema,
  pages: OptionalFieldSchema,
});

const CitationExtractionSchema = z.object({
  citations: z.array(RawCitationSchema),
});

const CitationExtractionJsonSchema = zodToJsonSchema(
  z.object({
    citations: z.array(
      z.object({
        rawCitation: z.string(),
        authors: z.string().nullable(),
        year: z.string().nullable(),
        title: z.string().nullable(),
        venue: z.string().nullable(),
        pages: z.string().nullable(),
      }),
    ),
  }),
  { name: 'CitationExtraction', $refStrategy: 'none' },
);

export interface CitationExtractionOptions {
  readonly maxCitations?: number;
}

function buildSystemPrompt(maxCitations: number): string {
  return `You are a citation extraction agent. Find every bibliographic reference in the user's text: reference list entries and in-text citations that name a work.

For each citation return:
- "rawCitation": the citation exactly as written in the text
- "authors": the author list as written, or null
- "year": the publication year, or null
- "title": the title of the work, or null
- "venue": the journal, conference, publisher or website, or null
- "pages": the page range, or null

Rules:
- Copy values from the text; never complete or correct them
- Use null for anything the citation does not state
- Return at most ${String(maxCitations)} citations
- If the text cites nothing, return an empty array

Respond with a JSON object: { "citations": [...] }`;
}

export async function extractCitations(
  text: string,
  llmClient: LlmClient,
  options: CitationExtractionOptions = {},
): Promise<readonly Citation[]> {
  const maxCitations = options.maxCitations ?? DEFAULT_MAX_CITATIONS;

  log.info({ inputLength: text.length, maxCitations }, 'Extracting citations');

  const result = await invokeAndValidate({
    llmClient,
    request: {
      systemPrompt: buildSystemPrompt(maxCitations),
      userMessage: text,
      jsonSchema: CitationExtractionJsonSchema,
    },
    schema: CitationExtractionSchema,
    agentName: 'Citation extractor',
  });

  const citations = result.citations
    .filter((citation) => citation.rawCitation.length > 0)
    .slice(0, maxCitations);

  log.info(
    { returnedCitations: result.citations.length, keptCitations: citations.length },
    'Citation extraction complete',
  );

  return citations;
}

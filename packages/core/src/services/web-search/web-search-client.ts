import type { GoogleGenAI } from '@google/genai';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import { ConfigurationError, WebSearchError } from '@factlens/shared/src/utils/errors.js';
import type { SearchSource } from '@factlens/shared/src/types/verification.types.js';
import { retryTransient } from '../../llm/retry.js';
import type { WebSearchClient, WebSearchResult } from './types.js';

const log = createChildLogger('web-search:client');

export interface WebSearchClientConfig {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
  readonly retryBaseDelayMs?: number;
}

interface GroundingChunk {
  readonly web?: {
    readonly uri?: string;
    readonly title?: string;
  };
}

interface GroundingSupport {
  readonly segment?: {
    readonly text?: string;
  };
  readonly groundingChunkIndices?: readonly number[];
}

interface GroundingMetadata {
  readonly groundingChunks?: readonly GroundingChunk[];
  readonly groundingSupports?: readonly GroundingSupport[];
}

interface GroundedCandidate {
  readonly groundingMetadata?: GroundingMetadata;
}

export interface GroundedResponse {
  readonly text?: string;
  readonly candidates?: readonly GroundedCandidate[];
}

/**
 * Turns grounding metadata into search sources. Each chunk's snippet is the
 * answer text of every support segment that cites it.
 */
export function extractSources(response: GroundedResponse): SearchSource[] {
  const byUrl = new Map<string, { title: string; snippets: string[] }>();

  for (const candidate of response.candidates ?? []) {
    const metadata = candidate.groundingMetadata;
    const chunks = metadata?.groundingChunks ?? [];
    const chunkUrls: Array<string | undefined> = [];

    for (const chunk of chunks) {
      const url = chunk.web?.uri;
      chunkUrls.push(url);
      if (url && !byUrl.has(url)) {
        byUrl.set(url, { title: chunk.web?.title ?? url, snippets: [] });
      }
    }

    for (const support of metadata?.groundingSupports ?? []) {
      const text = support.segment?.text?.trim();
      if (!text) continue;

      for (const index of support.groundingChunkIndices ?? []) {
        const url = chunkUrls[index];
        const entry = url ? byUrl.get(url) : undefined;
        if (entry && !entry.snippets.includes(text)) {
          entry.snippets.push(text);
        }
      }
    }
  }

  return [...byUrl.entries()].map(([url, entry]) => ({
    title: entry.title,
    url,
    snippet: entry.snippets.join(' '),
  }));
}

function buildPrompt(query: string, systemContext?: string): string {
  const instruction = `Search the web and summarize what reliable sources say about:\n${query}`;
  return systemContext ? `${systemContext}\n\n${instruction}` : instruction;
}

export function createWebSearchClient(config: WebSearchClientConfig): WebSearchClient {
  const { projectId, location, model } = config;

  if (!projectId) {
    throw new ConfigurationError('Project ID is required for WebSearchClient');
  }

  log.info({ projectId, location, model }, 'Creating web search client');

  let client: GoogleGenAI | undefined;

  async function getClient(): Promise<GoogleGenAI> {
    if (!client) {
      const { GoogleGenAI: GoogleGenAIClient } = await import('@google/genai');
      client = new GoogleGenAIClient({ vertexai: true, project: projectId, location });
    }
    return client;
  }

  return {
    async search(query: string, systemContext?: string): Promise<WebSearchResult> {
      log.debug({ query }, 'Executing web search');

      const genai = await getClient();

      return retryTransient(
        async () => {
          const response = await genai.models.generateContent({
            model,
            contents: buildPrompt(query, systemContext),
            config: {
              tools: [{ googleSearch: {} }],
            },
          });

          const content = response.text ?? '';
          const sources = extractSources(response);

          log.debug({ query, sourceCount: sources.length }, 'Web search completed');

          return { query, content, sources };
        },
        {
          operation: 'Web search',
          log,
          toError: (message, retryable, cause) => new WebSearchError(message, retryable, cause),
          baseDelayMs: config.retryBaseDelayMs,
        },
      );
    },
  };
}

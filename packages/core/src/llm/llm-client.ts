import type { ChatVertexAI } from '@langchain/google-vertexai';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import { ConfigurationError, LlmError } from '@factlens/shared/src/utils/errors.js';
import { extractJson } from './json-extraction.js';
import { retryTransient } from './retry.js';

const log = createChildLogger('llm:client');

const DEFAULT_TEMPERATURE = 0.2;

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly jsonSchema?: object;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

export interface LlmClientConfig {
  readonly mock: boolean;
  readonly projectId?: string;
  readonly location: string;
  readonly model: string;
  readonly retryBaseDelayMs?: number;
}

function splitSentences(text: string): string[] {
  return (text.match(/[^.!?]+[.!?]*/g) ?? [])
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function createMockResponse(request: LlmRequest): string {
  const prompt = request.systemPrompt.toLowerCase();

  if (prompt.includes('citation extraction')) {
    return JSON.stringify({ citations: [] });
  }

  if (prompt.includes('citation verification')) {
    return JSON.stringify({
      status: 'UNVERIFIABLE',
      errors: [],
      reason: 'Mock LLM cannot compare citations against sources',
    });
  }

  if (prompt.includes('claim extraction')) {
    const claims = splitSentences(request.userMessage).map((sentence) => ({
      claim: sentence,
      quote: sentence,
      searchQuery: sentence.replace(/[.!?]+$/, ''),
    }));
    return JSON.stringify({ claims });
  }

  if (prompt.includes('fact-checking')) {
    return JSON.stringify({
      status: 'UNVERIFIABLE',
      reason: 'Mock LLM cannot assess factual accuracy',
    });
  }

  return JSON.stringify({ result: 'Mock LLM response' });
}

function createMockClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    invoke(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

/**
 * Unwraps fenced or prose-wrapped JSON. Output with no JSON in it is returned
 * as-is; parse failures belong to the caller's validation loop.
 */
function normalizeContent(rawContent: string): string {
  try {
    return JSON.stringify(extractJson(rawContent));
  } catch {
    return rawContent;
  }
}

function buildSystemPrompt(request: LlmRequest): string {
  if (!request.jsonSchema) {
    return request.systemPrompt;
  }
  return `${request.systemPrompt}\n\nYour response must be a JSON value matching this JSON schema:\n${JSON.stringify(request.jsonSchema)}`;
}

async function createVertexClient(config: LlmClientConfig): Promise<LlmClient> {
  const { projectId, location } = config;

  if (!projectId) {
    throw new ConfigurationError('A GCP project ID is required for the Vertex AI LLM client');
  }

  const { ChatVertexAI: ChatVertexAIModel } = await import('@langchain/google-vertexai');

  // One model instance per sampling setup; the voting fact checker varies temperature per run.
  const models = new Map<string, ChatVertexAI>();

  function getModel(temperature: number, maxOutputTokens: number | undefined): ChatVertexAI {
    const key = `${String(temperature)}:${String(maxOutputTokens ?? 'default')}`;
    let model = models.get(key);
    if (!model) {
      model = new ChatVertexAIModel({
        model: config.model,
        location,
        temperature,
        maxOutputTokens,
        authOptions: { projectId },
        responseMimeType: 'application/json',
      });
      models.set(key, model);
    }
    return model;
  }

  log.info({ projectId, location, model: config.model }, 'Using Vertex AI LLM client');

  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      const temperature = request.temperature ?? DEFAULT_TEMPERATURE;
      const model = getModel(temperature, request.maxOutputTokens);

      log.debug(
        { systemPromptLength: request.systemPrompt.length, temperature },
        'Vertex AI LLM invocation',
      );

      const response = await retryTransient(
        () =>
          model.invoke([
            ['system', buildSystemPrompt(request)],
            ['human', request.userMessage],
          ]),
        {
          operation: 'Vertex AI invocation',
          log,
          toError: (message, retryable, cause) => new LlmError(message, retryable, cause),
          baseDelayMs: config.retryBaseDelayMs,
        },
      );

      const rawContent =
        typeof response.content === 'string' ? response.content : JSON.stringify(response.content);

      return {
        content: normalizeContent(rawContent),
        tokenUsage: response.usage_metadata
          ? {
              input: response.usage_metadata.input_tokens,
              output: response.usage_metadata.output_tokens,
            }
          : undefined,
      };
    },
  };
}

export async function createLlmClient(config: LlmClientConfig): Promise<LlmClient> {
  if (config.mock) {
    return createMockClient();
  }

  return createVertexClient(config);
}

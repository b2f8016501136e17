import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  AgentError,
  LlmError,
  WebSearchError,
} from '@factlens/shared/src/utils/errors.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof HTTPException) {
    const body: ErrorResponse = {
      error: err.message || 'Bad request',
      code: 'BAD_REQUEST',
      requestId,
    };
    return c.json(body, err.status);
  }

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof AgentError) {
    log.error({ requestId, error: err.message }, 'Agent error');
    const body: ErrorResponse = {
      error: 'Language model returned unusable output',
      code: 'AGENT_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message, retryable: err.retryable }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof WebSearchError) {
    log.error({ requestId, error: err.message, retryable: err.retryable }, 'Web search error');
    const body: ErrorResponse = {
      error: 'Web search failed',
      code: 'WEB_SEARCH_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}

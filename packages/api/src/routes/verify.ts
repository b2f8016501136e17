import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { ClaimVerifier } from '@factlens/core/src/services/fact-check/claim-verifier.js';
import { createRouter, type AppEnv } from '../types.js';
import { createVerifyRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, VerifyResponseSchema } from '../schemas/responses.js';

export interface VerifyRouteDeps {
  readonly claimVerifier: ClaimVerifier;
  readonly maxTextLength: number;
}

export function createVerifyRoutes(deps: VerifyRouteDeps): OpenAPIHono<AppEnv> {
  const verifyRoute = createRoute({
    method: 'post',
    path: '/',
    tags: ['Verification'],
    summary: 'Extract the factual claims in a text and verify each against web search',
    request: {
      body: {
        required: true,
        content: {
          'application/json': {
            schema: createVerifyRequestSchema(deps.maxTextLength),
          },
        },
      },
    },
    responses: {
      200: {
        description: 'One result per extracted claim, in text order',
        content: { 'application/json': { schema: VerifyResponseSchema } },
      },
      400: {
        description: 'Empty or invalid text',
        content: { 'application/json': { schema: ErrorResponseSchema } },
      },
    },
  });

  const verify = createRouter();

  verify.openapi(verifyRoute, async (c) => {
    const { text } = c.req.valid('json');

    if (text.trim().length === 0) {
      return c.json(
        { error: 'Text cannot be empty', code: 'EMPTY_TEXT', requestId: c.get('requestId') },
        400,
      );
    }

    const results = await deps.claimVerifier.verifyText(text);

    return c.json(
      {
        results: results.map((result) => ({
          claim: result.claim,
          startChar: result.startChar,
          endChar: result.endChar,
          status: result.status,
          reason: result.reason,
          sources: result.sources.map(({ title, url }) => ({ title, url })),
        })),
      },
      200,
    );
  });

  return verify;
}

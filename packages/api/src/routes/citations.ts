import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { CitationVerifier } from '@factlens/core/src/services/citations/citation-verifier.js';
import { createRouter, type AppEnv } from '../types.js';
import { createVerifyRequestSchema } from '../schemas/requests.js';
import { ErrorResponseSchema, VerifyCitationsResponseSchema } from '../schemas/responses.js';

export interface CitationRouteDeps {
  readonly citationVerifier: CitationVerifier;
  readonly maxTextLength: number;
}

export function createCitationRoutes(deps: CitationRouteDeps): OpenAPIHono<AppEnv> {
  const verifyCitationsRoute = createRoute({
    method: 'post',
    path: '/',
    tags: ['Verification'],
    summary: 'Extract the citations in a text and check that each cited work exists',
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
        description: 'One result per extracted citation, in text order',
        content: { 'application/json': { schema: VerifyCitationsResponseSchema } },
      },
      400: {
        description: 'Empty or invalid text',
        content: { 'application/json': { schema: ErrorResponseSchema } },
      },
    },
  });

  const citations = createRouter();

  citations.openapi(verifyCitationsRoute, async (c) => {
    const { text } = c.req.valid('json');

    if (text.trim().length === 0) {
      return c.json(
        { error: 'Text cannot be empty', code: 'EMPTY_TEXT', requestId: c.get('requestId') },
        400,
      );
    }

    const results = await deps.citationVerifier.verifyText(text);

    return c.json(
      {
        results: results.map((result) => ({
          rawCitation: result.rawCitation,
          authors: result.authors,
          year: result.year,
          title: result.title,
          venue: result.venue,
          pages: result.pages,
          status: result.status,
          errors: [...result.errors],
          reason: result.reason,
          sources: result.sources.map(({ title, url }) => ({ title, url })),
        })),
      },
      200,
    );
  });

  return citations;
}

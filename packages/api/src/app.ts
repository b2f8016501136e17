import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { ClaimVerifier } from '@factlens/core/src/services/fact-check/claim-verifier.js';
import type { CitationVerifier } from '@factlens/core/src/services/citations/citation-verifier.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import { API_VERSION, createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health } from './routes/health.js';
import { createVerifyRoutes } from './routes/verify.js';
import { createCitationRoutes } from './routes/citations.js';

const log = createChildLogger('api:server');

export interface AppDeps {
  readonly claimVerifier: ClaimVerifier;
  readonly citationVerifier: CitationVerifier;
  readonly maxTextLength: number;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);
  app.route(
    '/verify',
    createVerifyRoutes({ claimVerifier: deps.claimVerifier, maxTextLength: deps.maxTextLength }),
  );
  app.route(
    '/verify-citations',
    createCitationRoutes({
      citationVerifier: deps.citationVerifier,
      maxTextLength: deps.maxTextLength,
    }),
  );

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'FactLens API',
        version: API_VERSION,
        description: 'Checks the factual claims and citations in a text against live web search',
      },
    });
    return c.json(spec);
  });

  // Scalar API reference, loaded client-side from the CDN
  app.get('/docs', (c) => {
    const html = `<!doctype html>
<html>
<head>
  <title>FactLens API Reference</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
</head>
<body>
  <script id="api-reference" data-url="/openapi.json" data-configuration='${JSON.stringify({ theme: 'kepler' })}'></script>
  <script src="https://cdn.jsdelivr.net/npm/@scalar/api-reference"></script>
</body>
</html>`;
    return c.html(html);
  });

  return app;
}

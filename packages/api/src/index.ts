import { serve } from '@hono/node-server';
import { loadServerConfig } from '@factlens/schemas/src/config-loader.js';
import { createVerificationServices } from '@factlens/core/src/infrastructure/verification-services.js';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import { errorMessage } from '@factlens/shared/src/utils/errors.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const config = loadServerConfig();
  const { claimVerifier, citationVerifier } = await createVerificationServices(config);

  const app = createApp({
    claimVerifier,
    citationVerifier,
    maxTextLength: config.maxTextLength,
  });

  log.info(
    { port: config.port, mockLlm: config.mockLlm, searchCache: config.searchCache },
    'Starting FactLens API server',
  );

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info({ port: info.port }, 'FactLens API server running');
  });
}

main().catch((error: unknown) => {
  log.error({ error: errorMessage(error) }, 'Failed to start API server');
  process.exit(1);
});

import { createApp } from '../packages/api/src/app.js';
import { API_VERSION } from '../packages/api/src/types.js';
import { loadServerConfig } from '../packages/schemas/src/config-loader.js';
import { createVerificationServices } from '../packages/core/src/infrastructure/verification-services.js';

const config = loadServerConfig({ FACTLENS_MOCK_LLM: 'true' });
const { claimVerifier, citationVerifier } = await createVerificationServices(config);

const app = createApp({ claimVerifier, citationVerifier, maxTextLength: config.maxTextLength });

const doc = app.getOpenAPI31Document({
  openapi: '3.1.0',
  info: {
    title: 'FactLens API',
    version: API_VERSION,
    description: 'Checks the factual claims and citations in a text against live web search',
  },
  servers: [{ url: 'http://localhost:3000', description: 'Local development' }],
});

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');

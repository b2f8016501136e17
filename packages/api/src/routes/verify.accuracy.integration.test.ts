import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '@factlens/schemas/src/config-loader.js';
import { createVerificationServices } from '@factlens/core/src/infrastructure/verification-services.js';
import { createApp } from '../app.js';
import { jsonPost } from '../test-helpers.js';

// Calls Vertex AI and grounded search; needs application default credentials.
describe.skipIf(!process.env['FACTLENS_GCP_PROJECT_ID'])('POST /verify (live accuracy)', () => {
  it('should flag an obviously false claim as hallucinated', async () => {
    const config = loadServerConfig({ ...process.env, FACTLENS_MOCK_LLM: 'false' });
    const { claimVerifier, citationVerifier } = await createVerificationServices(config);
    const app = createApp({ claimVerifier, citationVerifier, maxTextLength: config.maxTextLength });

    const res = await app.request('/verify', jsonPost({ text: 'The earth is flat.' }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { results: Array<{ status: string }> };
    expect(body.results.some((result) => result.status === 'HALLUCINATED')).toBe(true);
  });
});

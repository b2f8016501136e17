import { loadServerConfig } from '@factlens/schemas/src/config-loader.js';
import { createVerificationServices } from '@factlens/core/src/infrastructure/verification-services.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const inputText = args.find((arg) => !arg.startsWith('--')) ?? 'The earth is flat.';
  const checkCitations = args.includes('--citations');

  const config = loadServerConfig();

  console.log('=== FactLens Verification Runner ===\n');
  console.log(`Input text: ${inputText}`);
  console.log(`Mock LLM: ${config.mockLlm ? 'yes' : 'no'}`);
  console.log(`Voting temperatures: ${config.votingTemperatures.join(', ')}\n`);

  const startTime = Date.now();
  const { claimVerifier, citationVerifier } = await createVerificationServices(config);

  console.log('Verifying claims...\n');
  const results = await claimVerifier.verifyText(inputText);

  console.log(`--- Claims (${String(results.length)}) ---`);
  for (const result of results) {
    const span =
      result.startChar === null ? 'not located' : `${String(result.startChar)}-${String(result.endChar)}`;
    console.log(`  [${result.status}] ${result.claim} (${span})`);
    console.log(`    Reason: ${result.reason}`);
    for (const source of result.sources) {
      console.log(`    - ${source.title}: ${source.url}`);
    }
  }

  if (checkCitations) {
    const citations = await citationVerifier.verifyText(inputText);

    console.log(`\n--- Citations (${String(citations.length)}) ---`);
    for (const citation of citations) {
      console.log(`  [${citation.status}] ${citation.rawCitation}`);
      console.log(`    Reason: ${citation.reason}`);
      for (const error of citation.errors) {
        console.log(`    ! ${error}`);
      }
    }
  }

  const elapsed = Date.now() - startTime;
  console.log(`\n=== Verification completed in ${String(elapsed)}ms ===`);
}

main().catch((error: unknown) => {
  console.error('Verification failed:', error);
  process.exit(1);
});

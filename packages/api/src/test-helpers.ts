import { vi } from 'vitest';
import type { ClaimVerificationResult } from '@factlens/shared/src/types/verification.types.js';
import type { CitationVerificationResult } from '@factlens/shared/src/types/citation.types.js';
import type { ClaimVerifier } from '@factlens/core/src/services/fact-check/claim-verifier.js';
import type { CitationVerifier } from '@factlens/core/src/services/citations/citation-verifier.js';

export function createStubClaimVerifier(
  results: readonly ClaimVerificationResult[] = [],
): ClaimVerifier & { verifyText: ReturnType<typeof vi.fn> } {
  return { verifyText: vi.fn().mockResolvedValue(results) };
}

export function createStubCitationVerifier(
  results: readonly CitationVerificationResult[] = [],
): CitationVerifier & { verifyText: ReturnType<typeof vi.fn> } {
  return { verifyText: vi.fn().mockResolvedValue(results) };
}

export function jsonPost(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}

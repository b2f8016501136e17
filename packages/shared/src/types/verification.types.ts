export const CLAIM_STATUSES = ['VERIFIED', 'HALLUCINATED', 'UNVERIFIABLE'] as const;

export type ClaimStatus = (typeof CLAIM_STATUSES)[number];

export interface ExtractedClaim {
  readonly claim: string;
  /** Offset of the supporting quote in the input text, or null when it could not be located. */
  readonly startChar: number | null;
  /** Exclusive end offset of the supporting quote. */
  readonly endChar: number | null;
  readonly searchQuery: string;
}

export interface SearchSource {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

export interface SourceReference {
  readonly title: string;
  readonly url: string;
}

export interface FactCheckVerdict {
  readonly status: ClaimStatus;
  readonly reason: string;
}

export interface FactCheckVote extends FactCheckVerdict {
  readonly temperature: number;
}

export interface ClaimVerificationResult {
  readonly claim: string;
  readonly startChar: number | null;
  readonly endChar: number | null;
  readonly status: ClaimStatus;
  readonly reason: string;
  readonly sources: readonly SourceReference[];
}

export interface CachedSearchResult {
  readonly id: string;
  readonly query: string;
  readonly content: string;
  readonly sources: readonly SearchSource[];
  readonly cachedAt: Date;
  readonly expiresAt: Date;
}

import type { SourceReference } from './verification.types.js';

export const CITATION_STATUSES = [
  'VERIFIED',
  'PARTIALLY_VERIFIED',
  'HALLUCINATED',
  'UNVERIFIABLE',
] as const;

export type CitationStatus = (typeof CITATION_STATUSES)[number];

export interface Citation {
  readonly rawCitation: string;
  readonly authors: string | null;
  readonly year: string | null;
  readonly title: string | null;
  readonly venue: string | null;
  readonly pages: string | null;
}

export interface CitationVerdict {
  readonly status: CitationStatus;
  /** Field-level mismatches, e.g. "year: cited 2020, found 2019". */
  readonly errors: readonly string[];
  readonly reason: string;
}

export interface CitationVerificationResult extends Citation, CitationVerdict {
  readonly sources: readonly SourceReference[];
}

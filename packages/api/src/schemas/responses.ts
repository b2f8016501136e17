import { z } from '@hono/zod-openapi';
import { CLAIM_STATUSES } from '@factlens/shared/src/types/verification.types.js';
import { CITATION_STATUSES } from '@factlens/shared/src/types/citation.types.js';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

const SourceReferenceSchema = z
  .object({
    title: z.string(),
    url: z.string(),
  })
  .openapi('SourceReference');

// Claims
export const ClaimResultSchema = z
  .object({
    claim: z.string(),
    startChar: z.number().int().nullable(),
    endChar: z.number().int().nullable(),
    status: z.enum(CLAIM_STATUSES),
    reason: z.string(),
    sources: z.array(SourceReferenceSchema),
  })
  .openapi('ClaimResult');

export const VerifyResponseSchema = z
  .object({
    results: z.array(ClaimResultSchema),
  })
  .openapi('VerifyResponse');

// Citations
export const CitationResultSchema = z
  .object({
    rawCitation: z.string(),
    authors: z.string().nullable(),
    year: z.string().nullable(),
    title: z.string().nullable(),
    venue: z.string().nullable(),
    pages: z.string().nullable(),
    status: z.enum(CITATION_STATUSES),
    errors: z.array(z.string()),
    reason: z.string(),
    sources: z.array(SourceReferenceSchema),
  })
  .openapi('CitationResult');

export const VerifyCitationsResponseSchema = z
  .object({
    results: z.array(CitationResultSchema),
  })
  .openapi('VerifyCitationsResponse');

import { z } from 'zod';

export const MAX_REASON_LENGTH = 150;

/**
 * Folds model drift in status labels ("verified", " Partially verified ")
 * into the canonical upper snake case form.
 */
export function normalizeStatusToken(value: unknown): unknown {
  return typeof value === 'string' ? value.trim().toUpperCase().replace(/[\s-]+/g, '_') : value;
}

export const ReasonFieldSchema = z
  .string()
  .transform((value) => value.trim())
  .pipe(z.string().min(1))
  .catch('Unable to determine')
  .transform((value) => value.slice(0, MAX_REASON_LENGTH));

export function truncateReason(reason: string): string {
  return reason.slice(0, MAX_REASON_LENGTH);
}

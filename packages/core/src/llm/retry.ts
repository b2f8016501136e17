import type { Logger } from 'pino';

export const MAX_TRANSIENT_RETRIES = 3;
export const BASE_DELAY_MS = 1000;

const TRANSIENT_PATTERNS = [
  '429',
  'rate limit',
  'too many requests',
  'resource exhausted',
  '500',
  '502',
  '503',
  'internal server error',
  'bad gateway',
  'service unavailable',
  'econnreset',
  'etimedout',
  'timeout',
  'network',
  'socket hang up',
  'econnrefused',
];

function readStatusCode(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = readStatusCode(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((pattern) => message.includes(pattern));
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function computeBackoffMs(attempt: number, baseDelayMs: number = BASE_DELAY_MS): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

export interface RetryOptions {
  /** Used as the prefix of thrown error messages, e.g. "Vertex AI invocation". */
  readonly operation: string;
  readonly log: Logger;
  readonly toError: (message: string, retryable: boolean, cause: Error) => Error;
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
}

export async function retryTransient<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = options.maxAttempts ?? MAX_TRANSIENT_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isTransientError(error)) {
        throw options.toError(`${options.operation} failed: ${lastError.message}`, false, lastError);
      }

      options.log.warn(
        { attempt: attempt + 1, maxRetries: maxAttempts, error: lastError.message },
        `Transient error in ${options.operation}, retrying`,
      );

      if (attempt < maxAttempts - 1) {
        await sleep(computeBackoffMs(attempt, baseDelayMs));
      }
    }
  }

  const cause = lastError ?? new Error('unknown error');
  throw options.toError(
    `${options.operation} failed after ${String(maxAttempts)} retries: ${cause.message}`,
    true,
    cause,
  );
}

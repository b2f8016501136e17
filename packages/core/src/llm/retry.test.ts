import { describe, it, expect, vi } from 'vitest';
import { createChildLogger } from '@factlens/shared/src/logger.js';
import { LlmError } from '@factlens/shared/src/utils/errors.js';
import { computeBackoffMs, isTransientError, retryTransient } from './retry.js';

const log = createChildLogger('test:retry');

function toLlmError(message: string, retryable: boolean, cause: Error): Error {
  return new LlmError(message, retryable, cause);
}

class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
  }
}

describe('isTransientError', () => {
  it('should treat 429 and 5xx status codes as transient', () => {
    expect(isTransientError(new HttpError('slow down', 429))).toBe(true);
    expect(isTransientError(new HttpError('boom', 503))).toBe(true);
  });

  it('should not treat 4xx status codes as transient', () => {
    expect(isTransientError(new HttpError('bad request', 400))).toBe(false);
  });

  it('should recognise network failures by message', () => {
    expect(isTransientError(new Error('read ECONNRESET'))).toBe(true);
    expect(isTransientError(new Error('Request timeout after 30s'))).toBe(true);
  });

  it('should reject non-Error values and unrelated messages', () => {
    expect(isTransientError('429')).toBe(false);
    expect(isTransientError(new Error('Invalid argument: model'))).toBe(false);
  });
});

describe('computeBackoffMs', () => {
  it('should grow exponentially with bounded jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(computeBackoffMs(0, 100)).toBe(150);
    expect(computeBackoffMs(2, 100)).toBe(450);
    vi.restoreAllMocks();
  });
});

describe('retryTransient', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('done');

    await expect(
      retryTransient(fn, { operation: 'Test call', log, toError: toLlmError, baseDelayMs: 0 }),
    ).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry transient failures', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('503 service unavailable'))
      .mockResolvedValue('recovered');

    await expect(
      retryTransient(fn, { operation: 'Test call', log, toError: toLlmError, baseDelayMs: 0 }),
    ).resolves.toBe('recovered');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should fail fast with a non-retryable error', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('permission denied'));

    const promise = retryTransient(fn, {
      operation: 'Test call',
      log,
      toError: toLlmError,
      baseDelayMs: 0,
    });

    await expect(promise).rejects.toThrow('Test call failed: permission denied');
    await expect(promise).rejects.toMatchObject({ retryable: false });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the maximum attempts', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('rate limit exceeded'));

    const promise = retryTransient(fn, {
      operation: 'Test call',
      log,
      toError: toLlmError,
      maxAttempts: 2,
      baseDelayMs: 0,
    });

    await expect(promise).rejects.toThrow('Test call failed after 2 retries: rate limit exceeded');
    await expect(promise).rejects.toMatchObject({ retryable: true });
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

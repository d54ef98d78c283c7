import { describe, expect, it, vi } from 'vitest';

import { CloudApiError, isTransientError, parseRetryAfter, withRetry } from '../src/index';

describe('isTransientError', () => {
  it('should treat throttling and server errors as transient', () => {
    expect(isTransientError(new CloudApiError('slow down', 429))).toBe(true);
    expect(isTransientError(new CloudApiError('unavailable', 503))).toBe(true);
  });

  it('should treat client errors as definitive', () => {
    expect(isTransientError(new CloudApiError('bad request', 400))).toBe(false);
    expect(isTransientError(new CloudApiError('not found', 404))).toBe(false);
  });

  it('should recognise network failures from fetch', () => {
    const reset = new TypeError('fetch failed', { cause: Object.assign(new Error('socket'), { code: 'ECONNRESET' }) });

    expect(isTransientError(reset)).toBe(true);
    expect(isTransientError(new Error('boom'))).toBe(false);
    expect(isTransientError('boom')).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  it('should parse seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('should return null for missing or unparseable values', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new CloudApiError('unavailable', 503)).mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { minDelayMs: 1, jitterFactor: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should give up after maxAttempts and rethrow the last error', async () => {
    const fn = vi.fn().mockRejectedValue(new CloudApiError('unavailable', 503));

    await expect(withRetry(fn, { maxAttempts: 3, minDelayMs: 1, jitterFactor: 0 })).rejects.toThrow('unavailable');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should not retry definitive errors', async () => {
    const fn = vi.fn().mockRejectedValue(new CloudApiError('forbidden', 403));

    await expect(withRetry(fn, { minDelayMs: 1 })).rejects.toThrow('forbidden');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should honour a custom retry predicate', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValueOnce(42);

    await expect(withRetry(fn, { minDelayMs: 1, shouldRetry: () => true })).resolves.toBe(42);
  });
});

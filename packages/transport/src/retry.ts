import debug from 'debug';

import { CloudApiError } from './errors';

const debugRetry = debug('skyform:transport:retry');

export interface RetryOptions {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
  /** Decides whether a failed attempt may be repeated */
  shouldRetry?: (error: unknown) => boolean;
}

export const RETRY_DEFAULTS = {
  maxAttempts: 3,
  minDelayMs: 200,
  maxDelayMs: 20_000,
  jitterFactor: 0.2,
};

const RETRYABLE_NETWORK_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EPIPE', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

export function isThrottled(error: unknown): boolean {
  return error instanceof CloudApiError && error.statusCode === 429;
}

/**
 * Throttling, server errors and connection failures. A 4xx other than 429 is definitive.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof CloudApiError) return error.statusCode === 429 || (error.statusCode >= 500 && error.statusCode < 600);
  if (!(error instanceof Error)) return false;

  if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;

  const cause = error.cause;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') return RETRYABLE_NETWORK_CODES.has(cause.code);

  return error.message === 'fetch failed';
}

export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;

  const seconds = Number(header);
  if (!Number.isNaN(seconds)) return seconds * 1000;

  const date = new Date(header);
  if (!Number.isNaN(date.getTime())) return Math.max(0, date.getTime() - Date.now());

  return null;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? RETRY_DEFAULTS.maxAttempts;
  const minDelayMs = options.minDelayMs ?? RETRY_DEFAULTS.minDelayMs;
  const maxDelayMs = options.maxDelayMs ?? RETRY_DEFAULTS.maxDelayMs;
  const jitterFactor = options.jitterFactor ?? RETRY_DEFAULTS.jitterFactor;
  const shouldRetry = options.shouldRetry ?? isTransientError;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++)
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= maxAttempts || !shouldRetry(error)) break;

      const hinted = error instanceof CloudApiError ? error.retryAfterMs : undefined;
      let delayMs: number;
      if (hinted !== undefined) delayMs = Math.min(hinted, maxDelayMs);
      else {
        const capped = Math.min(minDelayMs * 2 ** (attempt - 1), maxDelayMs);
        const jitter = capped * jitterFactor * (Math.random() * 2 - 1);
        delayMs = Math.max(minDelayMs, capped + jitter);
      }

      debugRetry('attempt %d/%d failed, retrying in %dms: %s', attempt, maxAttempts, Math.round(delayMs), error instanceof Error ? error.message : String(error));
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }

  throw lastError;
}

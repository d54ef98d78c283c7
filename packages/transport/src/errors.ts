import { z } from 'zod';

/** Error returned by a cloud management API */
export class CloudApiError extends Error {
  readonly errorCode: string;
  readonly requestId?: string;
  /** Server hint from the Retry-After header */
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    readonly statusCode: number,
    details: { errorCode?: string; requestId?: string; retryAfterMs?: number } = {}
  ) {
    super(message);
    this.name = 'CloudApiError';
    this.errorCode = details.errorCode ?? '';
    this.requestId = details.requestId;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof CloudApiError && error.statusCode === 404;
}

const errorBodySchema = z.object({
  error_code: z.string().optional().catch(undefined),
  error_msg: z.string().optional().catch(undefined),
  error: z
    .object({
      code: z.string().optional().catch(undefined),
      message: z.string().optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

/**
 * Builds a CloudApiError from an error body. Handles both the `{ error_code, error_msg }`
 * and the `{ error: { code, message } }` shapes.
 */
export function toCloudApiError(statusCode: number, body: unknown, details: { requestId?: string; retryAfterMs?: number } = {}): CloudApiError {
  const parsed = errorBodySchema.safeParse(body);
  const flat: z.output<typeof errorBodySchema> = parsed.success ? parsed.data : {};
  const code = flat.error_code || flat.error?.code || '';
  const message = flat.error_msg || flat.error?.message || '';

  const text = message || `request failed with HTTP ${statusCode}`;
  return new CloudApiError(code ? `[${code}] ${text}` : text, statusCode, { errorCode: code, ...details });
}

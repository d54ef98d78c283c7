import type { z, ZodTypeAny } from 'zod';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Parses raw inputs with a zod schema, naming every offending attribute on failure.
 */
export function parseInputs<S extends ZodTypeAny>(type: string, schema: S, inputs: unknown): z.output<S> {
  const result = schema.safeParse(inputs);
  if (result.success) return result.data;

  const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'} (${issue.message})`);
  throw new ValidationError(`${type} has invalid attributes: ${problems.join('; ')}`);
}

/** Parses an API response body; a shape mismatch is reported as an API contract error */
export function parseResponse<S extends ZodTypeAny>(what: string, schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (result.success) return result.data;

  const problems = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  throw new Error(`unexpected ${what} response: ${problems.join('; ')}`);
}

/**
 * Splits an import ID of the form `<a>/<b>` (the last part may itself contain slashes).
 */
export function parseImportId(importId: string, parts: [string, string]): [string, string] {
  const index = importId.indexOf('/');
  const first = index === -1 ? '' : importId.slice(0, index);
  const second = index === -1 ? '' : importId.slice(index + 1);

  if (!first || !second) throw new ValidationError(`invalid format specified for import ID, want '<${parts[0]}>/<${parts[1]}>', but got '${importId}'`);

  return [first, second];
}

/** Epoch milliseconds to an RFC 3339 UTC timestamp with second precision */
export function formatTimestamp(epochMs: number | undefined): string | undefined {
  if (epochMs === undefined || epochMs <= 0) return undefined;

  return new Date(Math.floor(epochMs / 1000) * 1000).toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/** Zero values (empty string, 0, false, empty list or map) are left out of request bodies */
export function valueIgnoreEmpty<T>(value: T): T | undefined {
  if (value === undefined || value === null || value === '' || value === 0 || value === false) return undefined;
  if (Array.isArray(value) && value.length === 0) return undefined;
  if (typeof value === 'object' && !Array.isArray(value) && Object.keys(value).length === 0) return undefined;

  return value;
}

/** Drops undefined entries so they are not serialized */
export function removeNil(body: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(body).filter(([, value]) => value !== undefined && value !== null));
}

export function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort();
}

/** Wraps a failure with the operation that hit it, keeping the original as `cause` */
export function wrapError(message: string, error: unknown): Error {
  return new Error(`${message}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
}

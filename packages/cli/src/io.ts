import fs from 'node:fs/promises';

import { z } from 'zod';

const attributesSchema = z.record(z.unknown());

/** Reads a JSON object of resource attributes from disk */
export async function readAttributes(file: string): Promise<Record<string, unknown>> {
  const content = await fs.readFile(file, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`${file} is not valid JSON: ${errorMessage(error)}`);
  }

  const result = attributesSchema.safeParse(parsed);
  if (!result.success) throw new Error(`${file} must contain a JSON object of attributes`);

  return result.data;
}

/** `--timeout` is given in seconds; the provider takes milliseconds */
export function parseTimeout(seconds: string | undefined): number | undefined {
  if (seconds === undefined) return undefined;

  const value = Number(seconds);
  if (!Number.isFinite(value) || value <= 0) throw new Error(`--timeout must be a positive number of seconds, got "${seconds}"`);
  return Math.round(value * 1000);
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import type { ISchema } from './index';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Compares attribute values the way they serialize: key order does not matter
 * and a key holding `undefined` equals a missing one.
 */
export function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => sameValue(item, b[i]));
  }

  if (isRecord(a) && isRecord(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    return [...keys].every((key) => sameValue(a[key], b[key]));
  }

  return a === b;
}

/**
 * Copies computed attributes that `target` leaves unset from `prior`, descending into nested objects.
 * Server-filled values then read as unchanged instead of as removed.
 */
export function inheritComputed(schema: ISchema, prior: Record<string, unknown>, target: Record<string, unknown>): void {
  for (const [key, def] of Object.entries(schema)) {
    const previous = prior[key];
    if (previous === undefined) continue;

    const value = target[key];
    if (value === undefined) {
      if (def.computed) target[key] = previous;
    } else if (def.type === 'object' && def.elem && isRecord(value) && isRecord(previous)) {
      const nested = { ...value };
      inheritComputed(def.elem, previous, nested);
      target[key] = nested;
    }
  }
}

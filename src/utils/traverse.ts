/**
 * Safe access into untyped JSON payloads.
 *
 * Every nested read of an API response goes through these helpers so that a
 * missing or mistyped link yields `undefined`/`null` instead of throwing.
 */

export type PathKey = string | number;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk `path` from `value`. Returns `undefined` as soon as a link is missing.
 */
export function traverse(value: unknown, path: readonly PathKey[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (typeof key === 'number') {
      if (!Array.isArray(current)) return undefined;
      current = current[key < 0 ? current.length + key : key];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
    if (current === undefined || current === null) return undefined;
  }
  return current;
}

export function strOrNone(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/** Integers only; numeric strings are accepted, fractions and NaN are not */
export function intOrNone(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  if (typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

export function getString(value: unknown, path: readonly PathKey[]): string | null {
  return strOrNone(traverse(value, path));
}

export function getInt(value: unknown, path: readonly PathKey[]): number | null {
  return intOrNone(traverse(value, path));
}

export function getArray(value: unknown, path: readonly PathKey[]): unknown[] {
  const found = traverse(value, path);
  return Array.isArray(found) ? found : [];
}

/**
 * First non-empty string found along any of `paths`
 */
export function firstString(value: unknown, ...paths: PathKey[][]): string | null {
  for (const path of paths) {
    const found = getString(value, path);
    if (found) return found;
  }
  return null;
}

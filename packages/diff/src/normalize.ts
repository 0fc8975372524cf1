import { FieldPolicy, isSpecObject, isUnset, SpecObject, SpecValue } from '@converge/contracts';

/**
 * Canonical form used for comparison: unset, empty lists and empty maps all collapse to `undefined`,
 * and strings are lower-cased under a case-insensitive policy.
 */
export function normalize(value: SpecValue | undefined, policy?: FieldPolicy): SpecValue | undefined {
  if (isUnset(value)) return undefined;

  if (Array.isArray(value)) {
    if (value.length === 0) return undefined;
    return value.map((item) => normalize(item, policy) ?? null);
  }

  if (isSpecObject(value)) {
    const result: SpecObject = {};
    for (const [key, member] of Object.entries(value)) {
      const normalized = normalize(member, policy);
      if (normalized !== undefined) result[key] = normalized;
    }
    return Object.keys(result).length === 0 ? undefined : result;
  }

  if (typeof value === 'string' && policy?.caseInsensitive) return value.toLowerCase();
  return value;
}

function scalarEquals(a: SpecValue, b: SpecValue): boolean {
  if (a === b) return true;
  if (typeof a === 'number' && typeof b === 'string') return b.trim() !== '' && Number(b) === a;
  if (typeof a === 'string' && typeof b === 'number') return a.trim() !== '' && Number(a) === b;
  return false;
}

function deepEqual(a: SpecValue | undefined, b: SpecValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isSpecObject(a) || isSpecObject(b)) {
    if (!isSpecObject(a) || !isSpecObject(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }

  return scalarEquals(a, b);
}

export function valuesEqual(desired: SpecValue | undefined, actual: SpecValue | undefined, policy?: FieldPolicy): boolean {
  return deepEqual(normalize(desired, policy), normalize(actual, policy));
}

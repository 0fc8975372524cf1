export type Scalar = string | number | boolean | null;

export type SpecValue = Scalar | SpecValue[] | SpecObject;

export interface SpecObject {
  [key: string]: SpecValue;
}

/** Provider's view of a resource; `undefined` when it does not exist. */
export type ActualState = SpecObject | undefined;

export function isSpecObject(value: unknown): value is SpecObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `undefined` and `null` both mean "not set". */
export function isUnset(value: SpecValue | undefined): value is null | undefined {
  return value === undefined || value === null;
}

/**
 * Converts arbitrary JSON-ish data (SDK models, parsed bodies) into a spec tree.
 * Drops `undefined` members, functions and symbols; dates become ISO strings.
 */
export function toSpecValue(value: unknown): SpecValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    const items: SpecValue[] = [];
    for (const item of value) {
      const converted = toSpecValue(item);
      if (converted !== undefined) items.push(converted);
    }
    return items;
  }

  if (typeof value === 'object') {
    const result: SpecObject = {};
    for (const [key, member] of Object.entries(value)) {
      const converted = toSpecValue(member);
      if (converted !== undefined) result[key] = converted;
    }
    return result;
  }

  return undefined;
}

export function toSpecObject(value: unknown): SpecObject {
  const converted = toSpecValue(value);
  if (!isSpecObject(converted)) throw new TypeError(`Expected an object, got ${Array.isArray(value) ? 'array' : typeof value}`);
  return converted;
}

export function cloneSpec<T extends SpecValue>(value: T): T {
  return structuredClone(value);
}

/** Reads a nested value by dotted path, e.g. `properties.provisioningState`. */
export function getPath(tree: SpecObject | undefined, path: string): SpecValue | undefined {
  let current: SpecValue | undefined = tree;
  for (const segment of path.split('.')) {
    if (!isSpecObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

import { ActualState, cloneSpec, isSpecObject, SpecObject, SpecValue } from '@converge/contracts';

import { DiffEntry, DiffResult, PathSegment } from './types';

function sameKey(item: SpecValue, segment: Extract<PathSegment, { mergeKey: string }>): boolean {
  if (!isSpecObject(item)) return false;
  const value = item[segment.mergeKey];
  if (value === undefined || value === null || typeof value === 'object') return false;
  if (segment.caseInsensitive && typeof value === 'string' && typeof segment.key === 'string') return value.toLowerCase() === segment.key.toLowerCase();
  return String(value) === String(segment.key);
}

function applyAt(node: SpecValue | undefined, segments: PathSegment[], entry: DiffEntry): SpecValue | undefined {
  const [segment, ...rest] = segments;
  if (!segment) {
    if (entry.kind === 'clear' || entry.kind === 'remove' || entry.desired === undefined) return undefined;
    return cloneSpec(entry.desired);
  }

  if ('field' in segment) {
    const container: SpecObject = isSpecObject(node) ? { ...node } : {};
    const next = applyAt(container[segment.field], rest, entry);
    if (next === undefined) delete container[segment.field];
    else container[segment.field] = next;
    return container;
  }

  const list: SpecValue[] = Array.isArray(node) ? [...node] : [];
  const index = list.findIndex((item) => sameKey(item, segment));
  const next = applyAt(index >= 0 ? list[index] : undefined, rest, entry);

  if (next === undefined) {
    if (index >= 0) list.splice(index, 1);
  } else if (index >= 0) list[index] = next;
  else list.push(next);
  return list;
}

/**
 * Returns a copy of `actual` with every entry of `result` applied. The input is left untouched.
 * Diffing the same desired spec against the returned tree yields no entries.
 */
export function applyDiff(actual: ActualState, result: DiffResult): SpecObject {
  let tree: SpecObject = actual ? cloneSpec(actual) : {};
  for (const entry of result.entries) {
    const next = applyAt(tree, entry.segments, entry);
    tree = isSpecObject(next) ? next : {};
  }
  return tree;
}

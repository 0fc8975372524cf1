import {
  ActualState,
  FieldPolicy,
  FieldPolicyMap,
  ImmutableFieldConflict,
  InvalidRequestError,
  isSpecObject,
  isUnset,
  Scalar,
  SpecObject,
  SpecValue,
  TagsMode,
} from '@converge/contracts';

import { normalize, valuesEqual } from './normalize';
import { mergeTags } from './tags';
import { DiffEntry, DiffOptions, DiffResult, PathSegment } from './types';

export function formatPath(segments: PathSegment[]): string {
  return segments
    .map((segment, i) => {
      if ('field' in segment) return i === 0 ? segment.field : `.${segment.field}`;
      return `[${segment.mergeKey}=${String(segment.key)}]`;
    })
    .join('');
}

/** Immutability of a field covers everything below it. */
function childPolicy(parent: FieldPolicy | undefined, child: FieldPolicy | undefined): FieldPolicy | undefined {
  if (!parent?.immutable) return child;
  return { ...child, immutable: true };
}

interface ListKey {
  id: string;
  value: Scalar;
}

class DiffWalker {
  readonly entries: DiffEntry[] = [];

  constructor(private readonly tagsMode: TagsMode) {}

  walkObject(desired: SpecObject, actual: SpecObject | undefined, policies: FieldPolicyMap, segments: PathSegment[], inherited?: FieldPolicy): void {
    const fields = Object.keys(desired);

    // Fields the caller left out still matter when leaving them out means "clear".
    for (const [field, policy] of Object.entries(policies)) if (!(field in desired) && (policy.purgeIfAbsent || policy.tags)) fields.push(field);

    for (const field of fields) {
      const policy = childPolicy(inherited, policies[field]);
      this.walkField(desired[field], actual?.[field], policy, [...segments, { field }]);
    }
  }

  private walkField(desired: SpecValue | undefined, actual: SpecValue | undefined, policy: FieldPolicy | undefined, segments: PathSegment[]): void {
    if (policy?.tags) {
      this.walkTags(desired, actual, policy, segments);
      return;
    }

    if (isUnset(desired)) {
      if (policy?.purgeIfAbsent && normalize(actual, policy) !== undefined) {
        if (policy.immutable) this.conflict(segments, desired, actual);
        this.push('clear', segments, undefined, actual, policy);
      }
      return;
    }

    if (Array.isArray(desired) && policy?.mergeKey) {
      this.walkKeyedList(desired, actual, policy, policy.mergeKey, segments);
      return;
    }

    if (isSpecObject(desired) && (isUnset(actual) || isSpecObject(actual))) {
      this.walkObject(desired, isSpecObject(actual) ? actual : undefined, policy?.fields ?? {}, segments, policy);
      return;
    }

    this.compareWhole(desired, actual, policy, segments);
  }

  private compareWhole(desired: SpecValue, actual: SpecValue | undefined, policy: FieldPolicy | undefined, segments: PathSegment[]): void {
    if (valuesEqual(desired, actual, policy)) return;

    if (normalize(actual, policy) === undefined) {
      this.push('add', segments, desired, actual, policy);
      return;
    }

    if (policy?.immutable) this.conflict(segments, desired, actual);
    this.push('change', segments, desired, actual, policy);
  }

  private walkKeyedList(desired: SpecValue[], actual: SpecValue | undefined, policy: FieldPolicy, mergeKey: string, segments: PathSegment[]): void {
    const keyPolicy = policy.fields?.[mergeKey];
    const caseInsensitive = keyPolicy?.caseInsensitive ?? false;
    const path = formatPath(segments);

    const actualByKey = new Map<string, SpecObject>();
    if (Array.isArray(actual))
      for (const item of actual)
        if (isSpecObject(item)) {
          const key = this.keyOf(item, mergeKey, caseInsensitive);
          if (key) actualByKey.set(key.id, item);
        }

    const actualIsSet = actualByKey.size > 0;
    const seen = new Set<string>();

    for (const [index, item] of desired.entries()) {
      if (!isSpecObject(item)) throw new InvalidRequestError(`${path}[${index}] must be an object keyed by "${mergeKey}"`);

      const key = this.keyOf(item, mergeKey, caseInsensitive);
      if (!key) throw new InvalidRequestError(`${path}[${index}] is missing its merge key "${mergeKey}"`);
      if (seen.has(key.id)) throw new InvalidRequestError(`${path} lists "${String(key.value)}" more than once`);
      seen.add(key.id);

      const itemSegments: PathSegment[] = [...segments, { mergeKey, key: key.value, caseInsensitive }];
      const existing = actualByKey.get(key.id);

      if (existing) this.walkObject(item, existing, policy.fields ?? {}, itemSegments, policy);
      else {
        if (policy.immutable && actualIsSet) this.conflict(itemSegments, item, undefined);
        this.push('add', itemSegments, item, undefined, policy);
      }
    }

    if (!policy.purgeIfAbsent) return;

    for (const [id, item] of actualByKey) {
      if (seen.has(id)) continue;

      const key = this.keyOf(item, mergeKey, false);
      if (!key) continue;
      const itemSegments: PathSegment[] = [...segments, { mergeKey, key: key.value, caseInsensitive }];
      if (policy.immutable) this.conflict(itemSegments, undefined, item);
      this.push('remove', itemSegments, undefined, item, policy);
    }
  }

  private walkTags(desired: SpecValue | undefined, actual: SpecValue | undefined, policy: FieldPolicy, segments: PathSegment[]): void {
    if (!isUnset(desired) && !isSpecObject(desired)) throw new InvalidRequestError(`${formatPath(segments)} must be a map of tags`);

    // Without desired tags only "replace" has anything to do: it clears every existing tag.
    const wanted = isSpecObject(desired) ? desired : this.tagsMode === 'replace' ? {} : undefined;
    if (!wanted) return;

    const existing = isSpecObject(actual) ? actual : {};
    const { changed, tags } = mergeTags(existing, wanted, this.tagsMode);
    if (!changed) return;

    for (const [key, value] of Object.entries(tags))
      if (!valuesEqual(value, existing[key])) this.push(key in existing ? 'change' : 'add', [...segments, { field: key }], value, existing[key], policy);

    for (const [key, value] of Object.entries(existing)) if (!(key in tags)) this.push('clear', [...segments, { field: key }], undefined, value, policy);
  }

  private keyOf(item: SpecObject, mergeKey: string, caseInsensitive: boolean): ListKey | undefined {
    const value = item[mergeKey];
    if (isUnset(value) || typeof value === 'object') return undefined;

    const id = typeof value === 'string' && caseInsensitive ? value.toLowerCase() : String(value);
    return { id, value };
  }

  private conflict(segments: PathSegment[], desired: SpecValue | undefined, actual: SpecValue | undefined): never {
    throw new ImmutableFieldConflict(formatPath(segments), desired, actual);
  }

  private push(kind: DiffEntry['kind'], segments: PathSegment[], desired: SpecValue | undefined, actual: SpecValue | undefined, policy?: FieldPolicy): void {
    this.entries.push({ path: formatPath(segments), segments, kind, desired, actual, policy });
  }
}

/**
 * Compares a desired spec with the provider's current view.
 * Only fields named by the desired spec (or purged by policy) are considered; server-populated fields are ignored.
 * @throws ImmutableFieldConflict when an immutable field that is already set would change
 */
export function diff(desired: SpecObject, actual: ActualState, policy: FieldPolicyMap = {}, options: DiffOptions = {}): DiffResult {
  const walker = new DiffWalker(options.tagsMode ?? 'append');
  walker.walkObject(desired, actual, policy, []);
  return { entries: walker.entries };
}

export function isEmptyDiff(result: DiffResult | undefined): boolean {
  return !result || result.entries.length === 0;
}

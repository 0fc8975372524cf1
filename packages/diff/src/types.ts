import { FieldPolicy, Scalar, SpecValue, TagsMode } from '@converge/contracts';

export type PathSegment = { field: string } | { mergeKey: string; key: Scalar; caseInsensitive: boolean };

/** add: field or list entry set for the first time; clear: field reset server-side; remove: keyed list entry dropped. */
export type DiffKind = 'add' | 'change' | 'clear' | 'remove';

export interface DiffEntry {
  path: string;
  segments: PathSegment[];
  kind: DiffKind;
  desired: SpecValue | undefined;
  actual: SpecValue | undefined;
  policy?: FieldPolicy;
}

export interface DiffResult {
  entries: DiffEntry[];
}

export interface DiffOptions {
  tagsMode?: TagsMode;
}

import { SpecObject, TagsMode } from '@converge/contracts';

import { valuesEqual } from './normalize';

export interface TagMerge {
  changed: boolean;
  tags: SpecObject;
}

/**
 * append keeps existing tags and overwrites the ones named in `desired`; replace keeps only `desired`.
 */
export function mergeTags(existing: SpecObject | undefined, desired: SpecObject | undefined, mode: TagsMode): TagMerge {
  const current = existing ?? {};
  const wanted = desired ?? {};
  const tags: SpecObject = mode === 'append' ? { ...current, ...wanted } : { ...wanted };

  const keys = new Set([...Object.keys(current), ...Object.keys(tags)]);
  let changed = false;
  for (const key of keys) if (!(key in tags) || !(key in current) || !valuesEqual(tags[key], current[key])) changed = true;

  return { changed, tags };
}

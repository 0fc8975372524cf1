import { cloneSpec, isSpecObject, SpecObject, SpecValue } from '@converge/contracts';

/** Top-level fields ARM fills in and rejects or ignores on PUT. */
const READ_ONLY_FIELDS = ['id', 'name', 'type', 'etag', 'systemData', 'managedBy', 'managedByExtended'];

const READ_ONLY_PROPERTIES = ['provisioningState', 'timeCreated', 'uniqueId'];

export function stripReadOnly(tree: SpecObject, extraProperties: string[] = []): SpecObject {
  const body = cloneSpec(tree);
  for (const field of READ_ONLY_FIELDS) delete body[field];

  if (isSpecObject(body.properties)) for (const field of [...READ_ONLY_PROPERTIES, ...extraProperties]) delete body.properties[field];
  return body;
}

/** Copy of `tree` with `value` stored at the dotted `path`, creating objects on the way. */
export function setPath(tree: SpecObject, path: string, value: SpecValue): SpecObject {
  const result = cloneSpec(tree);
  const segments = path.split('.');
  const last = segments.pop();
  if (!last) return result;

  let node = result;
  for (const segment of segments) {
    const next = node[segment];
    if (isSpecObject(next)) node = next;
    else {
      const created: SpecObject = {};
      node[segment] = created;
      node = created;
    }
  }
  node[last] = cloneSpec(value);
  return result;
}

export function objectsAt(tree: SpecObject, path: string): SpecObject[] {
  let node: SpecValue | undefined = tree;
  for (const segment of path.split('.')) node = isSpecObject(node) ? node[segment] : undefined;
  return Array.isArray(node) ? node.filter(isSpecObject) : [];
}

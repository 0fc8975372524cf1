import { FieldPolicyMap, ResourceKindDescriptor, SpecObject } from '@converge/contracts';

import { stripReadOnly } from '../shape';

export const GENERIC_POLICY: FieldPolicyMap = {
  tags: { tags: true },
};

/** Descriptor for kinds without dedicated rules: tags are merged, everything else is compared as written. */
export function genericDescriptor(kind: string): ResourceKindDescriptor {
  return {
    kind,
    policy: GENERIC_POLICY,
    toRequestBody: (tree: SpecObject) => stripReadOnly(tree),
  };
}

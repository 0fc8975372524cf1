import { FieldPolicyMap, SpecObject } from '@converge/contracts';
import { describe, expect, it } from 'vitest';

import { applyDiff, diff } from '../src/index';

const POLICY: FieldPolicyMap = {
  tags: { tags: true },
  properties: { fields: { subnets: { mergeKey: 'name', purgeIfAbsent: true } } },
};

function actualState(): SpecObject {
  return {
    location: 'westus',
    tags: { a: '1', b: '2' },
    properties: {
      subnets: [
        { name: 'default', prefix: '10.0.0.0/24' },
        { name: 'legacy', prefix: '10.0.9.0/24' },
      ],
      provisioningState: 'Succeeded',
    },
  };
}

const desired: SpecObject = {
  location: 'westus',
  tags: { b: '3' },
  properties: {
    subnets: [
      { name: 'default', prefix: '10.0.1.0/24' },
      { name: 'web', prefix: '10.0.2.0/24' },
    ],
  },
};

describe('applyDiff', () => {
  it('should merge every entry into a copy of the actual state', () => {
    const actual = actualState();
    const merged = applyDiff(actual, diff(desired, actual, POLICY, { tagsMode: 'replace' }));

    expect(merged).toEqual({
      location: 'westus',
      tags: { b: '3' },
      properties: {
        subnets: [
          { name: 'default', prefix: '10.0.1.0/24' },
          { name: 'web', prefix: '10.0.2.0/24' },
        ],
        provisioningState: 'Succeeded',
      },
    });
    expect(actual).toEqual(actualState());
  });

  it('should leave nothing to diff afterwards', () => {
    const actual = actualState();
    const merged = applyDiff(actual, diff(desired, actual, POLICY, { tagsMode: 'replace' }));

    expect(diff(desired, merged, POLICY, { tagsMode: 'replace' }).entries).toEqual([]);
  });

  it('should build the tree from scratch for a missing resource', () => {
    const spec: SpecObject = { location: 'westus', properties: { diskSizeGB: 64 } };

    expect(applyDiff(undefined, diff(spec, undefined))).toEqual(spec);
  });
});

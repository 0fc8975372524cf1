import { FieldPolicyMap, ImmutableFieldConflict, InvalidRequestError, SpecObject } from '@converge/contracts';
import { describe, expect, it } from 'vitest';

import { diff, isEmptyDiff } from '../src/index';

const SUBNETS: FieldPolicyMap = {
  subnets: { mergeKey: 'name', fields: { name: { caseInsensitive: true } } },
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('DiffEngine', () => {
  describe('scalars', () => {
    it('should report nothing when desired matches actual', () => {
      const result = diff({ location: 'westus', sku: 'Standard_LRS' }, { location: 'westus', sku: 'Standard_LRS' });

      expect(isEmptyDiff(result)).toBe(true);
    });

    it('should report an add when the resource does not exist', () => {
      const result = diff({ location: 'westus' }, undefined);

      expect(result.entries).toHaveLength(1);
      expect(result.entries[0]).toMatchObject({ path: 'location', kind: 'add', desired: 'westus', actual: undefined });
    });

    it('should report a change for a mutable field', () => {
      const result = diff({ sku: 'Premium_LRS' }, { sku: 'Standard_LRS' });

      expect(result.entries).toHaveLength(1);
      expect(result.entries[0]).toMatchObject({ path: 'sku', kind: 'change', desired: 'Premium_LRS', actual: 'Standard_LRS' });
    });

    it('should ignore fields only the server populates', () => {
      const result = diff({ properties: { diskSizeGB: 128 } }, { id: '/x', properties: { diskSizeGB: 128, provisioningState: 'Succeeded' } });

      expect(isEmptyDiff(result)).toBe(true);
    });

    it('should treat a numeric string as equal to the number', () => {
      const result = diff({ size: 128 }, { size: '128' });

      expect(isEmptyDiff(result)).toBe(true);
    });

    it('should treat an empty list and an absent field as equal', () => {
      expect(isEmptyDiff(diff({ dnsServers: [] }, {}))).toBe(true);
      expect(isEmptyDiff(diff({ options: {} }, { options: {} }))).toBe(true);
    });

    it('should compare case-insensitively when the policy says so', () => {
      const policy: FieldPolicyMap = { osType: { caseInsensitive: true } };

      expect(isEmptyDiff(diff({ osType: 'LINUX' }, { osType: 'Linux' }, policy))).toBe(true);
      expect(diff({ osType: 'LINUX' }, { osType: 'Linux' }).entries).toHaveLength(1);
    });
  });

  describe('immutable fields', () => {
    const policy: FieldPolicyMap = { location: { immutable: true } };

    it('should throw ImmutableFieldConflict when a set field would change', () => {
      expect(() => diff({ location: 'westus' }, { location: 'eastus' }, policy)).toThrow(ImmutableFieldConflict);
    });

    it('should allow the first set of an immutable field', () => {
      const result = diff({ location: 'westus' }, {}, policy);

      expect(result.entries).toHaveLength(1);
      expect(result.entries[0].kind).toBe('add');
    });

    it('should report the conflicting path and values', () => {
      const error = captureError(() => diff({ location: 'westus' }, { location: 'eastus' }, policy));

      expect(error).toBeInstanceOf(ImmutableFieldConflict);
      expect(error).toMatchObject({ path: 'location', desired: 'westus', actual: 'eastus' });
    });

    it('should extend immutability to nested members', () => {
      const nested: FieldPolicyMap = { properties: { fields: { creationData: { immutable: true } } } };

      expect(() =>
        diff({ properties: { creationData: { createOption: 'Empty' } } }, { properties: { creationData: { createOption: 'Copy' } } }, nested)
      ).toThrow('Field "properties.creationData.createOption" cannot be changed from "Copy" to "Empty" on an existing resource');
    });

    it('should not conflict when values only differ by case under a case-insensitive policy', () => {
      const relaxed: FieldPolicyMap = { location: { immutable: true, caseInsensitive: true } };

      expect(isEmptyDiff(diff({ location: 'WestUS' }, { location: 'westus' }, relaxed))).toBe(true);
    });
  });

  describe('purge-if-absent', () => {
    const policy: FieldPolicyMap = { zones: { purgeIfAbsent: true } };

    it('should clear a field the desired spec leaves out', () => {
      const result = diff({}, { zones: ['1'] }, policy);

      expect(result.entries).toHaveLength(1);
      expect(result.entries[0]).toMatchObject({ path: 'zones', kind: 'clear', desired: undefined, actual: ['1'] });
    });

    it('should not clear a field that is already empty', () => {
      expect(isEmptyDiff(diff({}, { zones: [] }, policy))).toBe(true);
    });

    it('should leave an omitted field alone without the policy', () => {
      expect(isEmptyDiff(diff({}, { zones: ['1'] }))).toBe(true);
    });
  });

  describe('keyed lists', () => {
    const actual: SpecObject = {
      subnets: [
        { name: 'default', prefix: '10.0.0.0/24', id: 'server-side' },
        { name: 'legacy', prefix: '10.0.9.0/24' },
      ],
    };

    it('should match entries by key regardless of order or case', () => {
      const result = diff({ subnets: [{ name: 'legacy', prefix: '10.0.9.0/24' }, { name: 'Default', prefix: '10.0.0.0/24' }] }, actual, SUBNETS);

      expect(isEmptyDiff(result)).toBe(true);
    });

    it('should report additions and changed members', () => {
      const result = diff(
        {
          subnets: [
            { name: 'default', prefix: '10.0.1.0/24' },
            { name: 'web', prefix: '10.0.2.0/24' },
          ],
        },
        actual,
        SUBNETS
      );

      expect(result.entries.map((entry) => [entry.kind, entry.path])).toEqual([
        ['change', 'subnets[name=default].prefix'],
        ['add', 'subnets[name=web]'],
      ]);
    });

    it('should remove unlisted entries only under purge-if-absent', () => {
      const purging: FieldPolicyMap = { subnets: { ...SUBNETS.subnets, purgeIfAbsent: true } };
      const desired = { subnets: [{ name: 'default', prefix: '10.0.0.0/24' }] };

      expect(isEmptyDiff(diff(desired, actual, SUBNETS))).toBe(true);

      const result = diff(desired, actual, purging);
      expect(result.entries).toHaveLength(1);
      expect(result.entries[0]).toMatchObject({ kind: 'remove', path: 'subnets[name=legacy]', actual: { name: 'legacy', prefix: '10.0.9.0/24' } });
    });

    it('should reject entries without the merge key', () => {
      expect(() => diff({ subnets: [{ prefix: '10.0.0.0/24' }] }, actual, SUBNETS)).toThrow('subnets[0] is missing its merge key "name"');
      expect(() => diff({ subnets: [{ prefix: '10.0.0.0/24' }] }, actual, SUBNETS)).toThrow(InvalidRequestError);
    });

    it('should reject duplicate keys', () => {
      expect(() => diff({ subnets: [{ name: 'a' }, { name: 'A' }] }, actual, SUBNETS)).toThrow('subnets lists "A" more than once');
    });
  });

  describe('tags', () => {
    const policy: FieldPolicyMap = { tags: { tags: true } };
    const actual = { tags: { a: '1', b: '2' } };

    it('should only add and overwrite in append mode', () => {
      const result = diff({ tags: { b: '3', c: '4' } }, actual, policy, { tagsMode: 'append' });

      expect(result.entries.map((entry) => [entry.kind, entry.path, entry.desired])).toEqual([
        ['change', 'tags.b', '3'],
        ['add', 'tags.c', '4'],
      ]);
    });

    it('should also clear unlisted tags in replace mode', () => {
      const result = diff({ tags: { b: '3', c: '4' } }, actual, policy, { tagsMode: 'replace' });

      expect(result.entries.map((entry) => [entry.kind, entry.path])).toEqual([
        ['change', 'tags.b'],
        ['add', 'tags.c'],
        ['clear', 'tags.a'],
      ]);
    });

    it('should clear every tag when replace mode is given no tags', () => {
      const result = diff({}, actual, policy, { tagsMode: 'replace' });

      expect(result.entries.map((entry) => entry.path)).toEqual(['tags.a', 'tags.b']);
      expect(isEmptyDiff(diff({}, actual, policy, { tagsMode: 'append' }))).toBe(true);
    });
  });
});

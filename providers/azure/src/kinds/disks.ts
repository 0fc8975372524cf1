import { ResourceKindDescriptor, SpecObject } from '@converge/contracts';

import { stripReadOnly } from '../shape';

export const DISK_KIND = 'Microsoft.Compute/disks';

export const disks: ResourceKindDescriptor = {
  kind: DISK_KIND,
  policy: {
    location: { immutable: true, caseInsensitive: true },
    zones: { immutable: true },
    sku: { fields: { name: { caseInsensitive: true } } },
    tags: { tags: true },
    properties: {
      fields: {
        creationData: { immutable: true },
        osType: { caseInsensitive: true },
      },
    },
  },
  toRequestBody: (tree: SpecObject) => stripReadOnly(tree, ['diskState', 'diskSizeBytes', 'diskIOPSReadWrite', 'diskMBpsReadWrite', 'shareInfo']),
};

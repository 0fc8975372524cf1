import { isSpecObject, ResourceKindDescriptor, SpecObject } from '@converge/contracts';

import { objectsAt, setPath, stripReadOnly } from '../shape';

export const VIRTUAL_NETWORK_KIND = 'Microsoft.Network/virtualNetworks';

function subnetBody(subnet: SpecObject): SpecObject {
  const body = stripReadOnly(subnet, ['ipConfigurations', 'purpose']);
  if (subnet.name !== undefined) body.name = subnet.name;
  return body;
}

export const virtualNetworks: ResourceKindDescriptor = {
  kind: VIRTUAL_NETWORK_KIND,
  policy: {
    location: { immutable: true, caseInsensitive: true },
    tags: { tags: true },
    properties: {
      fields: {
        subnets: {
          mergeKey: 'name',
          purgeIfAbsent: true,
          fields: { name: { caseInsensitive: true } },
        },
      },
    },
  },
  toRequestBody: (tree: SpecObject) => {
    const body = stripReadOnly(tree, ['resourceGuid']);
    if (!isSpecObject(body.properties) || !Array.isArray(body.properties.subnets)) return body;

    return setPath(body, 'properties.subnets', objectsAt(body, 'properties.subnets').map(subnetBody));
  },
};

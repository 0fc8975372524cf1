import { getPath, isSpecObject, PowerState, ResourceIdentity, ResourceKindDescriptor, SpecObject } from '@converge/contracts';

import { objectsAt, setPath, stripReadOnly } from '../shape';

export const VIRTUAL_MACHINE_KIND = 'Microsoft.Compute/virtualMachines';

const DATA_DISKS = 'properties.storageProfile.dataDisks';

/** Maps the `PowerState/<code>` status of an instance view; transitional codes count as where they are heading. */
export function powerStateOf(instanceView: SpecObject | undefined): PowerState {
  const statuses = instanceView?.statuses;

  for (const status of Array.isArray(statuses) ? statuses : []) {
    const code = isSpecObject(status) ? status.code : undefined;
    if (typeof code !== 'string' || !code.toLowerCase().startsWith('powerstate/')) continue;

    switch (code.slice('powerstate/'.length).toLowerCase()) {
      case 'running':
      case 'starting':
        return 'running';
      case 'stopped':
      case 'stopping':
      case 'deallocated':
      case 'deallocating':
        return 'stopped';
      default:
        return 'unknown';
    }
  }
  return 'unknown';
}

function sameDisk(entry: SpecObject, disk: ResourceIdentity): boolean {
  const managedId = getPath(entry, 'managedDisk.id');
  if (typeof managedId === 'string' && managedId.toLowerCase() === disk.key) return true;

  return typeof entry.name === 'string' && entry.name.toLowerCase() === disk.name.toLowerCase();
}

function lowestFreeLun(used: Set<number>): number {
  let lun = 0;
  while (used.has(lun)) lun++;
  return lun;
}

export function attachDisks(vm: SpecObject, disks: ResourceIdentity[]): SpecObject {
  const dataDisks = objectsAt(vm, DATA_DISKS);
  const used = new Set(dataDisks.map((entry) => entry.lun).filter((lun): lun is number => typeof lun === 'number'));

  for (const disk of disks) {
    if (dataDisks.some((entry) => sameDisk(entry, disk))) continue;

    const lun = lowestFreeLun(used);
    used.add(lun);
    dataDisks.push({ lun, name: disk.name, createOption: 'Attach', managedDisk: { id: disk.toString() } });
  }
  return setPath(vm, DATA_DISKS, dataDisks);
}

export function detachDisks(vm: SpecObject, disks: ResourceIdentity[]): SpecObject {
  const dataDisks = objectsAt(vm, DATA_DISKS).filter((entry) => !disks.some((disk) => sameDisk(entry, disk)));
  return setPath(vm, DATA_DISKS, dataDisks);
}

export const virtualMachines: ResourceKindDescriptor = {
  kind: VIRTUAL_MACHINE_KIND,
  policy: {
    location: { immutable: true, caseInsensitive: true },
    zones: { immutable: true },
    tags: { tags: true },
    properties: {
      fields: {
        osProfile: { fields: { computerName: { immutable: true }, adminUsername: { immutable: true } } },
        storageProfile: {
          fields: {
            imageReference: { immutable: true },
            osDisk: { fields: { name: { immutable: true, caseInsensitive: true } } },
            dataDisks: { mergeKey: 'lun' },
          },
        },
      },
    },
  },
  toRequestBody: (tree: SpecObject) => stripReadOnly(tree, ['instanceView', 'vmId', 'timeCreated']),
  power: {
    read: async (client, identity) => {
      const response = await client.request({ method: 'GET', path: `${identity.toString()}/instanceView` });
      return powerStateOf(isSpecObject(response.body) ? response.body : undefined);
    },
    startOperation: 'start',
    stopOperation: 'deallocate',
  },
  attachments: {
    isAttached: (vm, disk) => objectsAt(vm, DATA_DISKS).some((entry) => sameDisk(entry, disk)),
    attach: attachDisks,
    detach: detachDisks,
  },
};

import { isSpecObject, PowerState, ResourceIdentity, ResourceKindDescriptor, SpecObject } from '@converge/contracts';

function attachedIds(target: SpecObject): string[] {
  const properties = isSpecObject(target.properties) ? target.properties : {};
  const attached = Array.isArray(properties.attached) ? properties.attached : [];
  return attached.filter((id): id is string => typeof id === 'string');
}

function withAttached(target: SpecObject, ids: string[]): SpecObject {
  const properties = isSpecObject(target.properties) ? target.properties : {};
  return { ...target, properties: { ...properties, attached: ids } };
}

// Server-populated fields are dropped so results compare against what the test wrote.
function project(raw: SpecObject): SpecObject {
  const { id: _id, name: _name, type: _type, ...rest } = raw;
  return rest;
}

export const DISK_KIND: ResourceKindDescriptor = {
  kind: 'Test.Compute/disks',
  policy: {
    location: { immutable: true },
    tags: { tags: true },
  },
  fromResponse: project,
};

export const MACHINE_KIND: ResourceKindDescriptor = {
  kind: 'Test.Compute/machines',
  policy: { location: { immutable: true } },
  fromResponse: project,
  power: {
    startOperation: 'start',
    stopOperation: 'deallocate',
    async read(client, identity): Promise<PowerState> {
      const response = await client.request({ method: 'GET', path: `${identity.toString()}/instanceView` });
      const statuses = isSpecObject(response.body) && Array.isArray(response.body.statuses) ? response.body.statuses : [];

      for (const status of statuses) {
        const code = isSpecObject(status) && typeof status.code === 'string' ? status.code : '';
        if (code === 'PowerState/running') return 'running';
        if (code === 'PowerState/deallocated' || code === 'PowerState/stopped') return 'stopped';
      }
      return 'unknown';
    },
  },
  attachments: {
    isAttached: (target, resource) => attachedIds(target).some((id) => id.toLowerCase() === resource.key),
    attach: (target, resources) => withAttached(target, [...attachedIds(target), ...resources.map((resource) => resource.toString())]),
    detach: (target, resources) =>
      withAttached(
        target,
        attachedIds(target).filter((id) => !resources.some((resource) => resource.key === id.toLowerCase()))
      ),
  },
};

export function disk(name: string): ResourceIdentity {
  return ResourceIdentity.of('sub-1', 'rg-test', DISK_KIND.kind, name);
}

export function machine(name: string): ResourceIdentity {
  return ResourceIdentity.of('sub-1', 'rg-test', MACHINE_KIND.kind, name);
}

/** Backoff that settles eventually-consistent reads within a few milliseconds. */
export const FAST_SETTLE = { maxAttempts: 5, baseDelayMs: 1, maxDelayMs: 2, jitterFactor: 0 };

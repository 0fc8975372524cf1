import { ResourceKindDescriptor } from '@converge/contracts';

import { disks } from './kinds/disks';
import { genericDescriptor } from './kinds/generic';
import { virtualMachines } from './kinds/virtualMachines';
import { virtualNetworks } from './kinds/virtualNetworks';

export const BUILTIN_KINDS: ResourceKindDescriptor[] = [disks, virtualMachines, virtualNetworks];

/**
 * Looks up resource kind descriptors by `Namespace/type`, case-insensitively.
 * Kinds nobody registered get the generic descriptor.
 */
export class ResourceKindRegistry {
  private readonly descriptors = new Map<string, ResourceKindDescriptor>();

  constructor(descriptors: ResourceKindDescriptor[] = BUILTIN_KINDS) {
    for (const descriptor of descriptors) this.register(descriptor);
  }

  register(descriptor: ResourceKindDescriptor): this {
    this.descriptors.set(descriptor.kind.toLowerCase(), descriptor);
    return this;
  }

  has(kind: string): boolean {
    return this.descriptors.has(kind.toLowerCase());
  }

  get(kind: string): ResourceKindDescriptor {
    return this.descriptors.get(kind.toLowerCase()) ?? genericDescriptor(kind);
  }

  kinds(): string[] {
    return [...this.descriptors.values()].map((descriptor) => descriptor.kind);
  }
}

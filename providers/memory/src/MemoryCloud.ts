import { cloneSpec, isSpecObject, ProviderRequestError, ResourceIdentity, SpecObject } from '@converge/contracts';

export type MemoryPowerState = 'running' | 'stopped' | 'deallocated';

export interface StoredResource {
  id: string;
  body: SpecObject;
  power: MemoryPowerState;
}

export type WriteOperation = 'createOrUpdate' | 'delete' | string;

export interface WriteRecord {
  operation: WriteOperation;
  id: string;
  body?: SpecObject;
}

/**
 * `request`: the call itself is refused.
 * `operation`: the call is accepted but the operation ends `failed`.
 * `provisioning`: the operation succeeds but leaves the resource in provisioning state `Failed`.
 */
export type FailureMode = 'request' | 'operation' | 'provisioning';

export interface InjectedFailure {
  mode: FailureMode;
  message: string;
  statusCode?: number;
  code?: string;
}

export interface MemoryCloudOptions {
  /** How long every write takes; 0 completes writes synchronously. */
  latencyMs?: number;
  /** Number of reads that still see a resource after its delete completed. */
  ghostReads?: number;
}

/**
 * A tiny resource manager living in process memory. Clients created by `MemoryClientFactory` read and write it.
 */
export class MemoryCloud {
  readonly writes: WriteRecord[] = [];
  readonly latencyMs: number;
  readonly ghostReads: number;

  private readonly resources = new Map<string, StoredResource>();
  private readonly ghosts = new Map<string, { resource: StoredResource; reads: number }>();
  private readonly failures = new Map<string, InjectedFailure>();

  constructor(options: MemoryCloudOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.ghostReads = options.ghostReads ?? 0;
  }

  /** Places a resource as if it had been created out of band. */
  seed(identity: ResourceIdentity, body: SpecObject, power: MemoryPowerState = 'running'): void {
    this.resources.set(identity.key, { id: identity.toString(), body: withServerFields(identity, body, 'Succeeded'), power });
  }

  find(identity: ResourceIdentity): StoredResource | undefined {
    const stored = this.resources.get(identity.key);
    if (stored) return stored;

    const ghost = this.ghosts.get(identity.key);
    if (!ghost) return undefined;

    ghost.reads++;
    if (ghost.reads >= this.ghostReads) this.ghosts.delete(identity.key);
    return ghost.resource;
  }

  list(): StoredResource[] {
    return [...this.resources.values()];
  }

  restore(resources: StoredResource[]): void {
    this.resources.clear();
    this.ghosts.clear();
    for (const resource of resources) this.resources.set(ResourceIdentity.parse(resource.id).key, resource);
  }

  /** Makes the next write of `operation` against the identity fail. */
  failNext(identity: ResourceIdentity, operation: WriteOperation, failure: InjectedFailure): void {
    this.failures.set(failureKey(identity, operation), failure);
  }

  writeCount(operation?: WriteOperation): number {
    return operation ? this.writes.filter((write) => write.operation === operation).length : this.writes.length;
  }

  /** Records a write and hands back the failure injected for it, if any. */
  recordWrite(identity: ResourceIdentity, operation: WriteOperation, body?: SpecObject): InjectedFailure | undefined {
    this.writes.push({ operation, id: identity.toString(), ...(body ? { body: cloneSpec(body) } : {}) });

    const key = failureKey(identity, operation);
    const failure = this.failures.get(key);
    this.failures.delete(key);

    if (failure?.mode === 'request')
      throw new ProviderRequestError(failure.message, { statusCode: failure.statusCode ?? 409, code: failure.code ?? 'Conflict', identity });
    return failure;
  }

  put(identity: ResourceIdentity, body: SpecObject, provisioningState = 'Succeeded'): StoredResource {
    const power = this.resources.get(identity.key)?.power ?? 'running';
    const stored = { id: identity.toString(), body: withServerFields(identity, body, provisioningState), power };
    this.resources.set(identity.key, stored);
    this.ghosts.delete(identity.key);
    return stored;
  }

  remove(identity: ResourceIdentity): void {
    const stored = this.resources.get(identity.key);
    if (!stored) return;

    this.resources.delete(identity.key);
    if (this.ghostReads > 0) this.ghosts.set(identity.key, { resource: stored, reads: 0 });
  }

  setPower(identity: ResourceIdentity, power: MemoryPowerState): void {
    const stored = this.resources.get(identity.key);
    if (!stored) throw new ProviderRequestError(`Resource ${identity.toString()} not found`, { statusCode: 404, code: 'ResourceNotFound', identity });
    stored.power = power;
  }
}

function failureKey(identity: ResourceIdentity, operation: WriteOperation): string {
  return `${operation}:${identity.key}`;
}

function withServerFields(identity: ResourceIdentity, body: SpecObject, provisioningState: string): SpecObject {
  const properties = isSpecObject(body.properties) ? body.properties : {};

  return {
    ...cloneSpec(body),
    id: identity.toString(),
    name: identity.name.split('/').at(-1) ?? identity.name,
    type: identity.kind,
    properties: { ...cloneSpec(properties), provisioningState },
  };
}

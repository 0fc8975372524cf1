import { ResourceIdentity } from './ResourceIdentity';
import type { ActualState, SpecObject, SpecValue } from './values';

export type Action = 'NoAction' | 'Create' | 'Update' | 'Delete' | 'AttachOnly' | 'DetachOnly' | 'Start' | 'Stop';

export type DesiredState = 'present' | 'absent';

export type DesiredPower = 'started' | 'stopped';

export type PowerState = 'running' | 'stopped' | 'unknown';

export type TagsMode = 'append' | 'replace';

/** Per-field rules supplied by the schema layer; the engine never invents them. */
export interface FieldPolicy {
  /** May only be set at creation. */
  immutable?: boolean;
  /** Leaving the field out clears it (or, for keyed lists, removes unlisted entries). */
  purgeIfAbsent?: boolean;
  /** Attribute used to match list entries across desired and actual. */
  mergeKey?: string;
  caseInsensitive?: boolean;
  /** Free-form key/value map merged according to the caller's tags mode. */
  tags?: boolean;
  /** Policies for the members of an object field, or of each keyed list entry. */
  fields?: FieldPolicyMap;
}

export type FieldPolicyMap = Record<string, FieldPolicy>;

export type OperationStatus = 'running' | 'succeeded' | 'failed' | 'canceled';

/** A provider-side asynchronous job. */
export interface IOperationHandle {
  readonly kind: 'operation';
  readonly identity: ResourceIdentity;
  /** What the engine was doing when it started the job, if known. */
  readonly action?: Action;
  /** Performs one status round trip. */
  status(): Promise<OperationStatus>;
  result(): ActualState;
  failure(): Error | undefined;
}

/** A write the provider completed synchronously. */
export interface ImmediateResult {
  readonly kind: 'immediate';
  readonly identity: ResourceIdentity;
  readonly state: ActualState;
}

export type WriteResult = IOperationHandle | ImmediateResult;

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'PATCH' | 'DELETE' | 'HEAD';

export interface RawRequest {
  method: HttpMethod;
  /** Path below the management endpoint, e.g. a resource id plus a suffix. */
  path: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: SpecValue;
  timeoutMs?: number;
}

export interface RawResponse {
  status: number;
  headers: Record<string, string>;
  body: SpecValue | undefined;
}

/** The contract every provider client implements. */
export interface IProviderClient {
  /** Resolves `undefined` when the resource does not exist. */
  get(identity: ResourceIdentity): Promise<ActualState>;
  createOrUpdate(identity: ResourceIdentity, body: SpecObject): Promise<WriteResult>;
  delete(identity: ResourceIdentity): Promise<WriteResult>;
  /** Starts a resource action such as `start` or `deallocate`. */
  invoke(identity: ResourceIdentity, operation: string, body?: SpecObject): Promise<WriteResult>;
  request(request: RawRequest): Promise<RawResponse>;
}

export interface ServiceBinding {
  /** `Namespace/type`, e.g. `Microsoft.Compute/disks`. */
  kind: string;
  apiVersion?: string;
}

export interface IClientFactory {
  client(binding: ServiceBinding): IProviderClient;
}

export interface PowerDescriptor {
  read(client: IProviderClient, identity: ResourceIdentity): Promise<PowerState>;
  startOperation: string;
  stopOperation: string;
}

/** Describes a relation stored on a target resource, e.g. data disks attached to a virtual machine. */
export interface AttachmentDescriptor {
  isAttached(target: SpecObject, resource: ResourceIdentity): boolean;
  attach(target: SpecObject, resources: ResourceIdentity[]): SpecObject;
  detach(target: SpecObject, resources: ResourceIdentity[]): SpecObject;
}

/**
 * Everything the generic controller needs to know about one resource kind.
 */
export interface ResourceKindDescriptor {
  readonly kind: string;
  readonly apiVersion?: string;
  readonly policy: FieldPolicyMap;
  /** Projects a provider response onto the tree the desired spec is diffed against. */
  fromResponse?(raw: SpecObject): SpecObject;
  /** Shapes a merged tree into the create/update payload. */
  toRequestBody?(tree: SpecObject, identity: ResourceIdentity): SpecObject;
  provisioningState?(actual: SpecObject): string | undefined;
  readonly power?: PowerDescriptor;
  readonly attachments?: AttachmentDescriptor;
}

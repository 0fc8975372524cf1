import {
  ActualState,
  cloneSpec,
  IProviderClient,
  isSpecObject,
  ProviderRequestError,
  RawRequest,
  RawResponse,
  ResourceIdentity,
  SpecObject,
  SpecValue,
  WriteResult,
} from '@converge/contracts';

import { InjectedFailure, MemoryCloud, MemoryPowerState, StoredResource } from './MemoryCloud';
import { MemoryOperation } from './MemoryOperation';

const POWER_OPERATIONS: Record<string, MemoryPowerState> = {
  start: 'running',
  restart: 'running',
  powerOff: 'stopped',
  deallocate: 'deallocated',
};

function notFound(identity: ResourceIdentity): ProviderRequestError {
  return new ProviderRequestError(`Resource ${identity.toString()} not found`, { statusCode: 404, code: 'ResourceNotFound', identity });
}

function instanceView(stored: StoredResource): SpecObject {
  return {
    statuses: [
      { code: 'ProvisioningState/succeeded', level: 'Info' },
      { code: `PowerState/${stored.power}`, level: 'Info' },
    ],
  };
}

/** Provider client for one resource kind, backed by a `MemoryCloud`. */
export class InMemoryProviderClient implements IProviderClient {
  constructor(
    private readonly cloud: MemoryCloud,
    readonly kind: string
  ) {}

  async get(identity: ResourceIdentity): Promise<ActualState> {
    const stored = this.cloud.find(identity);
    return stored ? cloneSpec(stored.body) : undefined;
  }

  async createOrUpdate(identity: ResourceIdentity, body: SpecObject): Promise<WriteResult> {
    this.assertKind(identity);
    const failure = this.cloud.recordWrite(identity, 'createOrUpdate', body);

    return this.start(identity, failure, () => {
      const stored = this.cloud.put(identity, body, failure?.mode === 'provisioning' ? 'Failed' : 'Succeeded');
      return cloneSpec(stored.body);
    });
  }

  async delete(identity: ResourceIdentity): Promise<WriteResult> {
    this.assertKind(identity);
    const failure = this.cloud.recordWrite(identity, 'delete');

    return this.start(identity, failure, () => {
      this.cloud.remove(identity);
      return undefined;
    });
  }

  async invoke(identity: ResourceIdentity, operation: string, body?: SpecObject): Promise<WriteResult> {
    this.assertKind(identity);
    const power = POWER_OPERATIONS[operation];
    if (!power) throw new ProviderRequestError(`Operation ${operation} is not supported on ${this.kind}`, { statusCode: 404, code: 'NoRegisteredProviderFound', identity });
    if (!this.cloud.find(identity)) throw notFound(identity);

    const failure = this.cloud.recordWrite(identity, operation, body);
    return this.start(identity, failure, () => {
      this.cloud.setPower(identity, power);
      return undefined;
    });
  }

  /** Serves `GET <id>` and `GET <id>/instanceView`; everything else answers 404. */
  async request(request: RawRequest): Promise<RawResponse> {
    const path = request.path.replace(/\/+$/, '');
    const viewSuffix = '/instanceview';
    const wantsView = path.toLowerCase().endsWith(viewSuffix);

    let identity: ResourceIdentity;
    try {
      identity = ResourceIdentity.parse(wantsView ? path.slice(0, -viewSuffix.length) : path);
    } catch {
      return this.respond(404, { error: { code: 'InvalidResourceId', message: `Unrecognised path ${request.path}` } });
    }

    const stored = request.method === 'GET' ? this.cloud.find(identity) : undefined;
    if (!stored) return this.respond(404, { error: { code: 'ResourceNotFound', message: `Resource ${identity.toString()} not found` } });

    return this.respond(200, wantsView ? instanceView(stored) : cloneSpec(stored.body));
  }

  private start(identity: ResourceIdentity, failure: InjectedFailure | undefined, complete: () => ActualState): WriteResult {
    const operation = new MemoryOperation(identity, this.cloud.latencyMs, complete, failure);
    if (this.cloud.latencyMs > 0 || failure?.mode === 'operation') return operation;

    return { kind: 'immediate', identity, state: complete() };
  }

  private respond(status: number, body: SpecValue): RawResponse {
    return { status, headers: { 'content-type': 'application/json' }, body: isSpecObject(body) ? cloneSpec(body) : body };
  }

  private assertKind(identity: ResourceIdentity): void {
    if (identity.kind.toLowerCase() !== this.kind.toLowerCase()) throw new TypeError(`${identity.toString()} is not a ${this.kind}`);
  }
}

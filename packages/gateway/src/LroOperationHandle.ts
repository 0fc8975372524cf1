import { OperationState, SimplePollerLike } from '@azure/core-lro';
import { ActualState, IOperationHandle, isSpecObject, OperationStatus, ResourceIdentity, SpecValue } from '@converge/contracts';

export type ArmPoller = SimplePollerLike<OperationState<SpecValue | undefined>, SpecValue | undefined>;

function toOperationStatus(status: OperationState<unknown>['status']): OperationStatus {
  switch (status) {
    case 'succeeded':
    case 'failed':
    case 'canceled':
      return status;
    default:
      return 'running';
  }
}

/** Exposes an ARM long-running operation one poll round trip at a time. */
export class LroOperationHandle implements IOperationHandle {
  readonly kind = 'operation';

  constructor(
    readonly identity: ResourceIdentity,
    private readonly poller: ArmPoller
  ) {}

  async status(): Promise<OperationStatus> {
    if (!this.poller.isDone()) await this.poller.poll();
    return toOperationStatus(this.poller.getOperationState().status);
  }

  result(): ActualState {
    const result = this.poller.getResult();
    return isSpecObject(result) ? result : undefined;
  }

  failure(): Error | undefined {
    return this.poller.getOperationState().error;
  }
}

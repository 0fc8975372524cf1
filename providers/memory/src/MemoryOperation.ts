import { ActualState, IOperationHandle, OperationStatus, ResourceIdentity } from '@converge/contracts';

import { InjectedFailure } from './MemoryCloud';

/** Completes `latencyMs` after it was started, applying its effect on the first status check past that point. */
export class MemoryOperation implements IOperationHandle {
  readonly kind = 'operation';

  private readonly startedAt = Date.now();
  private finished?: { status: OperationStatus; state: ActualState };

  constructor(
    readonly identity: ResourceIdentity,
    private readonly latencyMs: number,
    private readonly complete: () => ActualState,
    private readonly injected?: InjectedFailure
  ) {}

  async status(): Promise<OperationStatus> {
    if (this.finished) return this.finished.status;
    if (Date.now() - this.startedAt < this.latencyMs) return 'running';

    this.finished = this.injected?.mode === 'operation' ? { status: 'failed', state: undefined } : { status: 'succeeded', state: this.complete() };
    return this.finished.status;
  }

  result(): ActualState {
    return this.finished?.state;
  }

  failure(): Error | undefined {
    return this.finished?.status === 'failed' && this.injected ? new Error(this.injected.message) : undefined;
  }
}

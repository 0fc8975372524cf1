import {
  Action,
  ActualState,
  getPath,
  ILogger,
  InvalidRequestError,
  OperationTimeout,
  ProvisioningFailed,
  ResourceIdentity,
  ResourceKindDescriptor,
  silentLogger,
  SpecObject,
  WriteResult,
} from '@converge/contracts';
import { applyDiff, diff } from '@converge/diff';
import { BackoffOptions, labelOperation, resolveBackoff, toReconcileError, waitFor } from '@converge/poller';

import { PreparedResource } from '../types';

export const DEFAULT_SETTLE_BACKOFF: BackoffOptions = {
  maxAttempts: 8,
  baseDelayMs: 2_000,
  maxDelayMs: 15_000,
  maxTotalWaitMs: 120_000,
};

export interface ReadResult {
  raw: ActualState;
  /** `raw` projected through the descriptor. */
  state: ActualState;
}

export function requestBody(descriptor: ResourceKindDescriptor, tree: SpecObject, identity: ResourceIdentity): SpecObject {
  return descriptor.toRequestBody ? descriptor.toRequestBody(tree, identity) : tree;
}

export function projectState(descriptor: ResourceKindDescriptor, raw: ActualState): ActualState {
  if (!raw) return undefined;
  return descriptor.fromResponse ? descriptor.fromResponse(raw) : raw;
}

/**
 * Turns planned actions into provider calls. Issuing never waits for an operation to finish; settling happens afterwards.
 */
export class ActionExecutor {
  private readonly settleBackoff: BackoffOptions;

  constructor(
    settleBackoff: BackoffOptions = DEFAULT_SETTLE_BACKOFF,
    private readonly logger: ILogger = silentLogger
  ) {
    this.settleBackoff = { ...DEFAULT_SETTLE_BACKOFF, ...settleBackoff };
  }

  async read(descriptor: ResourceKindDescriptor, prepared: Pick<PreparedResource, 'client'>, identity: ResourceIdentity, action?: Action): Promise<ReadResult> {
    try {
      const raw = await prepared.client.get(identity);
      return { raw, state: projectState(descriptor, raw) };
    } catch (error) {
      throw toReconcileError(error, { identity, action });
    }
  }

  /** Starts the structural write of a plan; resolves `undefined` when there is nothing to write. */
  async issue(prepared: PreparedResource): Promise<WriteResult | undefined> {
    const { request, client, actual, plan } = prepared;
    const { identity, descriptor } = request;

    switch (plan.action) {
      case 'Create': {
        const tree = applyDiff(undefined, diff(request.desired, undefined, descriptor.policy, { tagsMode: request.tagsMode }));
        return this.issueWrite(identity, 'Create', () => client.createOrUpdate(identity, requestBody(descriptor, tree, identity)));
      }
      case 'Update': {
        const tree = plan.diff ? applyDiff(actual, plan.diff) : (actual ?? {});
        return this.issueWrite(identity, 'Update', () => client.createOrUpdate(identity, requestBody(descriptor, tree, identity)));
      }
      case 'Delete': {
        return this.issueWrite(identity, 'Delete', () => client.delete(identity));
      }
      case 'NoAction': {
        return undefined;
      }
      default: {
        throw new Error(`Unsupported structural action: ${plan.action}`);
      }
    }
  }

  /** Starts the power action of a plan, if it has one. */
  async issuePower(prepared: PreparedResource): Promise<WriteResult | undefined> {
    const { request, client, plan } = prepared;
    if (!plan.secondaryAction) return undefined;

    const power = request.descriptor.power;
    if (!power) throw new InvalidRequestError(`${request.descriptor.kind} has no power actions`);

    const operation = plan.secondaryAction === 'Start' ? power.startOperation : power.stopOperation;
    return this.issueWrite(request.identity, plan.secondaryAction, () => client.invoke(request.identity, operation));
  }

  /**
   * Waits for the provider's view to reflect a finished write.
   * Deletes wait until the resource is gone; creates and updates return the fresh state and fail on a `Failed` provisioning state.
   */
  async settle(prepared: PreparedResource, action: Action): Promise<ActualState> {
    const { identity, descriptor } = prepared.request;
    const context = { identity, action };
    const budget = resolveBackoff(this.settleBackoff).maxTotalWaitMs;

    if (action === 'Delete') {
      const gone = await waitFor(async () => (await this.read(descriptor, prepared, identity, action)).raw === undefined, this.settleBackoff);
      if (!gone) throw new OperationTimeout(`${identity.toString()} still exists after Delete`, budget, context);
      return undefined;
    }

    let latest: ReadResult = { raw: undefined, state: undefined };
    const visible = await waitFor(async () => {
      latest = await this.read(descriptor, prepared, identity, action);
      return latest.raw !== undefined;
    }, this.settleBackoff);
    if (!visible || !latest.raw) throw new OperationTimeout(`${identity.toString()} is not readable after ${action}`, budget, context);

    const provisioningState = descriptor.provisioningState ? descriptor.provisioningState(latest.raw) : getPath(latest.raw, 'properties.provisioningState');
    if (typeof provisioningState === 'string' && provisioningState.toLowerCase() === 'failed')
      throw new ProvisioningFailed(`${action} on ${identity.toString()} left the resource in provisioning state ${provisioningState}`, provisioningState, context);

    return latest.state;
  }

  /** Runs one provider write, labelled with the action it performs. */
  async issueWrite(identity: ResourceIdentity, action: Action, write: () => Promise<WriteResult>): Promise<WriteResult> {
    this.logger.info(`${action} ${identity.toString()}`);
    try {
      return labelOperation(await write(), action);
    } catch (error) {
      throw toReconcileError(error, { identity, action });
    }
  }
}

import {
  Action,
  ActualState,
  describeError,
  ILogger,
  IOperationHandle,
  isReconcileError,
  OperationStatus,
  OperationTimeout,
  ProviderRequestError,
  ProvisioningFailed,
  ReconcileError,
  ResourceIdentity,
  silentLogger,
  WriteResult,
} from '@converge/contracts';

import { sleep, withDeadline } from './backoff';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_OPERATION_TIMEOUT_MS = 600_000;

export interface PollOptions {
  pollIntervalMs?: number;
  perHandleTimeoutMs?: number;
}

export type OperationOutcome =
  | { ok: true; identity: ResourceIdentity; action?: Action; state: ActualState }
  | { ok: false; identity: ResourceIdentity; action?: Action; error: ReconcileError };

/** Tags a provider operation with the action that started it. */
export function labelOperation(result: WriteResult, action: Action): WriteResult {
  if (result.kind === 'immediate') return result;

  return {
    kind: 'operation',
    identity: result.identity,
    action,
    status: () => result.status(),
    result: () => result.result(),
    failure: () => result.failure(),
  };
}

export class OperationPoller {
  private readonly defaults: Required<PollOptions>;

  constructor(
    options: PollOptions = {},
    private readonly logger: ILogger = silentLogger
  ) {
    this.defaults = {
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      perHandleTimeoutMs: options.perHandleTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS,
    };
  }

  /**
   * Tracks every handle concurrently, each on its own cadence, and returns one outcome per handle in input order.
   * A failed or timed-out handle never stops its siblings; timed-out operations are not cancelled remotely.
   */
  async awaitAll(results: WriteResult[], options: PollOptions = {}): Promise<OperationOutcome[]> {
    const config: Required<PollOptions> = {
      pollIntervalMs: options.pollIntervalMs ?? this.defaults.pollIntervalMs,
      perHandleTimeoutMs: options.perHandleTimeoutMs ?? this.defaults.perHandleTimeoutMs,
    };

    return Promise.all(
      results.map((result) => {
        if (result.kind === 'immediate') return Promise.resolve<OperationOutcome>({ ok: true, identity: result.identity, state: result.state });
        return this.track(result, config);
      })
    );
  }

  private async track(handle: IOperationHandle, config: Required<PollOptions>): Promise<OperationOutcome> {
    const context = { identity: handle.identity, action: handle.action };
    const label = `${handle.action ?? 'Operation'} on ${handle.identity.toString()}`;
    const started = Date.now();

    const timedOut = (): OperationOutcome => ({
      ok: false,
      ...context,
      error: new OperationTimeout(`${label} did not finish within ${config.perHandleTimeoutMs}ms`, config.perHandleTimeoutMs, context),
    });

    for (;;) {
      let status: OperationStatus | undefined;
      try {
        status = await withDeadline(handle.status(), Math.max(0, config.perHandleTimeoutMs - (Date.now() - started)));
      } catch (error) {
        this.logger.warn(`${label}: status check failed: ${describeError(error)}`);
        return { ok: false, ...context, error: toReconcileError(error, context) };
      }

      // The status call itself outlived the budget.
      if (status === undefined) return timedOut();

      this.logger.debug(`${label}: ${status}`);

      if (status === 'succeeded') return { ok: true, ...context, state: handle.result() };

      if (status === 'failed' || status === 'canceled') {
        const failure = handle.failure();
        const reason = failure ? `: ${failure.message}` : '';
        return { ok: false, ...context, error: new ProvisioningFailed(`${label} ended in state ${status}${reason}`, status, { ...context, cause: failure }) };
      }

      const elapsed = Date.now() - started;
      if (elapsed >= config.perHandleTimeoutMs) return timedOut();

      await sleep(Math.min(config.pollIntervalMs, config.perHandleTimeoutMs - elapsed));
    }
  }
}

/** Annotates a provider failure with the resource and action; anything unexpected becomes a `ProviderRequestError`. */
export function toReconcileError(error: unknown, context: { identity: ResourceIdentity; action?: Action }): ReconcileError {
  if (error instanceof ProviderRequestError) return error.withContext(context);
  if (isReconcileError(error)) return error;
  return new ProviderRequestError(describeError(error), { ...context, cause: error });
}

export function failedOutcomes(outcomes: OperationOutcome[]): Extract<OperationOutcome, { ok: false }>[] {
  const failed: Extract<OperationOutcome, { ok: false }>[] = [];
  for (const outcome of outcomes) if (!outcome.ok) failed.push(outcome);
  return failed;
}

import {
  Action,
  describeError,
  IClientFactory,
  ILogger,
  ImmutableFieldConflict,
  InvalidRequestError,
  IProviderClient,
  PowerState,
  ProviderRequestError,
  ReconcileError,
  ResourceIdentity,
  ResourceKindDescriptor,
  silentLogger,
  SpecObject,
  WriteResult,
} from '@converge/contracts';
import { diff, DiffResult } from '@converge/diff';
import { AttachmentStep, planAttachments, planResource } from '@converge/planner';
import { OperationOutcome, OperationPoller, PollOptions, toReconcileError } from '@converge/poller';

import { ActionExecutor, requestBody } from './components/ActionExecutor';
import { KeyedMutex } from './KeyedMutex';
import {
  AttachmentOutcome,
  AttachmentReconciliationResult,
  AttachmentRequest,
  BatchReconciliationResult,
  ControllerOptions,
  PreparedResource,
  ReconcileOptions,
  ReconcileRequest,
  ReconciliationResult,
  ResourceOutcome,
} from './types';

/** Per-resource progress through a batch; `error` is set once the resource stops advancing. */
interface BatchEntry {
  prepared: PreparedResource;
  changed: boolean;
  state: PreparedResource['actual'];
  outcomes: OperationOutcome[];
  error?: ReconcileError;
}

interface AttachmentTarget {
  identity: ResourceIdentity;
  client: IProviderClient;
  tree: SpecObject;
  steps: AttachmentStep[];
}

/**
 * Brings resources to their desired state: fetch, diff, plan, then write and wait.
 * Writes against the same identity are serialised within the process.
 */
export class ReconciliationController {
  private readonly poller: OperationPoller;
  private readonly executor: ActionExecutor;
  private readonly locks = new KeyedMutex();
  private readonly logger: ILogger;

  constructor(
    private readonly clients: IClientFactory,
    options: ControllerOptions = {},
    logger: ILogger = silentLogger
  ) {
    this.logger = logger;
    this.poller = new OperationPoller({ pollIntervalMs: options.pollIntervalMs, perHandleTimeoutMs: options.perHandleTimeoutMs }, logger);
    this.executor = new ActionExecutor(options.settleBackoff, logger);
  }

  /**
   * Reconciles one resource. Any failure is thrown and carries the identity and the action being attempted.
   * @throws ImmutableFieldConflict before any write when the desired spec changes an immutable field
   */
  async reconcile(request: ReconcileRequest, options: ReconcileOptions = {}): Promise<ReconciliationResult> {
    return this.locks.withLock(request.identity.key, async () => {
      const prepared = await this.prepare(request);
      const { plan } = prepared;

      if (options.checkMode)
        return { changed: plan.changed, action: plan.action, secondaryAction: plan.secondaryAction, state: prepared.actual, diff: plan.diff, checkMode: true, outcomes: [] };

      const outcomes: OperationOutcome[] = [];
      let state = prepared.actual;

      const write = await this.executor.issue(prepared);
      if (write) {
        outcomes.push(...(await this.settleWrites([write], options)));
        state = await this.executor.settle(prepared, plan.action);
      }

      const power = await this.executor.issuePower(prepared);
      if (power) outcomes.push(...(await this.settleWrites([power], options)));

      return { changed: plan.changed, action: plan.action, secondaryAction: plan.secondaryAction, state, diff: plan.diff, checkMode: false, outcomes };
    });
  }

  /**
   * Reconciles many resources. Everything is fetched, diffed and planned before the first write, so a conflict aborts the whole batch untouched.
   * Structural writes are then issued together and polled together, followed by power actions; write failures are reported per identity.
   */
  async reconcileBatch(requests: ReconcileRequest[], options: ReconcileOptions = {}): Promise<BatchReconciliationResult> {
    const seen = new Set<string>();
    for (const request of requests) {
      if (seen.has(request.identity.key)) throw new InvalidRequestError(`${request.identity.toString()} is listed more than once`);
      seen.add(request.identity.key);
    }

    return this.locks.withLocks([...seen], async () => {
      const prepared = await Promise.all(requests.map((request) => this.prepare(request)));

      if (options.checkMode) {
        const outcomes = prepared.map(({ plan, actual }): ResourceOutcome => ({
          ok: true,
          identity: plan.identity,
          action: plan.action,
          secondaryAction: plan.secondaryAction,
          changed: plan.changed,
          state: actual,
          diff: plan.diff,
        }));
        return { changed: outcomes.some((outcome) => outcome.changed), checkMode: true, outcomes };
      }

      const entries: BatchEntry[] = prepared.map((item) => ({ prepared: item, changed: false, state: item.actual, outcomes: [] }));

      await this.runPhase(
        entries,
        (entry) => this.executor.issue(entry.prepared),
        (entry) => this.executor.settle(entry.prepared, entry.prepared.plan.action),
        options
      );
      await this.runPhase(entries, (entry) => this.executor.issuePower(entry.prepared), undefined, options);

      const outcomes = entries.map((entry): ResourceOutcome => {
        const { plan } = entry.prepared;
        const base = { identity: plan.identity, action: plan.action, secondaryAction: plan.secondaryAction, changed: entry.changed };
        return entry.error ? { ...base, ok: false, error: entry.error } : { ...base, ok: true, state: entry.state, diff: plan.diff };
      });

      const failed = outcomes.filter((outcome) => !outcome.ok).length;
      if (failed > 0) this.logger.warn(`${failed} of ${outcomes.length} resources failed`);

      return { changed: outcomes.some((outcome) => outcome.changed), checkMode: false, outcomes };
    });
  }

  /**
   * Attaches or detaches every resource to or from every target. Steps are grouped into one update per target,
   * all target updates run concurrently and every (resource, target) pair gets an outcome.
   */
  async reconcileAttachments(request: AttachmentRequest, options: ReconcileOptions = {}): Promise<AttachmentReconciliationResult> {
    const relation = request.descriptor.attachments;
    if (!relation) throw new InvalidRequestError(`${request.descriptor.kind} does not describe attachments`);

    const targetKeys = request.targets.map((target) => target.key);
    return this.locks.withLocks(targetKeys, async () => {
      const action: Action = request.desired === 'attached' ? 'AttachOnly' : 'DetachOnly';

      const targets = await Promise.all(
        request.targets.map(async (identity): Promise<AttachmentTarget> => {
          const client = this.clientFor(request.descriptor, request.apiVersion);
          const { state } = await this.executor.read(request.descriptor, { client }, identity);
          if (!state) throw new ProviderRequestError(`Attachment target ${identity.toString()} does not exist`, { statusCode: 404, identity, action });

          const relations = request.resources.map((resource) => ({ resource, target: identity, attached: relation.isAttached(state, resource) }));
          return { identity, client, tree: state, steps: planAttachments(relations, request.desired) };
        })
      );

      const pending = targets.filter((target) => target.steps.length > 0);

      const failures = new Map<string, ReconcileError>();
      if (!options.checkMode) {
        const issued = await Promise.all(
          pending.map(async (target) => {
            try {
              const resources = target.steps.map((step) => step.resource);
              const tree = request.desired === 'attached' ? relation.attach(target.tree, resources) : relation.detach(target.tree, resources);
              const body = requestBody(request.descriptor, tree, target.identity);
              return await this.executor.issueWrite(target.identity, action, () => target.client.createOrUpdate(target.identity, body));
            } catch (error) {
              failures.set(target.identity.key, toReconcileError(error, { identity: target.identity, action }));
              return undefined;
            }
          })
        );

        const writes = issued.filter((write): write is WriteResult => write !== undefined);
        for (const outcome of await this.poller.awaitAll(writes, this.pollOptions(options)))
          if (!outcome.ok) failures.set(outcome.identity.key, outcome.error);
      }

      const outcomes: AttachmentOutcome[] = [];
      for (const target of targets)
        for (const resource of request.resources) {
          const planned = target.steps.some((step) => step.resource.equals(resource));
          const error = planned ? failures.get(target.identity.key) : undefined;
          const base = { resource, target: target.identity, action: planned ? action : ('NoAction' as const), changed: planned };
          outcomes.push(error ? { ...base, ok: false, error } : { ...base, ok: true });
        }

      return { changed: outcomes.some((outcome) => outcome.changed), checkMode: options.checkMode ?? false, outcomes };
    });
  }

  /** Fetch, diff and plan; nothing is written. */
  private async prepare(request: ReconcileRequest): Promise<PreparedResource> {
    const { identity, descriptor } = request;
    if (identity.kind.toLowerCase() !== descriptor.kind.toLowerCase()) throw new InvalidRequestError(`${identity.toString()} is not a ${descriptor.kind}`);
    if (request.power && !descriptor.power) throw new InvalidRequestError(`${descriptor.kind} has no power state to manage`);

    const client = this.clientFor(descriptor, request.apiVersion);
    const { state: actual } = await this.executor.read(descriptor, { client }, identity);
    const exists = actual !== undefined;

    let changes: DiffResult | undefined;
    if (exists && request.state === 'present')
      try {
        changes = diff(request.desired, actual, descriptor.policy, { tagsMode: request.tagsMode });
      } catch (error) {
        if (error instanceof ImmutableFieldConflict) throw error.withContext({ identity, action: 'Update' });
        throw error;
      }

    let actualPower: PowerState | undefined;
    if (exists && request.state === 'present' && request.power && descriptor.power)
      try {
        actualPower = await descriptor.power.read(client, identity);
      } catch (error) {
        throw toReconcileError(error, { identity });
      }

    const plan = planResource({ identity, exists, desiredState: request.state, diff: changes, desiredPower: request.power, actualPower });
    this.logger.debug(`${identity.toString()}: ${plan.action}${plan.secondaryAction ? ` + ${plan.secondaryAction}` : ''}`);

    return { request, client, actual, plan };
  }

  /** Issues one write per entry still in good standing, polls them all, then settles those that succeeded. */
  private async runPhase(
    entries: BatchEntry[],
    issue: (entry: BatchEntry) => Promise<WriteResult | undefined>,
    settle: ((entry: BatchEntry) => Promise<BatchEntry['state']>) | undefined,
    options: PollOptions
  ): Promise<void> {
    const issued = await Promise.all(
      entries.map(async (entry) => {
        if (entry.error) return undefined;
        try {
          const write = await issue(entry);
          if (write) entry.changed = true;
          return write;
        } catch (error) {
          entry.error = toReconcileError(error, { identity: entry.prepared.request.identity });
          return undefined;
        }
      })
    );

    const active = entries.filter((_, i) => issued[i] !== undefined);
    const writes = issued.filter((write): write is WriteResult => write !== undefined);
    const outcomes = await this.poller.awaitAll(writes, this.pollOptions(options));

    await Promise.all(
      active.map(async (entry, i) => {
        const outcome = outcomes[i];
        entry.outcomes.push(outcome);
        if (!outcome.ok) {
          entry.error = outcome.error;
          return;
        }
        if (!settle) return;

        try {
          entry.state = await settle(entry);
        } catch (error) {
          entry.error = toReconcileError(error, { identity: entry.prepared.request.identity, action: entry.prepared.plan.action });
          this.logger.warn(describeError(entry.error));
        }
      })
    );
  }

  /** Polls writes of a single-resource workflow, where any failure is fatal. */
  private async settleWrites(writes: WriteResult[], options: PollOptions): Promise<OperationOutcome[]> {
    const outcomes = await this.poller.awaitAll(writes, this.pollOptions(options));
    for (const outcome of outcomes) if (!outcome.ok) throw outcome.error;
    return outcomes;
  }

  private pollOptions(options: PollOptions): PollOptions {
    return { pollIntervalMs: options.pollIntervalMs, perHandleTimeoutMs: options.perHandleTimeoutMs };
  }

  private clientFor(descriptor: ResourceKindDescriptor, apiVersion?: string): IProviderClient {
    return this.clients.client({ kind: descriptor.kind, apiVersion: apiVersion ?? descriptor.apiVersion });
  }
}

import {
  Action,
  ActualState,
  DesiredPower,
  DesiredState,
  IProviderClient,
  ReconcileError,
  ResourceIdentity,
  ResourceKindDescriptor,
  SpecObject,
  TagsMode,
} from '@converge/contracts';
import { DiffResult } from '@converge/diff';
import { AttachmentGoal, PowerAction, ResourcePlan } from '@converge/planner';
import { BackoffOptions, OperationOutcome, PollOptions } from '@converge/poller';

export interface ReconcileRequest {
  identity: ResourceIdentity;
  desired: SpecObject;
  descriptor: ResourceKindDescriptor;
  state: DesiredState;
  power?: DesiredPower;
  tagsMode?: TagsMode;
  /** Overrides the descriptor's and the profile's API version. */
  apiVersion?: string;
}

export interface ReconcileOptions extends PollOptions {
  checkMode?: boolean;
}

export interface ReconciliationResult {
  changed: boolean;
  action: Action;
  secondaryAction?: PowerAction;
  /** Post-operation state; the fetched state in check mode; `undefined` once deleted. */
  state: ActualState;
  diff?: DiffResult;
  checkMode: boolean;
  outcomes: OperationOutcome[];
}

interface OutcomeBase {
  identity: ResourceIdentity;
  action: Action;
  secondaryAction?: PowerAction;
  /** Whether a write was issued; a failed outcome with `changed` set was partially applied. */
  changed: boolean;
}

export type ResourceOutcome = (OutcomeBase & { ok: true; state: ActualState; diff?: DiffResult }) | (OutcomeBase & { ok: false; error: ReconcileError });

export interface BatchReconciliationResult {
  changed: boolean;
  checkMode: boolean;
  outcomes: ResourceOutcome[];
}

export interface AttachmentRequest {
  resources: ResourceIdentity[];
  targets: ResourceIdentity[];
  desired: AttachmentGoal;
  /** Descriptor of the target kind; must describe its attachments. */
  descriptor: ResourceKindDescriptor;
  apiVersion?: string;
}

export type AttachmentOutcome =
  | { ok: true; resource: ResourceIdentity; target: ResourceIdentity; action: Action; changed: boolean }
  | { ok: false; resource: ResourceIdentity; target: ResourceIdentity; action: Action; changed: boolean; error: ReconcileError };

export interface AttachmentReconciliationResult {
  changed: boolean;
  checkMode: boolean;
  outcomes: AttachmentOutcome[];
}

export interface ControllerOptions extends PollOptions {
  /** Bounds the wait for a deleted resource to disappear, and for a created one to become readable. */
  settleBackoff?: BackoffOptions;
}

/** Everything known about one resource before any write. */
export interface PreparedResource {
  request: ReconcileRequest;
  client: IProviderClient;
  /** Projected through the descriptor. */
  actual: ActualState;
  plan: ResourcePlan;
}

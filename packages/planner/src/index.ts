import { Action, DesiredPower, DesiredState, PowerState, ResourceIdentity } from '@converge/contracts';
import { DiffResult, isEmptyDiff } from '@converge/diff';
import crypto from 'node:crypto';

export type PowerAction = 'Start' | 'Stop';

export type AttachmentGoal = 'attached' | 'detached';

export interface AttachmentRelation {
  resource: ResourceIdentity;
  target: ResourceIdentity;
  attached: boolean;
}

export interface AttachmentStep {
  action: 'AttachOnly' | 'DetachOnly';
  resource: ResourceIdentity;
  target: ResourceIdentity;
}

export interface ResourcePlan {
  identity: ResourceIdentity;
  exists: boolean;
  action: Action;
  secondaryAction?: PowerAction;
  diff?: DiffResult;
  changed: boolean;
}

/** The parts of a plan that reports and plan files need. */
export type PlanView = Pick<ResourcePlan, 'identity' | 'action' | 'secondaryAction' | 'diff' | 'changed'>;

export interface PlanInput {
  identity: ResourceIdentity;
  exists: boolean;
  desiredState: DesiredState;
  diff?: DiffResult;
  desiredPower?: DesiredPower;
  /** Ignored when the resource does not exist yet; new resources come up running. */
  actualPower?: PowerState;
}

export interface PlanSummary {
  create: number;
  update: number;
  delete: number;
  start: number;
  stop: number;
  attach: number;
  detach: number;
  unchanged: number;
}

export function plan(exists: boolean, desiredState: DesiredState, diff?: DiffResult): Action {
  if (desiredState === 'absent') return exists ? 'Delete' : 'NoAction';
  if (!exists) return 'Create';
  return isEmptyDiff(diff) ? 'NoAction' : 'Update';
}

export function planPower(desiredPower: DesiredPower | undefined, actualPower: PowerState): PowerAction | undefined {
  if (desiredPower === 'started' && actualPower !== 'running') return 'Start';
  if (desiredPower === 'stopped' && actualPower !== 'stopped') return 'Stop';
  return undefined;
}

/**
 * One step per (resource, target) pair whose relation differs from the goal.
 */
export function planAttachments(relations: AttachmentRelation[], desired: AttachmentGoal): AttachmentStep[] {
  const steps: AttachmentStep[] = [];

  for (const relation of relations) {
    if (desired === 'attached' && !relation.attached) steps.push({ action: 'AttachOnly', resource: relation.resource, target: relation.target });
    if (desired === 'detached' && relation.attached) steps.push({ action: 'DetachOnly', resource: relation.resource, target: relation.target });
  }

  return steps;
}

export function planResource(input: PlanInput): ResourcePlan {
  const action = plan(input.exists, input.desiredState, input.diff);

  let secondaryAction: PowerAction | undefined;
  if (input.desiredState === 'present' && action !== 'Delete') secondaryAction = planPower(input.desiredPower, input.exists ? (input.actualPower ?? 'unknown') : 'running');

  return {
    identity: input.identity,
    exists: input.exists,
    action,
    secondaryAction,
    diff: input.diff,
    changed: action !== 'NoAction' || secondaryAction !== undefined,
  };
}

export function summarizePlans(plans: PlanView[], steps: AttachmentStep[] = []): PlanSummary {
  const summary: PlanSummary = { create: 0, update: 0, delete: 0, start: 0, stop: 0, attach: 0, detach: 0, unchanged: 0 };

  for (const resourcePlan of plans) {
    if (resourcePlan.action === 'Create') summary.create++;
    else if (resourcePlan.action === 'Update') summary.update++;
    else if (resourcePlan.action === 'Delete') summary.delete++;

    if (resourcePlan.secondaryAction === 'Start') summary.start++;
    else if (resourcePlan.secondaryAction === 'Stop') summary.stop++;

    if (!resourcePlan.changed) summary.unchanged++;
  }

  for (const step of steps)
    if (step.action === 'AttachOnly') summary.attach++;
    else summary.detach++;

  return summary;
}

export interface PlannedChange {
  path: string;
  kind: string;
}

export interface PlannedResource {
  id: string;
  action: Action;
  secondaryAction?: PowerAction;
  changes: PlannedChange[];
}

export interface PlannedAttachment {
  action: AttachmentStep['action'];
  resource: string;
  target: string;
}

export interface PlanFile {
  version: string;
  timestamp: string;
  manifest_hash: string;
  resources: PlannedResource[];
  attachments: PlannedAttachment[];
}

export function hashManifest(manifestContent: string): string {
  return crypto.createHash('sha256').update(manifestContent).digest('hex');
}

export function serializePlan(plans: PlanView[], steps: AttachmentStep[], manifestContent: string): PlanFile {
  return {
    version: '1.0',
    timestamp: new Date().toISOString(),
    manifest_hash: hashManifest(manifestContent),
    resources: plans.map((resourcePlan) => ({
      id: resourcePlan.identity.toString(),
      action: resourcePlan.action,
      ...(resourcePlan.secondaryAction ? { secondaryAction: resourcePlan.secondaryAction } : {}),
      changes: (resourcePlan.diff?.entries ?? []).map((entry) => ({ path: entry.path, kind: entry.kind })),
    })),
    attachments: steps.map((step) => ({ action: step.action, resource: step.resource.toString(), target: step.target.toString() })),
  };
}

export function validatePlanFile(planFile: unknown): planFile is PlanFile {
  if (!planFile || typeof planFile !== 'object') return false;

  return (
    'version' in planFile &&
    typeof planFile.version === 'string' &&
    'timestamp' in planFile &&
    typeof planFile.timestamp === 'string' &&
    'manifest_hash' in planFile &&
    typeof planFile.manifest_hash === 'string' &&
    'resources' in planFile &&
    Array.isArray(planFile.resources) &&
    'attachments' in planFile &&
    Array.isArray(planFile.attachments)
  );
}

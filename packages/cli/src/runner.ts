import { ReconcileError } from '@converge/contracts';
import {
  AttachmentOutcome,
  AttachmentReconciliationResult,
  AttachmentRequest,
  BatchReconciliationResult,
  ReconcileOptions,
  ReconciliationController,
} from '@converge/orchestrator';
import { AttachmentStep } from '@converge/planner';

import { ManifestWork } from './manifest';

export interface RunReport {
  batch: BatchReconciliationResult;
  attachments: AttachmentReconciliationResult[];
}

function pairs(request: AttachmentRequest, build: (resource: AttachmentRequest['resources'][number], target: AttachmentRequest['targets'][number]) => AttachmentOutcome): AttachmentOutcome[] {
  return request.targets.flatMap((target) => request.resources.map((resource) => build(resource, target)));
}

/**
 * Reconciles the resources of a manifest as one batch, then each attachment entry in order.
 * In check mode, targets the batch is about to create are predicted instead of read.
 */
export async function runManifest(controller: ReconciliationController, work: ManifestWork, options: ReconcileOptions = {}): Promise<RunReport> {
  const checkMode = options.checkMode ?? false;
  const batch = await controller.reconcileBatch(work.resources, options);
  const creating = new Set(batch.outcomes.filter((outcome) => outcome.action === 'Create').map((outcome) => outcome.identity.key));

  const attachments: AttachmentReconciliationResult[] = [];
  for (const request of work.attachments) {
    const action = request.desired === 'attached' ? 'AttachOnly' : 'DetachOnly';
    const predicted = checkMode ? request.targets.filter((target) => creating.has(target.key)) : [];
    const existing = request.targets.filter((target) => !predicted.includes(target));

    const outcomes = pairs({ ...request, targets: predicted }, (resource, target) => ({
      ok: true,
      resource,
      target,
      action: request.desired === 'attached' ? action : 'NoAction',
      changed: request.desired === 'attached',
    }));

    if (existing.length > 0)
      try {
        outcomes.push(...(await controller.reconcileAttachments({ ...request, targets: existing }, options)).outcomes);
      } catch (error) {
        if (!(error instanceof ReconcileError)) throw error;
        outcomes.push(...pairs({ ...request, targets: existing }, (resource, target) => ({ ok: false, resource, target, action, changed: false, error })));
      }

    attachments.push({ changed: outcomes.some((outcome) => outcome.changed), checkMode, outcomes });
  }

  return { batch, attachments };
}

export function isChanged(report: RunReport): boolean {
  return report.batch.changed || report.attachments.some((result) => result.changed);
}

export function attachmentSteps(report: RunReport): AttachmentStep[] {
  const steps: AttachmentStep[] = [];
  for (const result of report.attachments)
    for (const outcome of result.outcomes)
      if (outcome.changed && (outcome.action === 'AttachOnly' || outcome.action === 'DetachOnly'))
        steps.push({ action: outcome.action, resource: outcome.resource, target: outcome.target });
  return steps;
}

export function failureCount(report: RunReport): number {
  const resources = report.batch.outcomes.filter((outcome) => !outcome.ok).length;
  return resources + report.attachments.reduce((count, result) => count + result.outcomes.filter((outcome) => !outcome.ok).length, 0);
}

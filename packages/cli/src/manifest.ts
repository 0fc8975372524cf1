import { ResourceIdentity, systemErrorCode, toSpecObject } from '@converge/contracts';
import { AttachmentRequest, ReconcileRequest } from '@converge/orchestrator';
import { ResourceKindRegistry } from '@converge/provider-azure';
import * as fs from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';

import { InputError } from './errors';

const resourceSchema = z
  .object({
    id: z.string().optional(),
    subscription: z.string().optional(),
    resourceGroup: z.string().optional(),
    type: z.string().optional(),
    name: z.string().optional(),
    state: z.enum(['present', 'absent']).default('present'),
    power: z.enum(['started', 'stopped']).optional(),
    tagsMode: z.enum(['append', 'replace']).optional(),
    apiVersion: z.string().optional(),
    spec: z.record(z.unknown()).default({}),
  })
  .refine((entry) => entry.id !== undefined || (entry.resourceGroup !== undefined && entry.type !== undefined && entry.name !== undefined), {
    message: 'either id or resourceGroup, type and name are required',
  });

const attachmentSchema = z.object({
  state: z.enum(['attached', 'detached']),
  resources: z.array(z.string()).min(1),
  targets: z.array(z.string()).min(1),
  apiVersion: z.string().optional(),
});

export const manifestSchema = z.object({
  resources: z.array(resourceSchema).default([]),
  attachments: z.array(attachmentSchema).default([]),
});

export type Manifest = z.infer<typeof manifestSchema>;

export type ManifestResource = Manifest['resources'][number];

export interface LoadedManifest {
  path: string;
  content: string;
  manifest: Manifest;
}

/** Requests ready for the controller. */
export interface ManifestWork {
  resources: ReconcileRequest[];
  attachments: AttachmentRequest[];
}

export function parseManifest(content: string, source = 'manifest'): Manifest {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new InputError(`${source} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = manifestSchema.safeParse(document ?? {});
  if (!parsed.success)
    throw new InputError(`${source} is invalid: ${parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')}`);

  return parsed.data;
}

export async function loadManifest(file: string): Promise<LoadedManifest> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') throw new InputError(`Manifest ${file} not found.`);
    throw error;
  }

  return { path: file, content, manifest: parseManifest(content, file) };
}

function parseId(id: string, where: string): ResourceIdentity {
  try {
    return ResourceIdentity.parse(id);
  } catch (error) {
    throw new InputError(`${where}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function identityOf(entry: ManifestResource, subscriptionId: string, where: string): ResourceIdentity {
  if (entry.id !== undefined) return parseId(entry.id, where);

  try {
    return ResourceIdentity.of(entry.subscription ?? subscriptionId, entry.resourceGroup ?? '', entry.type ?? '', entry.name ?? '');
  } catch (error) {
    throw new InputError(`${where}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** Resolves identities and descriptors. Entries without a subscription use `subscriptionId`. */
export function buildWork(manifest: Manifest, subscriptionId: string, registry: ResourceKindRegistry): ManifestWork {
  const resources = manifest.resources.map((entry, index): ReconcileRequest => {
    const identity = identityOf(entry, subscriptionId, `resources[${index}]`);
    return {
      identity,
      desired: toSpecObject(entry.spec),
      descriptor: registry.get(identity.kind),
      state: entry.state,
      power: entry.power,
      tagsMode: entry.tagsMode,
      apiVersion: entry.apiVersion,
    };
  });

  const attachments = manifest.attachments.map((entry, index): AttachmentRequest => {
    const where = `attachments[${index}]`;
    const targets = entry.targets.map((id) => parseId(id, `${where}.targets`));

    const [first] = targets;
    if (!first) throw new InputError(`${where}: at least one target is required`);
    if (targets.some((target) => target.kind.toLowerCase() !== first.kind.toLowerCase())) throw new InputError(`${where}: all targets must be of the same kind`);

    const descriptor = registry.get(first.kind);
    if (!descriptor.attachments) throw new InputError(`${where}: ${first.kind} does not support attachments`);

    return { resources: entry.resources.map((id) => parseId(id, `${where}.resources`)), targets, desired: entry.state, descriptor, apiVersion: entry.apiVersion };
  });

  return { resources, attachments };
}

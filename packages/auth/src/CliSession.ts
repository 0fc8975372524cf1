import { AuthError, systemErrorCode } from '@converge/contracts';
import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { Environment } from './types';

const subscriptionSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  tenantId: z.string().optional(),
  isDefault: z.boolean().optional(),
  environmentName: z.string().optional(),
  user: z.object({ name: z.string(), type: z.string() }).partial().optional(),
});

const profileSchema = z.object({
  subscriptions: z.array(subscriptionSchema).default([]),
});

export type CliSubscription = z.infer<typeof subscriptionSchema>;

export interface CliSession {
  subscriptions: CliSubscription[];
  defaultSubscription?: CliSubscription;
}

export function cliConfigDir(environment: Environment): string {
  return environment.AZURE_CONFIG_DIR ?? path.join(os.homedir(), '.azure');
}

/**
 * Reads the subscriptions an `az login` left in `azureProfile.json`.
 * Resolves `undefined` when nobody is logged in.
 */
export async function loadCliSession(configDir: string): Promise<CliSession | undefined> {
  const file = path.join(configDir, 'azureProfile.json');

  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') return undefined;
    throw new AuthError(`Azure CLI profile cannot be loaded - ${file}`, ['cli'], error);
  }

  let parsed: unknown;
  try {
    // The CLI writes the file with a byte order mark.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new AuthError(`Azure CLI profile cannot be loaded - ${file} is not valid JSON`, ['cli'], error);
  }

  const profile = profileSchema.safeParse(parsed);
  if (!profile.success) throw new AuthError(`Azure CLI profile cannot be loaded - ${profile.error.issues[0].message}`, ['cli']);
  if (profile.data.subscriptions.length === 0) return undefined;

  return {
    subscriptions: profile.data.subscriptions,
    defaultSubscription: profile.data.subscriptions.find((subscription) => subscription.isDefault) ?? profile.data.subscriptions[0],
  };
}

/** Case-insensitive lookup by id or display name. */
export function findCliSubscription(session: CliSession, idOrName: string): CliSubscription | undefined {
  const wanted = idOrName.toLowerCase();
  return session.subscriptions.find((subscription) => subscription.id.toLowerCase() === wanted || subscription.name?.toLowerCase() === wanted);
}

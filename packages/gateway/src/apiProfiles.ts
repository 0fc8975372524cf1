import { z } from 'zod';

import profilesJson from './api-profiles.json';

const profilesSchema = z.record(z.record(z.string().regex(/^\d{4}-\d{2}-\d{2}(-preview)?$/)));

export type ApiProfile = Readonly<Record<string, string>>;

const profiles = new Map<string, ApiProfile>();
for (const [name, versions] of Object.entries(profilesSchema.parse(profilesJson))) {
  const byKind: Record<string, string> = {};
  for (const [kind, version] of Object.entries(versions)) byKind[kind.toLowerCase()] = version;
  profiles.set(name, byKind);
}

export const DEFAULT_API_PROFILE = 'latest';

export function apiProfileNames(): string[] {
  return [...profiles.keys()];
}

/**
 * Pins API versions per resource kind. `latest` pins nothing, so versions are discovered from the provider.
 * @throws Error for an unknown profile name
 */
export function getApiProfile(name: string = DEFAULT_API_PROFILE): ApiProfile {
  const profile = profiles.get(name);
  if (!profile) throw new Error(`Unknown API profile "${name}" (known: ${apiProfileNames().join(', ')})`);
  return profile;
}

export function profileApiVersion(profile: ApiProfile, kind: string): string | undefined {
  return profile[kind.toLowerCase()];
}

import { AuthError, systemErrorCode } from '@converge/contracts';
import { parse as parseIni } from 'ini';
import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { CREDENTIAL_FIELDS, CredentialField, CredentialFields } from './types';

export const PROFILE_KEYS: Record<CredentialField, string> = {
  profile: 'profile',
  subscriptionId: 'subscription_id',
  clientId: 'client_id',
  secret: 'secret',
  tenant: 'tenant',
  adUser: 'ad_user',
  password: 'password',
  token: 'access_token',
  cloudEnvironment: 'cloud_environment',
  certValidationMode: 'cert_validation_mode',
  adfsAuthorityUrl: 'adfs_authority_url',
};

/** Read-only store of named credential profiles. */
export interface IProfileStore {
  readonly location: string;
  load(profile: string): Promise<CredentialFields | undefined>;
}

export function defaultCredentialsPath(): string {
  return path.join(os.homedir(), '.azure', 'credentials');
}

/**
 * INI file with one section per profile, e.g.
 *
 * ```ini
 * [default]
 * subscription_id=...
 * client_id=...
 * ```
 */
export class IniProfileStore implements IProfileStore {
  constructor(public readonly location: string = defaultCredentialsPath()) {}

  async load(profile: string): Promise<CredentialFields | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.location, 'utf8');
    } catch (error) {
      if (systemErrorCode(error) === 'ENOENT') return undefined;
      throw new AuthError(`Failed to access ${this.location}. Check that the file exists and you have read access.`, ['credential_file'], error);
    }

    const section: unknown = parseIni(content)[profile];
    if (typeof section !== 'object' || section === null) return undefined;

    const fields: CredentialFields = {};
    for (const field of CREDENTIAL_FIELDS) {
      const value: unknown = Reflect.get(section, PROFILE_KEYS[field]);
      if (typeof value === 'string' && value) fields[field] = value;
    }
    return fields;
  }
}

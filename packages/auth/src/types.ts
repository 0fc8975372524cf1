import type { TokenCredential } from '@azure/identity';

import { CloudEnvironment } from './CloudEnvironment';

export type AuthSource = 'auto' | 'msi' | 'cli' | 'explicit' | 'env' | 'credential_file';

export type ChainSource = Exclude<AuthSource, 'auto'>;

/** Order tried when the source is `auto`. */
export const CHAIN_ORDER: readonly ChainSource[] = ['msi', 'cli', 'explicit', 'env', 'credential_file'];

export type CertValidationMode = 'validate' | 'ignore';

export const CREDENTIAL_FIELDS = [
  'profile',
  'subscriptionId',
  'clientId',
  'secret',
  'tenant',
  'adUser',
  'password',
  'token',
  'cloudEnvironment',
  'certValidationMode',
  'adfsAuthorityUrl',
] as const;

export type CredentialField = (typeof CREDENTIAL_FIELDS)[number];

export type CredentialFields = Partial<Record<CredentialField, string>>;

export interface Credential {
  readonly source: ChainSource;
  readonly tokenCredential: TokenCredential;
  readonly subscriptionId: string;
  readonly tenantId?: string;
  readonly cloud: CloudEnvironment;
  readonly certValidationMode: CertValidationMode;
  readonly authorityHost: string;
}

export type Environment = Record<string, string | undefined>;

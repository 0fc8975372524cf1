import { ClientSecretCredential, TokenCredential, UsernamePasswordCredential } from '@azure/identity';

import { StaticTokenCredential } from './StaticTokenCredential';
import { CredentialFields } from './types';

/** Public client id of the Azure CLI, used for user/password sign-in when none is given. */
export const CLI_CLIENT_ID = '04b07795-8ddb-461a-bbee-02f9e1bf7b46';

/** Tenant used for user/password sign-in without one. */
export const COMMON_TENANT = 'common';

export type CredentialShape = 'servicePrincipal' | 'userPassword' | 'token';

export function credentialShape(fields: CredentialFields): CredentialShape | undefined {
  if (fields.clientId && fields.secret && fields.tenant) return 'servicePrincipal';
  if (fields.adUser && fields.password) return 'userPassword';
  if (fields.token) return 'token';
  return undefined;
}

export function buildTokenCredential(fields: CredentialFields, authorityHost: string): TokenCredential | undefined {
  switch (credentialShape(fields)) {
    case 'servicePrincipal':
      if (!fields.tenant || !fields.clientId || !fields.secret) return undefined;
      return new ClientSecretCredential(fields.tenant, fields.clientId, fields.secret, { authorityHost });

    case 'userPassword':
      if (!fields.adUser || !fields.password) return undefined;
      return new UsernamePasswordCredential(fields.tenant ?? COMMON_TENANT, fields.clientId ?? CLI_CLIENT_ID, fields.adUser, fields.password, { authorityHost });

    case 'token':
      return fields.token ? new StaticTokenCredential(fields.token) : undefined;

    default:
      return undefined;
  }
}

import { CREDENTIAL_FIELDS, CredentialField, CredentialFields, Environment } from './types';

export const CREDENTIAL_ENV_MAPPING: Record<CredentialField, string> = {
  profile: 'AZURE_PROFILE',
  subscriptionId: 'AZURE_SUBSCRIPTION_ID',
  clientId: 'AZURE_CLIENT_ID',
  secret: 'AZURE_SECRET',
  tenant: 'AZURE_TENANT',
  adUser: 'AZURE_AD_USER',
  password: 'AZURE_PASSWORD',
  token: 'AZURE_ACCESS_TOKEN',
  cloudEnvironment: 'AZURE_CLOUD_ENVIRONMENT',
  certValidationMode: 'AZURE_CERT_VALIDATION_MODE',
  adfsAuthorityUrl: 'AZURE_ADFS_AUTHORITY_URL',
};

export function readEnvironmentFields(environment: Environment): CredentialFields {
  const fields: CredentialFields = {};
  for (const field of CREDENTIAL_FIELDS) {
    const value = environment[CREDENTIAL_ENV_MAPPING[field]];
    if (value) fields[field] = value;
  }
  return fields;
}

/** Drops empty values so `??` chains fall through them. */
export function compactFields(fields: CredentialFields): CredentialFields {
  const result: CredentialFields = {};
  for (const field of CREDENTIAL_FIELDS) {
    const value = fields[field];
    if (value) result[field] = value;
  }
  return result;
}

export * from './CliSession';
export * from './CloudEnvironment';
export * from './CredentialChain';
export * from './environment';
export * from './ProfileStore';
export * from './StaticTokenCredential';
export * from './tokenCredentials';
export * from './types';

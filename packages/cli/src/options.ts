import { compactFields, CredentialFields } from '@converge/auth';
import { Command, Option } from 'commander';
import { z, ZodTypeAny } from 'zod';

import { InputError } from './errors';

export const connectionOptionsSchema = z.object({
  subscriptionId: z.string().optional(),
  clientId: z.string().optional(),
  secret: z.string().optional(),
  tenant: z.string().optional(),
  adUser: z.string().optional(),
  password: z.string().optional(),
  profile: z.string().optional(),
  cloudEnvironment: z.string().optional(),
  certValidationMode: z.enum(['validate', 'ignore']).optional(),
  adfsAuthorityUrl: z.string().url().optional(),
  authSource: z.enum(['auto', 'msi', 'cli', 'explicit', 'env', 'credential_file']).default('auto'),
  apiProfile: z.string().optional(),
  pollInterval: z.coerce.number().positive().optional(),
  timeout: z.coerce.number().positive().optional(),
  simulate: z.string().optional(),
  verbose: z.boolean().default(false),
});

export type ConnectionOptions = z.infer<typeof connectionOptionsSchema>;

export function addConnectionOptions(command: Command): Command {
  return command
    .option('--subscription-id <id>', 'Subscription to work in')
    .option('--client-id <id>', 'Service principal client id, or the user-assigned managed identity')
    .option('--secret <secret>', 'Service principal secret')
    .option('--tenant <tenant>', 'Tenant of the service principal or user')
    .option('--ad-user <user>', 'Active Directory user name')
    .option('--password <password>', 'Active Directory user password')
    .option('--profile <name>', 'Profile in ~/.azure/credentials')
    .option('--cloud-environment <name>', 'AzureCloud, AzureChinaCloud, AzureUSGovernment, AzureGermanCloud or a metadata URL')
    .addOption(new Option('--cert-validation-mode <mode>', 'TLS certificate validation').choices(['validate', 'ignore']))
    .option('--adfs-authority-url <url>', 'ADFS authority, instead of the cloud default')
    .addOption(new Option('--auth-source <source>', 'Where to take credentials from').choices(['auto', 'msi', 'cli', 'explicit', 'env', 'credential_file']).default('auto'))
    .option('--api-profile <name>', 'Named set of pinned API versions')
    .option('--poll-interval <seconds>', 'Seconds between operation status checks')
    .option('--timeout <seconds>', 'Seconds to wait for each operation')
    .option('--simulate <file>', 'Work against an in-memory cloud persisted to this JSON file')
    .option('--verbose', 'Print debug output');
}

/** Validates commander's parsed options. */
export function parseOptions<T extends ZodTypeAny>(schema: T, raw: unknown): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;

  throw new InputError(`Invalid options: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
}

export function credentialFields(options: ConnectionOptions): CredentialFields {
  return compactFields({
    subscriptionId: options.subscriptionId,
    clientId: options.clientId,
    secret: options.secret,
    tenant: options.tenant,
    adUser: options.adUser,
    password: options.password,
    profile: options.profile,
    cloudEnvironment: options.cloudEnvironment,
    certValidationMode: options.certValidationMode,
    adfsAuthorityUrl: options.adfsAuthorityUrl,
  });
}

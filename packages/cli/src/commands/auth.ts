import { CredentialChain } from '@converge/auth';
import chalk from 'chalk';
import { Command } from 'commander';

import { EXIT_CODES, reportFailure } from '../errors';
import { createConsoleLogger } from '../logger';
import { addConnectionOptions, connectionOptionsSchema, credentialFields, parseOptions } from '../options';

async function executeAuth(rawOptions: unknown): Promise<void> {
  const options = parseOptions(connectionOptionsSchema, rawOptions);
  if (options.simulate) {
    console.log(chalk.yellow(`Simulating against ${options.simulate}; no credentials are used.`));
    return;
  }

  const credential = await new CredentialChain({ logger: createConsoleLogger(options.verbose) }).resolve({
    explicit: credentialFields(options),
    authSource: options.authSource,
  });

  console.log(chalk.green(`Authenticated using ${credential.source} credentials.`));
  console.log(`  Subscription:    ${credential.subscriptionId}`);
  if (credential.tenantId) console.log(`  Tenant:          ${credential.tenantId}`);
  console.log(`  Cloud:           ${credential.cloud.name} (${credential.cloud.resourceManager})`);
  console.log(`  Authority:       ${credential.authorityHost}`);
  console.log(`  Certificates:    ${credential.certValidationMode}`);
}

export function createAuthCommand(): Command {
  return addConnectionOptions(new Command('auth').description('Resolve credentials and show where they came from')).action(async (rawOptions: unknown) => {
    let code: number = EXIT_CODES.success;
    try {
      await executeAuth(rawOptions);
    } catch (error) {
      code = reportFailure('Authentication failed:', error);
    }
    if (code !== EXIT_CODES.success) process.exit(code);
  });
}

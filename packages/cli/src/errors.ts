import { InvalidRequestError, ReconcileError } from '@converge/contracts';
import chalk from 'chalk';

/** Bad manifest, option or plan file; nothing was contacted yet. */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export const EXIT_CODES = {
  success: 0,
  unexpected: 1,
  invalidInput: 2,
  auth: 3,
  immutableConflict: 4,
  providerRequest: 5,
  timeout: 6,
  provisioningFailed: 7,
  partialFailure: 8,
} as const;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ReconcileError)
    switch (error.kind) {
      case 'AuthError':
        return EXIT_CODES.auth;
      case 'ImmutableFieldConflict':
        return EXIT_CODES.immutableConflict;
      case 'ProviderRequestError':
        return EXIT_CODES.providerRequest;
      case 'OperationTimeout':
        return EXIT_CODES.timeout;
      case 'ProvisioningFailed':
        return EXIT_CODES.provisioningFailed;
    }

  if (error instanceof InputError || error instanceof InvalidRequestError) return EXIT_CODES.invalidInput;
  return EXIT_CODES.unexpected;
}

/** Prints a failed command and returns its exit code. */
export function reportFailure(prefix: string, error: unknown): number {
  const message = error instanceof ReconcileError ? `${error.kind}: ${error.message}` : error instanceof Error ? error.message : String(error);
  console.error(chalk.red(prefix), message);
  if (error instanceof ReconcileError && error.identity) console.error(chalk.red(`  while ${error.action ?? 'reading'} ${error.identity.toString()}`));
  return exitCodeFor(error);
}

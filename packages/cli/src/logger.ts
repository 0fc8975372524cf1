import { ILogger } from '@converge/contracts';
import chalk from 'chalk';

export function createConsoleLogger(verbose = false): ILogger {
  return {
    debug: (message) => {
      if (verbose) console.log(chalk.gray(message));
    },
    info: (message) => console.log(chalk.blue(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
  };
}

/**
 * Terminal output helpers
 *
 * The only module that ends the process: a failed operation prints one red
 * line and exits with status 1.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import type { Logger, Result } from '@devtree/common';

export function createCliLogger(debug = Boolean(process.env.DEVTREE_DEBUG)): Logger {
  const logger: Logger = {
    debug: (message) => {
      if (debug) console.log(chalk.gray(message));
    },
    info: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(`Warning: ${message}`)),
    error: (message) => console.error(chalk.red(`Error: ${message}`)),
    child: () => logger,
  };
  return logger;
}

export function exitWithError(error: Error): never {
  console.error(chalk.red(`Error: ${error.message}`));
  process.exit(1);
}

/**
 * Data of a successful result, or exit
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) exitWithError(result.error);
  return result.data;
}

/**
 * Yes/no question on the terminal, defaulting to no
 */
export function confirm(message: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(`${message} ${chalk.gray('[y/N]')} `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

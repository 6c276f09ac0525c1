/**
 * Lock Commands
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadRuntime } from '../runtime.js';

function parseMinutes(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a whole number of minutes.');
  }
  return parseInt(value, 10);
}

export function lockCommands(): Command {
  const locks = new Command('locks')
    .description('Port lock files');

  locks
    .command('clean')
    .description('Delete stale port locks')
    .option('--max-age <minutes>', 'Age after which a lock is stale (default: config)', parseMinutes)
    .action(async (options: { maxAge?: number }) => {
      const ctx = loadRuntime();
      const maxAgeMs = options.maxAge === undefined ? undefined : options.maxAge * 60 * 1000;

      const removed = await ctx.allocator.cleanupStale(maxAgeMs);

      if (removed.length === 0) {
        console.log(chalk.gray('No stale locks.'));
        return;
      }
      console.log(chalk.green(`Removed ${removed.length} stale lock(s): offsets ${removed.join(', ')}`));
    });

  return locks;
}

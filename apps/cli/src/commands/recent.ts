/**
 * Recent Command
 */

import { basename } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { formatAge, sanitizeForDisplay, type RecentAccessEntry } from '@devtree/common';
import { loadRuntime } from '../runtime.js';

export function recentCommand(): Command {
  return new Command('recent')
    .description('Recently used worktrees, newest first')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const ctx = loadRuntime();

      const entries: RecentAccessEntry[] = [];
      for await (const entry of ctx.manager.recent()) {
        entries.push(entry);
      }

      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        console.log(chalk.yellow('No recent worktrees.'));
        return;
      }

      for (const entry of entries) {
        console.log(
          chalk.cyan(sanitizeForDisplay(`${basename(entry.projectPath)}/${entry.branch}`).padEnd(32)) +
          chalk.gray(formatAge(entry.timestamp))
        );
      }
    });
}

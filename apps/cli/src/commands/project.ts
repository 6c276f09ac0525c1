/**
 * Project Commands
 */

import { resolve } from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { expandHome } from '@devtree/common';
import { unwrap } from '../output.js';
import { loadRuntime } from '../runtime.js';

export function projectCommands(): Command {
  const project = new Command('project')
    .description('Registered projects');

  project
    .command('add [dir]')
    .description('Register a git repository root (default: current directory)')
    .action(async (dir: string | undefined) => {
      const ctx = loadRuntime();
      const registered = unwrap(await ctx.projects.add(resolve(expandHome(dir ?? process.cwd()))));

      if (registered.added) {
        console.log(chalk.green(`Registered project: ${registered.path}`));
      } else {
        console.log(chalk.yellow(`Project already registered: ${registered.path}`));
      }
    });

  project
    .command('list')
    .alias('ls')
    .description('List registered projects')
    .action(async () => {
      const ctx = loadRuntime();
      const projects = await ctx.projects.list();

      if (projects.length === 0) {
        console.log(chalk.yellow('No projects registered.'));
        return;
      }

      for (const path of projects) {
        console.log(path);
      }
    });

  return project;
}

/**
 * devtree program definition
 */

import { Command } from 'commander';
import { wrapError } from '@devtree/common';
import { exitWithError } from './output.js';
import { createCommand, deleteCommand, listCommand, openCommand } from './commands/worktree.js';
import { recentCommand } from './commands/recent.js';
import { projectCommands } from './commands/project.js';
import { lockCommands } from './commands/locks.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('devtree')
    .description('Worktree dev environments with their own port and zellij session')
    .version('0.1.0')
    .option('-p, --project <dir>', 'Project directory (default: the repository of the current directory)');

  // Register command groups
  program.addCommand(createCommand());
  program.addCommand(openCommand());
  program.addCommand(deleteCommand());
  program.addCommand(listCommand());
  program.addCommand(recentCommand());
  program.addCommand(projectCommands());
  program.addCommand(lockCommands());

  return program;
}

/**
 * Parse and run. Anything an action throws ends as one error line and exit 1.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    exitWithError(wrapError(error));
  }
}

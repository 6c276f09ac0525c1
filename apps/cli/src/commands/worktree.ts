/**
 * Worktree Commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { CancelledError, sanitizeForDisplay, type SessionState } from '@devtree/common';
import { confirm, exitWithError, unwrap } from '../output.js';
import { loadRuntime, resolveProject, type GlobalOptions } from '../runtime.js';

const sessionColor: Record<SessionState, (s: string) => string> = {
  alive: chalk.green,
  exited: chalk.yellow,
  absent: chalk.gray,
};

export function createCommand(): Command {
  return new Command('create')
    .description('Create a worktree with its own port')
    .argument('<branch>', 'Branch to check out (created from HEAD if missing)')
    .action(async (branch: string, _options: object, command: Command) => {
      const ctx = loadRuntime();
      const project = await resolveProject(ctx, command.optsWithGlobals<GlobalOptions>().project);

      const label = sanitizeForDisplay(branch);
      // setup scripts share the terminal, so the spinner only covers git
      const spinner = ora(`Checking out "${label}"...`);
      const result = await ctx.manager.create(project, branch, {
        onStep: (step) => {
          if (step === 'checkout') spinner.start();
          else spinner.succeed(`Checked out "${label}"`);
        },
      });
      if (!result.success) {
        if (spinner.isSpinning) spinner.fail(`Failed to create worktree "${label}"`);
        exitWithError(result.error);
      }

      const env = result.data;
      console.log(chalk.green(`Worktree "${label}" created`));
      console.log(chalk.gray(`  Path: ${env.path}`));
      console.log(chalk.gray(`  Port: ${env.port}`));
      console.log(chalk.gray(`  Session: ${env.sessionName}`));
    });
}

export function openCommand(): Command {
  return new Command('open')
    .description('Attach to the worktree session, creating it if needed')
    .argument('<branch>', 'Worktree branch')
    .action(async (branch: string, _options: object, command: Command) => {
      const ctx = loadRuntime();
      const project = await resolveProject(ctx, command.optsWithGlobals<GlobalOptions>().project);

      const action = unwrap(await ctx.manager.open(project, branch));
      console.log(chalk.gray(`Session ${action}`));
    });
}

export function deleteCommand(): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete a worktree and its session')
    .argument('<branch>', 'Worktree branch')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (branch: string, options: { yes?: boolean }, command: Command) => {
      const ctx = loadRuntime();
      const project = await resolveProject(ctx, command.optsWithGlobals<GlobalOptions>().project);

      const result = await ctx.manager.remove(project, branch, {
        confirm: options.yes ? undefined : confirm,
      });
      if (!result.success && result.error instanceof CancelledError) {
        console.log(chalk.yellow('Cancelled.'));
        return;
      }

      const removed = unwrap(result);
      console.log(chalk.green(`Deleted worktree "${sanitizeForDisplay(removed.branch)}"`));
      if (removed.forced) {
        console.log(chalk.gray('  git could not remove it; the directory was deleted and metadata pruned'));
      }
    });
}

export function listCommand(): Command {
  return new Command('list')
    .alias('ls')
    .description('List worktrees of the project')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }, command: Command) => {
      const ctx = loadRuntime();
      const project = await resolveProject(ctx, command.optsWithGlobals<GlobalOptions>().project);

      const worktrees = unwrap(await ctx.manager.list(project));

      if (options.json) {
        console.log(JSON.stringify(worktrees, null, 2));
        return;
      }

      if (worktrees.length === 0) {
        console.log(chalk.yellow('No worktrees found.'));
        return;
      }

      console.log(chalk.bold(`\nWorktrees (${worktrees.length}):\n`));
      for (const w of worktrees) {
        console.log(
          chalk.cyan(sanitizeForDisplay(w.branch).padEnd(24)) +
          String(w.port ?? '-').padEnd(8) +
          sessionColor[w.session](w.session.padEnd(8)) +
          chalk.gray(w.path)
        );
      }
      console.log();
    });
}

/**
 * Git Worktree adapter
 *
 * git's own worktree registry is the only record of which worktrees exist;
 * nothing here caches it.
 */

import { existsSync } from 'node:fs';
import type { WorktreeInfo } from '@devtree/common';
import { DependencyError, errnoCode } from '@devtree/common';
import { describeFailure, spawnRunner, type CommandResult, type CommandRunner } from './runner.js';

/**
 * Parse `git worktree list --porcelain`
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  let current: WorktreeInfo | undefined;

  for (const line of output.split('\n')) {
    if (line.startsWith('worktree ')) {
      if (current) worktrees.push(current);
      current = { path: line.slice(9) };
    } else if (!current) {
      continue;
    } else if (line.startsWith('branch ')) {
      current.branch = line.slice(7).replace(/^refs\/heads\//, '');
    } else if (line.startsWith('HEAD ')) {
      current.head = line.slice(5);
    } else if (line === 'bare') {
      current.bare = true;
    }
  }
  if (current) worktrees.push(current);

  return worktrees;
}

export class GitWorktrees {
  constructor(
    readonly projectPath: string,
    private readonly runner: CommandRunner = spawnRunner
  ) {}

  async list(): Promise<WorktreeInfo[]> {
    return parseWorktreeList(await this.git(['worktree', 'list', '--porcelain']));
  }

  async findByBranch(branch: string): Promise<WorktreeInfo | undefined> {
    return (await this.list()).find((worktree) => worktree.branch === branch);
  }

  /**
   * Check out `branch` at `path`, creating the branch from HEAD when it
   * does not exist yet
   */
  async add(path: string, branch: string): Promise<void> {
    const existing = await this.exec(['worktree', 'add', path, branch]);
    if (existing.code === 0) return;

    await this.git(['worktree', 'add', '-b', branch, path]);
  }

  async remove(path: string): Promise<void> {
    await this.git(['worktree', 'remove', '--force', path]);
  }

  async prune(): Promise<void> {
    await this.git(['worktree', 'prune']);
  }

  /**
   * Run git in the project, returning stdout or throwing on failure
   */
  private async git(args: string[]): Promise<string> {
    const result = await this.exec(args);
    if (result.code !== 0) {
      throw new Error(describeFailure('git', args, result));
    }
    return result.stdout;
  }

  private exec(args: string[]): Promise<CommandResult> {
    return runGit(this.runner, args, this.projectPath);
  }
}

async function runGit(runner: CommandRunner, args: string[], cwd: string): Promise<CommandResult> {
  try {
    return await runner.run('git', args, { cwd });
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') throw new DependencyError('git');
    throw error;
  }
}

/**
 * Top-level directory of the repository containing `dir`, if any
 */
export async function gitToplevel(dir: string, runner: CommandRunner = spawnRunner): Promise<string | undefined> {
  // spawn reports a missing cwd as ENOENT, same as a missing git
  if (!existsSync(dir)) return undefined;
  const result = await runGit(runner, ['rev-parse', '--show-toplevel'], dir);
  if (result.code !== 0) return undefined;
  return result.stdout.trim() || undefined;
}

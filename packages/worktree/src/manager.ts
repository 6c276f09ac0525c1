/**
 * Worktree Lifecycle Manager
 *
 * Create: validate -> git worktree add -> allocate port -> env file ->
 * shared links -> setup scripts -> record access.
 *
 * Delete: resolve via git -> safety gate -> confirm -> session teardown ->
 * git worktree remove (or prune + rm) -> reclaim port lock -> forget access.
 *
 * Once git has registered a new worktree, later failures are warnings and
 * nothing is rolled back.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, realpath, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  DevtreeConfig,
  Logger,
  RecentAccessEntry,
  Result,
  SessionAction,
  SessionState,
  WorktreeEnvironment,
  WorktreeInfo,
} from '@devtree/common';
import {
  AlreadyExistsError,
  CancelledError,
  CreationFailedError,
  DeletionFailedError,
  NotFoundError,
  UnsafeLocationError,
  ValidationError,
  branchNameSchema,
  err,
  isPathInside,
  ok,
  projectPathSchema,
  silentLogger,
  validate,
  wrapError,
} from '@devtree/common';
import type { RecentAccessStore } from '@devtree/storage';
import { readPort, writeEnvFile } from '@devtree/storage';
import type { SessionReconciler } from '@devtree/zellij';
import { resolveLayout, sessionName } from '@devtree/zellij';
import { GitWorktrees } from './git.js';
import type { PortAllocator } from './ports.js';
import type { CommandRunner } from './runner.js';
import type { SetupRunner } from './setup.js';
import { linkSharedResources } from './shared.js';

export type ManagerConfig = Pick<
  DevtreeConfig,
  | 'worktreesDirName'
  | 'envFileName'
  | 'envTemplateNames'
  | 'layoutFileName'
  | 'defaultLayoutFile'
  | 'sharedResources'
>;

export interface LifecycleDependencies {
  config: ManagerConfig;
  runner: CommandRunner;
  allocator: PortAllocator;
  reconciler: SessionReconciler;
  recent: RecentAccessStore;
  setup: SetupRunner;
  logger?: Logger;
}

/** `checkout` runs git; `configure` covers port, env file, links and setup */
export type CreateStep = 'checkout' | 'configure';

export interface CreateOptions {
  /** Called as create enters each step */
  onStep?: (step: CreateStep) => void;
}

export interface RemoveOptions {
  /** Asked before anything is destroyed; omit to skip the question */
  confirm?: (message: string) => Promise<boolean>;
}

export interface RemovedWorktree {
  projectPath: string;
  branch: string;
  path: string;
  /** Port offset whose lock was reclaimed */
  offset?: number;
  /** True when `git worktree remove` failed and the directory was deleted by hand */
  forced: boolean;
}

export interface WorktreeListing {
  branch: string;
  path: string;
  port?: number;
  sessionName: string;
  session: SessionState;
}

export class WorktreeLifecycleManager {
  private config: ManagerConfig;
  private runner: CommandRunner;
  private allocator: PortAllocator;
  private reconciler: SessionReconciler;
  private recentStore: RecentAccessStore;
  private setup: SetupRunner;
  private logger: Logger;

  constructor(deps: LifecycleDependencies) {
    this.config = deps.config;
    this.runner = deps.runner;
    this.allocator = deps.allocator;
    this.reconciler = deps.reconciler;
    this.recentStore = deps.recent;
    this.setup = deps.setup;
    this.logger = deps.logger ?? silentLogger;
  }

  worktreesRoot(projectPath: string): string {
    return join(projectPath, this.config.worktreesDirName);
  }

  worktreePath(projectPath: string, branch: string): string {
    return join(this.worktreesRoot(projectPath), branch);
  }

  // ============ Create ============

  async create(
    project: string,
    branchName: string,
    options: CreateOptions = {}
  ): Promise<Result<WorktreeEnvironment>> {
    const input = this.validateInput(project, branchName);
    if (!input.success) return input;
    const { projectPath, branch } = input.data;

    try {
      const git = new GitWorktrees(projectPath, this.runner);

      const existing = await git.findByBranch(branch);
      if (existing) {
        return err(new AlreadyExistsError(
          `Worktree for branch '${branch}' already exists at ${existing.path}`,
          { branch, path: existing.path }
        ));
      }

      const root = this.worktreesRoot(projectPath);
      const path = this.worktreePath(projectPath, branch);
      if (existsSync(path)) {
        return err(new AlreadyExistsError(`Path already exists: ${path}`, { path }));
      }

      await mkdir(root, { recursive: true });

      this.logger.info(`Creating worktree for ${branch}`);
      options.onStep?.('checkout');
      try {
        await git.add(path, branch);
      } catch (error) {
        return err(new CreationFailedError(
          `Failed to create worktree for ${branch}: ${wrapError(error).message}`,
          { branch, path }
        ));
      }
      options.onStep?.('configure');

      // git reports canonical paths
      const canonical = await realpath(path).catch(() => path);
      const registered = (await git.list())
        .some((worktree) => worktree.path === path || worktree.path === canonical);
      if (!registered) {
        return err(new CreationFailedError(`git did not register a worktree at ${path}`, { branch, path }));
      }

      const swept = await this.allocator.cleanupStale();
      if (swept.length > 0) {
        this.logger.debug(`Swept stale locks for offsets ${swept.join(', ')}`);
      }

      const envFile = join(path, this.config.envFileName);
      const allocated = await this.allocator.withAllocation(root, async (lease) => {
        await writeEnvFile(envFile, lease.port, await this.envTemplate(projectPath, path));
        return ok(lease);
      });
      if (!allocated.success) {
        this.logger.warn(`Worktree ${path} was created but has no port`);
        return allocated;
      }
      const { offset, port } = allocated.data;
      this.logger.info(`Allocated port ${port}`);

      await linkSharedResources(projectPath, path, this.config.sharedResources, this.logger);
      await this.setup.run(path, branch, projectPath);
      await this.recordAccess(projectPath, branch);

      return ok({
        projectPath,
        branch,
        path,
        offset,
        port,
        envFile,
        sessionName: sessionName(projectPath, branch),
      });
    } catch (error) {
      return err(wrapError(error));
    }
  }

  /**
   * Content of the first env template found in the worktree, then the
   * project root
   */
  private async envTemplate(projectPath: string, worktreePath: string): Promise<string> {
    for (const dir of [worktreePath, projectPath]) {
      for (const name of this.config.envTemplateNames) {
        const candidate = join(dir, name);
        if (existsSync(candidate)) {
          this.logger.debug(`Using env template ${candidate}`);
          return readFile(candidate, 'utf-8');
        }
      }
    }
    return '';
  }

  // ============ Open ============

  async open(project: string, branchName: string): Promise<Result<SessionAction>> {
    const input = this.validateInput(project, branchName);
    if (!input.success) return input;
    const { projectPath, branch } = input.data;

    try {
      const found = await this.resolve(projectPath, branch);
      if (!found.success) return found;

      const opened = this.reconciler.open({
        name: sessionName(projectPath, branch),
        cwd: found.data.path,
        layout: resolveLayout(projectPath, this.config),
      });
      if (!opened.success) return opened;

      await this.recordAccess(projectPath, branch);
      return opened;
    } catch (error) {
      return err(wrapError(error));
    }
  }

  // ============ Remove ============

  async remove(project: string, branchName: string, options: RemoveOptions = {}): Promise<Result<RemovedWorktree>> {
    const input = this.validateInput(project, branchName);
    if (!input.success) return input;
    const { projectPath, branch } = input.data;

    try {
      const found = await this.resolve(projectPath, branch);
      if (!found.success) return found;
      const { path } = found.data;

      const root = this.worktreesRoot(projectPath);
      if (!isPathInside(path, root)) {
        return err(new UnsafeLocationError(path, root));
      }

      if (options.confirm && !(await options.confirm(`Delete worktree '${branch}' at ${path}?`))) {
        return err(new CancelledError());
      }

      const port = await readPort(join(path, this.config.envFileName));
      const offset = port === undefined ? undefined : this.allocator.offsetForPort(port);

      await this.reconciler.teardown(sessionName(projectPath, branch));

      const git = new GitWorktrees(projectPath, this.runner);
      let forced = false;
      try {
        await git.remove(path);
        this.logger.info(`Removed worktree ${path}`);
      } catch (error) {
        forced = true;
        this.logger.warn(`git worktree remove failed, deleting by hand: ${wrapError(error).message}`);
        try {
          await git.prune();
        } catch (pruneError) {
          this.logger.warn(`git worktree prune failed: ${wrapError(pruneError).message}`);
        }
        try {
          await rm(path, { recursive: true, force: true });
        } catch (rmError) {
          return err(new DeletionFailedError(`Failed to delete worktree directory: ${path}`, {
            branch,
            path,
            cause: wrapError(rmError).message,
          }));
        }
      }

      if (existsSync(path)) {
        return err(new DeletionFailedError(`Failed to delete worktree directory: ${path}`, { branch, path }));
      }

      if (offset !== undefined && offset > 0 && (await this.allocator.reclaim(offset))) {
        this.logger.debug(`Reclaimed port lock for offset ${offset}`);
      }

      try {
        await this.recentStore.remove(projectPath, branch);
      } catch (error) {
        this.logger.warn(`Failed to update recent list: ${wrapError(error).message}`);
      }

      return ok({ projectPath, branch, path, offset, forced });
    } catch (error) {
      return err(wrapError(error));
    }
  }

  // ============ Queries ============

  /**
   * Worktrees under the project's worktrees directory, as git reports them
   */
  async list(project: string): Promise<Result<WorktreeListing[]>> {
    const parsed = validate(projectPathSchema, project);
    if (!parsed.success) return err(new ValidationError(parsed.error));
    const projectPath = parsed.data;

    try {
      const root = this.worktreesRoot(projectPath);
      const worktrees = (await new GitWorktrees(projectPath, this.runner).list())
        .filter((worktree): worktree is WorktreeInfo & { branch: string } =>
          worktree.branch !== undefined && isPathInside(worktree.path, root));

      const listings: WorktreeListing[] = [];
      for (const worktree of worktrees) {
        const name = sessionName(projectPath, worktree.branch);
        listings.push({
          branch: worktree.branch,
          path: worktree.path,
          port: await readPort(join(worktree.path, this.config.envFileName)),
          sessionName: name,
          session: this.reconciler.state(name),
        });
      }
      return ok(listings);
    } catch (error) {
      return err(wrapError(error));
    }
  }

  /**
   * Recently used worktrees whose project still exists, newest first
   */
  recent(): AsyncIterable<RecentAccessEntry> {
    return this.recentStore.list();
  }

  // ============ Helpers ============

  private validateInput(project: string, branch: string): Result<{ projectPath: string; branch: string }> {
    const projectPath = validate(projectPathSchema, project);
    if (!projectPath.success) return err(new ValidationError(projectPath.error));

    const branchName = validate(branchNameSchema, branch);
    if (!branchName.success) return err(new ValidationError(branchName.error));

    return ok({ projectPath: projectPath.data, branch: branchName.data });
  }

  private async resolve(projectPath: string, branch: string): Promise<Result<WorktreeInfo>> {
    const worktree = await new GitWorktrees(projectPath, this.runner).findByBranch(branch);
    if (!worktree) return err(new NotFoundError('Worktree', branch));
    return ok(worktree);
  }

  private async recordAccess(projectPath: string, branch: string): Promise<void> {
    try {
      await this.recentStore.record(projectPath, branch);
    } catch (error) {
      this.logger.warn(`Failed to update recent list: ${wrapError(error).message}`);
    }
  }
}

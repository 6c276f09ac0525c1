/**
 * @devtree/worktree - Worktree environments
 *
 * Key modules:
 * - PortAllocator / PortLock: file-locked port offsets
 * - GitWorktrees: git worktree commands
 * - WorktreeLifecycleManager: create / open / remove / list
 * - createContext: wires everything from a DevtreeConfig
 */

export { spawnRunner, describeFailure } from './runner.js';
export type { CommandRunner, CommandResult, RunOptions } from './runner.js';
export { GitWorktrees, parseWorktreeList, gitToplevel } from './git.js';
export { PortLock, lockFileName, parseLockFileName, releaseLock, removeLock } from './lock.js';
export { PortAllocator } from './ports.js';
export type { PortAllocatorConfig, PortAllocatorOptions, PortLease } from './ports.js';
export { linkSharedResource, linkSharedResources } from './shared.js';
export type { LinkOutcome } from './shared.js';
export { SetupRunner } from './setup.js';
export type { SetupOutcome } from './setup.js';
export { ProjectRegistry } from './projects.js';
export type { RegisteredProject } from './projects.js';
export { WorktreeLifecycleManager } from './manager.js';
export type {
  CreateOptions,
  CreateStep,
  LifecycleDependencies,
  ManagerConfig,
  RemoveOptions,
  RemovedWorktree,
  WorktreeListing,
} from './manager.js';
export { createContext } from './context.js';
export type { ContextOptions, DevtreeContext } from './context.js';

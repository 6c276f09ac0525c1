/**
 * Context factory
 *
 * Wires every component from one DevtreeConfig. Tests and the CLI swap in
 * their own runner, multiplexer or logger.
 */

import type { DevtreeConfig, Logger } from '@devtree/common';
import { createConsoleLogger } from '@devtree/common';
import { ProjectStore, RecentAccessStore } from '@devtree/storage';
import type { Multiplexer } from '@devtree/zellij';
import { SessionReconciler, ZellijController } from '@devtree/zellij';
import { WorktreeLifecycleManager } from './manager.js';
import { PortAllocator } from './ports.js';
import { ProjectRegistry } from './projects.js';
import { spawnRunner, type CommandRunner } from './runner.js';
import { SetupRunner } from './setup.js';

export interface ContextOptions {
  logger?: Logger;
  runner?: CommandRunner;
  multiplexer?: Multiplexer;
  /** Lock owner token, defaults to the process id */
  owner?: string;
  sleep?: (ms: number) => Promise<void>;
  /** Unix seconds for the recent list */
  now?: () => number;
}

export interface DevtreeContext {
  config: DevtreeConfig;
  logger: Logger;
  runner: CommandRunner;
  multiplexer: Multiplexer;
  allocator: PortAllocator;
  reconciler: SessionReconciler;
  recent: RecentAccessStore;
  projects: ProjectRegistry;
  setup: SetupRunner;
  manager: WorktreeLifecycleManager;
}

export function createContext(config: DevtreeConfig, options: ContextOptions = {}): DevtreeContext {
  const logger = options.logger ?? createConsoleLogger();
  const runner = options.runner ?? spawnRunner;
  const multiplexer = options.multiplexer ?? new ZellijController(config.multiplexerBinary);

  const allocator = new PortAllocator(config, { owner: options.owner, logger: logger.child('PORTS') });
  const reconciler = new SessionReconciler(multiplexer, {
    graceMs: config.sessionKillGraceMs,
    logger: logger.child('SESSION'),
    sleep: options.sleep,
  });
  const recent = new RecentAccessStore(config, { now: options.now });
  const projects = new ProjectRegistry(new ProjectStore(config), runner);
  const setup = new SetupRunner(config, runner, logger.child('SETUP'));

  const manager = new WorktreeLifecycleManager({
    config,
    runner,
    allocator,
    reconciler,
    recent,
    setup,
    logger: logger.child('WORKTREE'),
  });

  return { config, logger, runner, multiplexer, allocator, reconciler, recent, projects, setup, manager };
}

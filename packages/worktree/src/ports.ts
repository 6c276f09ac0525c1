/**
 * Port Allocator
 *
 * Offsets 1, 2, 3, ... map to basePort + offset * portStep. An offset is
 * taken when its lock file exists or when a worktree's env file already
 * records its port. The lowest free offset wins.
 */

import { mkdir, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { DevtreeConfig, Logger, Result } from '@devtree/common';
import { AllocationExhaustedError, err, errnoCode, ok, silentLogger, wrapError } from '@devtree/common';
import { readPort } from '@devtree/storage';
import { PortLock, lockFileName, parseLockFileName, releaseLock, removeLock } from './lock.js';

export type PortAllocatorConfig = Pick<
  DevtreeConfig,
  'lockDir' | 'basePort' | 'portStep' | 'maxAllocationAttempts' | 'staleLockMaxAgeMs' | 'envFileName'
>;

export interface PortAllocatorOptions {
  /** Token written into lock files, defaults to this process id */
  owner?: string;
  logger?: Logger;
  /** Milliseconds, for the stale sweep */
  now?: () => number;
}

export interface PortLease {
  offset: number;
  port: number;
  lock: PortLock;
}

export class PortAllocator {
  readonly owner: string;
  private logger: Logger;
  private now: () => number;

  constructor(
    private readonly config: PortAllocatorConfig,
    options: PortAllocatorOptions = {}
  ) {
    this.owner = options.owner ?? String(process.pid);
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  portForOffset(offset: number): number {
    return this.config.basePort + offset * this.config.portStep;
  }

  offsetForPort(port: number): number {
    return Math.trunc((port - this.config.basePort) / this.config.portStep);
  }

  /**
   * Offsets recorded in the env files of worktrees directly under `root`
   */
  async scanInUse(root: string): Promise<Set<number>> {
    const inUse = new Set<number>();

    const entries = await readdir(root, { withFileTypes: true }).catch((error: unknown) => {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return [];
      throw error;
    });

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const port = await readPort(join(root, entry.name, this.config.envFileName));
      if (port !== undefined) inUse.add(this.offsetForPort(port));
    }

    return inUse;
  }

  /**
   * Reserve the lowest free offset. The returned lease's lock stays on disk
   * after this call; it is the reservation.
   */
  async allocate(root: string): Promise<Result<PortLease>> {
    try {
      const inUse = await this.scanInUse(root);
      await mkdir(this.config.lockDir, { recursive: true });

      for (let offset = 1; offset <= this.config.maxAllocationAttempts; offset++) {
        const lock = await PortLock.acquire(this.config.lockDir, offset, this.owner);
        if (!lock) {
          this.logger.debug(`Offset ${offset} is locked`);
          continue;
        }

        if (inUse.has(offset)) {
          // a worktree records this port but its lock is gone
          this.logger.debug(`Offset ${offset} is recorded by an existing worktree`);
          await lock.release();
          continue;
        }

        const port = this.portForOffset(offset);
        this.logger.debug(`Allocated offset ${offset} (port ${port})`);
        return ok({ offset, port, lock });
      }

      return err(new AllocationExhaustedError(this.config.maxAllocationAttempts));
    } catch (error) {
      return err(wrapError(error));
    }
  }

  /**
   * Allocate, then run `use`. The lock is released when `use` fails or
   * throws, and kept when it succeeds.
   */
  async withAllocation<T>(
    root: string,
    use: (lease: PortLease) => Promise<Result<T>>
  ): Promise<Result<T>> {
    const allocated = await this.allocate(root);
    if (!allocated.success) return allocated;

    const lease = allocated.data;
    let result: Result<T>;
    try {
      result = await use(lease);
    } catch (error) {
      result = err(wrapError(error));
    }

    if (!result.success) {
      await lease.lock.release();
    }
    return result;
  }

  lockPath(offset: number): string {
    return join(this.config.lockDir, lockFileName(offset));
  }

  /**
   * Delete the lock for `offset` if this allocator's owner holds it
   */
  release(offset: number): Promise<boolean> {
    return releaseLock(this.lockPath(offset), this.owner);
  }

  /**
   * Delete the lock for `offset` whoever holds it. Used once the worktree
   * that owned the reservation is gone.
   */
  reclaim(offset: number): Promise<boolean> {
    return removeLock(this.lockPath(offset));
  }

  /**
   * Delete lock files older than `maxAgeMs`, returning the offsets freed
   */
  async cleanupStale(maxAgeMs: number = this.config.staleLockMaxAgeMs): Promise<number[]> {
    let names: string[];
    try {
      names = await readdir(this.config.lockDir);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return [];
      throw error;
    }

    const cutoff = this.now() - maxAgeMs;
    const removed: number[] = [];

    for (const name of names.sort()) {
      const offset = parseLockFileName(name);
      if (offset === undefined) continue;

      const path = join(this.config.lockDir, name);
      let mtimeMs: number;
      try {
        mtimeMs = (await stat(path)).mtimeMs;
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') continue;
        throw error;
      }

      if (mtimeMs < cutoff && (await removeLock(path))) {
        this.logger.info(`Removed stale lock ${name}`);
        removed.push(offset);
      }
    }

    return removed.sort((a, b) => a - b);
  }
}

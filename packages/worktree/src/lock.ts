/**
 * Port lock files
 *
 * `port_<offset>.lock` in the lock directory. Exclusive creation is the
 * reservation; the content is the owner token (a pid) so a process only
 * ever releases its own lock. A lock held by a live worktree is never
 * released, only reclaimed when the worktree is deleted.
 */

import { open, readFile, unlink, type FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import { errnoCode } from '@devtree/common';

const LOCK_FILE_PATTERN = /^port_(\d+)\.lock$/;

export function lockFileName(offset: number): string {
  return `port_${offset}.lock`;
}

/**
 * Offset encoded in a lock file name, if it is one
 */
export function parseLockFileName(name: string): number | undefined {
  const match = LOCK_FILE_PATTERN.exec(name);
  return match?.[1] === undefined ? undefined : parseInt(match[1], 10);
}

async function unlinkIfPresent(path: string): Promise<boolean> {
  try {
    await unlink(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

export class PortLock {
  private released = false;

  private constructor(
    readonly offset: number,
    readonly path: string,
    readonly owner: string
  ) {}

  /**
   * Create the lock file exclusively. Resolves undefined when another
   * process already holds the offset.
   */
  static async acquire(lockDir: string, offset: number, owner: string): Promise<PortLock | undefined> {
    const path = join(lockDir, lockFileName(offset));
    let handle: FileHandle;
    try {
      handle = await open(path, 'wx');
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') return undefined;
      throw error;
    }

    try {
      await handle.writeFile(owner);
    } catch (error) {
      await handle.close();
      await unlinkIfPresent(path);
      throw error;
    }
    await handle.close();

    return new PortLock(offset, path, owner);
  }

  /**
   * Delete the lock file if this owner still holds it. Safe to call twice.
   */
  async release(): Promise<boolean> {
    if (this.released) return false;
    this.released = true;
    return releaseLock(this.path, this.owner);
  }
}

/**
 * Delete `path` only when its recorded owner is `owner`
 */
export async function releaseLock(path: string, owner: string): Promise<boolean> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }

  if (content.trim() !== owner) return false;
  return unlinkIfPresent(path);
}

/**
 * Delete a lock file whoever holds it
 */
export function removeLock(path: string): Promise<boolean> {
  return unlinkIfPresent(path);
}

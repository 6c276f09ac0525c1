/**
 * Shared resources
 *
 * Project files that every worktree should see (credentials, local
 * databases, node_modules caches) are symlinked rather than copied.
 */

import { lstat, mkdir, realpath, symlink, unlink } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { Logger } from '@devtree/common';
import { errnoCode, silentLogger } from '@devtree/common';

export interface LinkOutcome {
  resource: string;
  target: string;
  linked: boolean;
  reason?: string;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Link `<projectPath>/<resource>` to `<worktreePath>/<resource>`. An
 * existing file or link at the target is replaced; a real directory is
 * left alone.
 */
export async function linkSharedResource(
  projectPath: string,
  worktreePath: string,
  resource: string,
  logger: Logger = silentLogger
): Promise<LinkOutcome> {
  const source = resolve(projectPath, resource);
  const target = join(worktreePath, resource);

  if (!(await pathExists(source))) {
    logger.warn(`${resource} not found: ${source} - skipping`);
    return { resource, target, linked: false, reason: 'missing source' };
  }

  await mkdir(dirname(target), { recursive: true });

  const existing = await lstat(target).catch((error: unknown) => {
    if (errnoCode(error) === 'ENOENT') return undefined;
    throw error;
  });
  if (existing?.isDirectory()) {
    logger.warn(`${resource} is a directory in the worktree - skipping`);
    return { resource, target, linked: false, reason: 'target is a directory' };
  }
  if (existing) await unlink(target);

  await symlink(await realpath(source), target);
  logger.info(`Linked ${resource}`);
  return { resource, target, linked: true };
}

export async function linkSharedResources(
  projectPath: string,
  worktreePath: string,
  resources: readonly string[],
  logger: Logger = silentLogger
): Promise<LinkOutcome[]> {
  const outcomes: LinkOutcome[] = [];
  for (const resource of resources) {
    try {
      outcomes.push(await linkSharedResource(projectPath, worktreePath, resource, logger));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to link ${resource}: ${message}`);
      outcomes.push({ resource, target: join(worktreePath, resource), linked: false, reason: message });
    }
  }
  return outcomes;
}

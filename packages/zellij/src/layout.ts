/**
 * Layout resolution
 *
 * Layouts are static KDL files; this only decides which one a new session
 * starts with.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { DevtreeConfig } from '@devtree/common';

export function projectLayoutPath(
  projectPath: string,
  config: Pick<DevtreeConfig, 'worktreesDirName' | 'layoutFileName'>
): string {
  return join(projectPath, config.worktreesDirName, config.layoutFileName);
}

/**
 * The project's own layout, else the configured default, else none
 */
export function resolveLayout(
  projectPath: string,
  config: Pick<DevtreeConfig, 'worktreesDirName' | 'layoutFileName' | 'defaultLayoutFile'>
): string | undefined {
  const projectLayout = projectLayoutPath(projectPath, config);
  if (existsSync(projectLayout)) return projectLayout;
  if (existsSync(config.defaultLayoutFile)) return config.defaultLayoutFile;
  return undefined;
}

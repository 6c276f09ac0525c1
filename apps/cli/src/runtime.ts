/**
 * Per-invocation wiring: config, context and the target project
 */

import { resolve } from 'node:path';
import { ValidationError, expandHome, loadConfig } from '@devtree/common';
import { createContext, gitToplevel, type DevtreeContext } from '@devtree/worktree';
import { createCliLogger, exitWithError } from './output.js';

export type GlobalOptions = {
  project?: string;
};

export function loadRuntime(): DevtreeContext {
  const config = loadConfig();
  if (!config.success) exitWithError(config.error);

  return createContext(config.data, { logger: createCliLogger() });
}

/**
 * Repository root of `dir`, or of the current directory
 */
export async function resolveProject(ctx: DevtreeContext, dir?: string): Promise<string> {
  const start = resolve(expandHome(dir ?? process.cwd()));
  const root = await gitToplevel(start, ctx.runner);
  if (root === undefined) {
    exitWithError(new ValidationError(`Not a git repository: ${start}`));
  }
  return root;
}

/**
 * Project registration
 */

import { existsSync, realpathSync } from 'node:fs';
import type { Result } from '@devtree/common';
import { ValidationError, err, ok, projectPathSchema, validate, wrapError } from '@devtree/common';
import type { ProjectStore } from '@devtree/storage';
import { gitToplevel } from './git.js';
import type { CommandRunner } from './runner.js';

export interface RegisteredProject {
  path: string;
  /** False when the project was already listed */
  added: boolean;
}

export class ProjectRegistry {
  constructor(
    private readonly store: ProjectStore,
    private readonly runner: CommandRunner
  ) {}

  /**
   * Register a git repository root. Subdirectories of a repository are
   * rejected rather than silently widened to the root.
   */
  async add(dir: string): Promise<Result<RegisteredProject>> {
    const parsed = validate(projectPathSchema, dir);
    if (!parsed.success) return err(new ValidationError(parsed.error));
    const path = parsed.data;

    try {
      if (!existsSync(path)) {
        return err(new ValidationError(`Directory does not exist: ${path}`));
      }
      const toplevel = await gitToplevel(path, this.runner);
      if (toplevel === undefined) {
        return err(new ValidationError(`Not a git repository: ${path}`));
      }
      if (toplevel !== path && toplevel !== realpathSync(path)) {
        return err(new ValidationError(`Not a repository root: ${path} (root is ${toplevel})`));
      }

      const added = await this.store.add(path);
      return ok({ path, added });
    } catch (error) {
      return err(wrapError(error));
    }
  }

  /**
   * Registered projects whose directory still exists
   */
  async list(): Promise<string[]> {
    return (await this.store.list()).filter((path) => existsSync(path));
  }
}

/**
 * Setup collaborators
 *
 * Every executable in the setup directory runs once per new worktree as
 * `<script> <worktreeDir> <branch> <projectDir>`, in file-name order. A
 * failing script is reported, never fatal.
 */

import { access, constants, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { DevtreeConfig, Logger } from '@devtree/common';
import { errnoCode, silentLogger } from '@devtree/common';
import { spawnRunner, type CommandRunner } from './runner.js';

export interface SetupOutcome {
  script: string;
  /** Exit status; null when killed or never started */
  code: number | null;
  ok: boolean;
  error?: string;
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class SetupRunner {
  private logger: Logger;

  constructor(
    private readonly config: Pick<DevtreeConfig, 'setupDir'>,
    private readonly runner: CommandRunner = spawnRunner,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  /**
   * Executable files in the setup directory, sorted by name
   */
  async scripts(): Promise<string[]> {
    const entries = await readdir(this.config.setupDir, { withFileTypes: true }).catch((error: unknown) => {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return [];
      throw error;
    });

    const scripts: string[] = [];
    for (const entry of entries) {
      if (!entry.isFile() && !entry.isSymbolicLink()) continue;
      const path = join(this.config.setupDir, entry.name);
      if (await isExecutable(path)) scripts.push(path);
    }
    return scripts.sort();
  }

  async run(worktreeDir: string, branch: string, projectDir: string): Promise<SetupOutcome[]> {
    const outcomes: SetupOutcome[] = [];

    for (const script of await this.scripts()) {
      this.logger.info(`Running setup: ${script}`);
      try {
        const result = await this.runner.run(script, [worktreeDir, branch, projectDir], {
          cwd: worktreeDir,
          inherit: true,
        });
        const ok = result.code === 0;
        if (!ok) {
          this.logger.warn(`Setup ${script} exited with status ${result.code ?? 'unknown'}`);
        }
        outcomes.push({ script, code: result.code, ok });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Setup ${script} could not be started: ${message}`);
        outcomes.push({ script, code: null, ok: false, error: message });
      }
    }

    return outcomes;
  }
}

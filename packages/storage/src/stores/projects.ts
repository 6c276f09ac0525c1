/**
 * Project Store
 *
 * Registered project roots, one absolute path per line. Append-only; stale
 * entries are skipped by readers, never purged.
 */

import type { DevtreeConfig } from '@devtree/common';
import { LineStore, type LineCodec } from '../line-store.js';

const projectPathCodec: LineCodec<string> = {
  parse: (line) => line.trim() || undefined,
  format: (path) => path,
};

export class ProjectStore {
  private store: LineStore<string>;

  constructor(config: Pick<DevtreeConfig, 'projectsFile'>) {
    this.store = new LineStore(config.projectsFile, projectPathCodec);
  }

  list(): Promise<string[]> {
    return this.store.read();
  }

  async has(projectPath: string): Promise<boolean> {
    return (await this.list()).includes(projectPath);
  }

  /**
   * Register a project. Returns false if it was already listed.
   */
  async add(projectPath: string): Promise<boolean> {
    if (await this.has(projectPath)) return false;
    await this.store.append(projectPath);
    return true;
  }
}

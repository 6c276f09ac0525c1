/**
 * Recent Access Store
 *
 * The N most recently used (project, branch) pairs, newest first, one
 * `timestamp|project_path|branch` line each.
 */

import { stat } from 'node:fs/promises';
import type { DevtreeConfig, RecentAccessEntry } from '@devtree/common';
import { errnoCode, nowSeconds, recentAccessEntrySchema } from '@devtree/common';
import { LineStore, type LineCodec } from '../line-store.js';

export const recentEntryCodec: LineCodec<RecentAccessEntry> = {
  parse(line) {
    // project paths may contain '|', timestamps and branch names do not
    const first = line.indexOf('|');
    const last = line.lastIndexOf('|');
    if (first <= 0 || last === first) return undefined;

    const timestamp = line.slice(0, first);
    if (!/^\d+$/.test(timestamp)) return undefined;

    const parsed = recentAccessEntrySchema.safeParse({
      timestamp: parseInt(timestamp, 10),
      projectPath: line.slice(first + 1, last),
      branch: line.slice(last + 1).trim(),
    });
    return parsed.success ? parsed.data : undefined;
  },
  format(entry) {
    return `${entry.timestamp}|${entry.projectPath}|${entry.branch}`;
  },
};

export interface RecentAccessStoreOptions {
  /** Unix seconds */
  now?: () => number;
  /** Read-time filter, defaults to "is an existing directory" */
  projectExists?: (projectPath: string) => Promise<boolean>;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') return false;
    throw error;
  }
}

function sameEntry(entry: RecentAccessEntry, projectPath: string, branch: string): boolean {
  return entry.projectPath === projectPath && entry.branch === branch;
}

function byNewest(a: RecentAccessEntry, b: RecentAccessEntry): number {
  return b.timestamp - a.timestamp;
}

export class RecentAccessStore {
  private store: LineStore<RecentAccessEntry>;
  private limit: number;
  private now: () => number;
  private projectExists: (projectPath: string) => Promise<boolean>;

  constructor(config: Pick<DevtreeConfig, 'recentFile' | 'recentLimit'>, options: RecentAccessStoreOptions = {}) {
    this.store = new LineStore(config.recentFile, recentEntryCodec);
    this.limit = config.recentLimit;
    this.now = options.now ?? nowSeconds;
    this.projectExists = options.projectExists ?? isDirectory;
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * Move (project, branch) to the front, evicting beyond the limit
   */
  async record(projectPath: string, branch: string): Promise<RecentAccessEntry[]> {
    const entry: RecentAccessEntry = { timestamp: this.now(), projectPath, branch };

    return this.store.replace((entries) =>
      // the new entry goes first so the stable sort keeps it ahead of
      // entries stamped in the same second
      [entry, ...entries.filter((e) => !sameEntry(e, projectPath, branch))]
        .sort(byNewest)
        .slice(0, this.limit)
    );
  }

  /**
   * Drop (project, branch). No-op when the store does not exist yet.
   */
  async remove(projectPath: string, branch: string): Promise<void> {
    if (!(await this.store.exists())) return;
    await this.store.replace((entries) => entries.filter((e) => !sameEntry(e, projectPath, branch)));
  }

  /**
   * Stored entries, newest first, unfiltered
   */
  async entries(): Promise<RecentAccessEntry[]> {
    return (await this.store.read()).sort(byNewest);
  }

  /**
   * Entries whose project still exists, newest first. Re-read on every call.
   */
  async *list(): AsyncGenerator<RecentAccessEntry> {
    for (const entry of await this.entries()) {
      if (await this.projectExists(entry.projectPath)) {
        yield entry;
      }
    }
  }
}

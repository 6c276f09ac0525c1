/**
 * Line Store
 *
 * Typed repository over a plain-text file holding one record per line.
 * Parsing stays behind a codec; every rewrite goes through writeFileAtomic.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StorageError, errnoCode } from '@devtree/common';
import { writeFileAtomic } from './atomic-write.js';

export interface LineCodec<T> {
  /** Returns undefined for lines that are not a valid record */
  parse(line: string): T | undefined;
  format(record: T): string;
}

export class LineStore<T> {
  constructor(
    readonly path: string,
    private readonly codec: LineCodec<T>
  ) {}

  /**
   * Read every valid record. A missing file reads as empty.
   */
  async read(): Promise<T[]> {
    const content = await this.readRaw();
    if (content === undefined) return [];

    const records: T[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      const record = this.codec.parse(line);
      if (record !== undefined) records.push(record);
    }
    return records;
  }

  async exists(): Promise<boolean> {
    return (await this.readRaw()) !== undefined;
  }

  /**
   * Read-modify-write with an atomic replace. Concurrent writers do not
   * corrupt the file; the last rename wins.
   */
  async replace(mutate: (records: T[]) => T[]): Promise<T[]> {
    const next = mutate(await this.read());
    const body = next.map((record) => this.codec.format(record)).join('\n');
    try {
      await writeFileAtomic(this.path, next.length > 0 ? `${body}\n` : '');
    } catch (error) {
      throw new StorageError(`Failed to write ${this.path}`, { cause: errnoCode(error) ?? String(error) });
    }
    return next;
  }

  /**
   * Append one record in place. Only for append-only files.
   */
  async append(record: T): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await appendFile(this.path, `${this.codec.format(record)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError(`Failed to append to ${this.path}`, { cause: errnoCode(error) ?? String(error) });
    }
  }

  private async readRaw(): Promise<string | undefined> {
    try {
      return await readFile(this.path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return undefined;
      throw new StorageError(`Failed to read ${this.path}`, { cause: errnoCode(error) ?? String(error) });
    }
  }
}

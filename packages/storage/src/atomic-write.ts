/**
 * Atomic file writes
 *
 * Data goes to a temporary file beside the target, is fsynced, then renamed
 * over the target. Readers see either the old file or the new one, never a
 * partial write. The rename is the commit point.
 */

import { randomBytes } from 'node:crypto';
import { basename, dirname, join } from 'node:path';
import { mkdir, open, rename, unlink, type FileHandle } from 'node:fs/promises';

const DEFAULT_MODE = 0o644;

export function tempPathFor(filePath: string): string {
  const suffix = `${process.pid}.${Date.now()}.${randomBytes(4).toString('hex')}`;
  return join(dirname(filePath), `.${basename(filePath)}.${suffix}.tmp`);
}

/**
 * Atomically replace `filePath` with `content`
 */
export async function writeFileAtomic(
  filePath: string,
  content: string,
  mode: number = DEFAULT_MODE
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tempPath = tempPathFor(filePath);

  let handle: FileHandle | null = null;
  try {
    handle = await open(tempPath, 'w', mode);
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
    await handle.close();
    handle = null;

    await rename(tempPath, filePath);
  } catch (error) {
    if (handle) {
      await handle.close().catch(() => undefined);
    }
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Crash-safe file writes for the inventory cache.
 *
 * Pattern: write temp file in the target directory → fsync → rename.
 * A reader either sees the previous file or the complete new one.
 */

import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Atomically replace `filePath` with `content`.
 *
 * @param filePath - Target file path
 * @param content - UTF-8 content
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await fs.mkdir(dir, { recursive: true });

  let handle: fs.FileHandle | null = null;
  try {
    handle = await fs.open(tmp, 'w', 0o600);
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
    await handle.close();
    handle = null;

    await fs.rename(tmp, filePath);
  } catch (error) {
    if (handle) {
      await handle.close().catch(() => undefined);
    }
    await fs.rm(tmp, { force: true });
    throw error;
  }
}

/**
 * Remove a file, succeeding when it is already gone.
 *
 * @param filePath - File to remove
 */
export async function removeIfExists(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}

/**
 * Returns the file's modification time in milliseconds, or null when it does not exist.
 *
 * @param filePath - File to inspect
 */
export async function modifiedAt(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mtimeMs;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Whether an fs error means the path does not exist (ENOENT, or ENOTDIR
 * when a parent is a file).
 */
export function isNotFound(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Atomic file writes
 *
 * Data goes to a hidden temp file beside the target and is renamed over it,
 * so a reader sees the old content or the new content, never a partial file.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * @example
 * ```typescript
 * await atomicWriteFile('data/output/enriched-incidents.ndjson', serializeEnrichedIncidents(records));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const directory = dirname(filePath);
  await mkdir(directory, { recursive: true });

  // same directory keeps the rename on one filesystem
  const tempPath = join(directory, `.${basename(filePath)}.${randomUUID()}.tmp`);

  try {
    await writeFile(tempPath, data, { encoding, flag: 'wx' });
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

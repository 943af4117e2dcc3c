/**
 * atomicFile.ts — Whole-file replacement that readers never see half-written.
 *
 * Writes go to a sibling temp file first and are then renamed over the target.
 * `rename` within one directory is atomic on POSIX filesystems, so a reader
 * observes either the previous content or the new content.
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';

export async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.${Date.now()}.tmp`;
  try {
    await writeFile(tmp, data);
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

/** Delete a file if it exists. */
export async function removeFile(path: string): Promise<void> {
  await rm(path, { force: true });
}

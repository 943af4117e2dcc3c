/**
 * sentMarkerStore.ts — The "last successful send" date.
 *
 * The marker is the only thing that stops the courier from sending the same
 * list twice in an evening, so its contract is narrow:
 *   • read once per scheduler tick;
 *   • overwritten (atomically) only after a pass with at least one success;
 *   • a missing or unreadable file means "never sent".
 *
 * On disk it is a single line holding a `yyyy-MM-dd` date.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type { IsoDate } from '../core/types';
import { Logger } from '../core/logger';
import { writeFileAtomic } from './atomicFile';

const logger = new Logger('SentMarkerStore');

export const SENT_MARKER_FILE = 'last-sent.txt';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export interface SentMarkerStore {
  /** The date of the last successful send, or `null` if there was none. */
  read(): Promise<IsoDate | null>;
  /** Replace the marker with `date`. */
  write(date: IsoDate): Promise<void>;
}

export class FileSentMarkerStore implements SentMarkerStore {
  readonly path: string;

  constructor(cacheDir: string) {
    this.path = join(cacheDir, SENT_MARKER_FILE);
  }

  async read(): Promise<IsoDate | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      logger.warn(`Could not read ${this.path} — treating as never sent`);
      return null;
    }

    const value = raw.trim();
    if (!ISO_DATE.test(value)) {
      logger.warn(`Ignoring malformed sent marker "${value.slice(0, 40)}" in ${this.path}`);
      return null;
    }
    return value;
  }

  async write(date: IsoDate): Promise<void> {
    if (!ISO_DATE.test(date)) {
      throw new Error(`SentMarkerStore: refusing to write malformed date "${date}"`);
    }
    await writeFileAtomic(this.path, `${date}\n`);
    logger.info(`Recorded successful send for ${date}`);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

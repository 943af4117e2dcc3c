/**
 * sessionManager.ts — Persistence of the Session Channel's login.
 *
 * Linking WhatsApp Web needs a human to scan a QR code, so losing the login
 * is expensive.  This module keeps it across runs:
 *
 *   1. **SessionStore** — load / save / discard the serialised session file,
 *      with a TTL so a months-old blob is not replayed blindly.
 *   2. **restoreSession** — seed cookies and local storage into a fresh page
 *      before the app boots.
 *   3. **captureSession** — read cookies and local storage back out after a
 *      successful pairing.
 *
 * The file is owned by the Session Channel alone; it is written atomically and
 * removed as soon as the channel sees a logged-out screen.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type { Page } from 'puppeteer-core';
import type { StoredCookie, StoredSession } from '../core/types';
import { writeFileAtomic, removeFile } from '../services/atomicFile';
import { Logger } from '../core/logger';

const logger = new Logger('SessionManager');

export const SESSION_FILE = 'session.json';

const SESSION_ORIGIN_HOST = 'web.whatsapp.com';

// ─── Session file ───────────────────────────────────────────

export interface SessionStore {
  load(): Promise<StoredSession | null>;
  save(session: StoredSession): Promise<void>;
  clear(): Promise<void>;
}

export class FileSessionStore implements SessionStore {
  readonly path: string;

  constructor(
    cacheDir: string,
    private readonly ttlHours: number,
    private readonly now: () => number = Date.now,
  ) {
    this.path = join(cacheDir, SESSION_FILE);
  }

  /**
   * @returns The saved session, or `null` when none exists, it is corrupt, or
   *   it is older than the TTL.
   */
  async load(): Promise<StoredSession | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logger.warn(`Session file ${this.path} is not valid JSON — discarding`);
      await this.clear();
      return null;
    }

    if (!isStoredSession(parsed)) {
      logger.warn(`Session file ${this.path} has an unexpected shape — discarding`);
      await this.clear();
      return null;
    }

    const ageHours = (this.now() - parsed.savedAt) / (1000 * 60 * 60);
    if (ageHours > this.ttlHours) {
      logger.info(
        `Saved session is ${ageHours.toFixed(1)}h old (TTL: ${this.ttlHours}h) — discarding`,
      );
      await this.clear();
      return null;
    }

    logger.info(
      `Loaded saved session (${parsed.cookies.length} cookies, ` +
        `${Object.keys(parsed.localStorage).length} storage keys, ${ageHours.toFixed(1)}h old)`,
    );
    return parsed;
  }

  async save(session: StoredSession): Promise<void> {
    await writeFileAtomic(this.path, JSON.stringify(session, null, 2));
    logger.info(`Saved session with ${session.cookies.length} cookies to ${this.path}`);
  }

  async clear(): Promise<void> {
    await removeFile(this.path);
  }
}

export function isStoredSession(value: unknown): value is StoredSession {
  if (typeof value !== 'object' || value === null) return false;
  if (!('savedAt' in value) || typeof value.savedAt !== 'number') return false;
  if (!('cookies' in value) || !Array.isArray(value.cookies)) return false;
  if (!('localStorage' in value)) return false;

  const storage = value.localStorage;
  if (typeof storage !== 'object' || storage === null || Array.isArray(storage)) return false;
  if (!Object.values(storage).every((entry) => typeof entry === 'string')) return false;

  return value.cookies.every(
    (cookie: unknown) =>
      typeof cookie === 'object' &&
      cookie !== null &&
      'name' in cookie &&
      typeof cookie.name === 'string' &&
      'value' in cookie &&
      typeof cookie.value === 'string',
  );
}

// ─── Browser side ───────────────────────────────────────────

/**
 * Seed a page with a saved session.  Must run before the first navigation so
 * the app boots already logged in.
 */
export async function restoreSession(page: Page, session: StoredSession): Promise<void> {
  if (session.cookies.length > 0) {
    await page.setCookie(...session.cookies);
  }

  // Local storage can only be written from inside the origin, so the entries
  // are injected by a script that runs before any page script.  It only fills
  // an empty store, leaving values the app wrote itself untouched on reloads.
  await page.evaluateOnNewDocument(
    (host: string, entries: Record<string, string>) => {
      if (window.location.hostname !== host || window.localStorage.length > 0) return;
      for (const [key, value] of Object.entries(entries)) {
        window.localStorage.setItem(key, value);
      }
    },
    SESSION_ORIGIN_HOST,
    session.localStorage,
  );

  logger.info(`Restored ${session.cookies.length} cookies into the session page`);
}

/** Read cookies and local storage from a logged-in page. */
export async function captureSession(page: Page): Promise<StoredSession> {
  const cookies: StoredCookie[] = (await page.cookies()).map((cookie) => ({
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  }));

  const localStorage = await page.evaluate(() => {
    const entries: Record<string, string> = {};
    for (let i = 0; i < window.localStorage.length; i++) {
      const key = window.localStorage.key(i);
      if (key !== null) {
        entries[key] = window.localStorage.getItem(key) ?? '';
      }
    }
    return entries;
  });

  return { savedAt: Date.now(), cookies, localStorage };
}

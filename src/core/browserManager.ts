/**
 * browserManager.ts — Singleton manager for the shared headless Chromium.
 *
 * One browser process serves both the snapshot provider (short-lived incognito
 * pages) and the Session Channel (one long-lived page per dispatch pass).
 * Launching Chromium costs seconds and hundreds of MB, so it happens lazily on
 * first use and the process is reused until `close()`.
 *
 * The browser binary is not bundled: puppeteer-core drives either the path in
 * CHROME_EXECUTABLE_PATH or the locally installed stable Chrome.  The stealth
 * plugin is registered on top because WhatsApp Web refuses obviously
 * automated browsers.
 */

import vanillaPuppeteer from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page } from 'puppeteer-core';
import type { QualityProfile } from './types';
import { Logger } from './logger';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first `launch()`.
const puppeteer = addExtra(vanillaPuppeteer);
puppeteer.use(StealthPlugin());

const ACCEPT_LANGUAGE = 'en-IN,en;q=0.9';

export interface BrowserOptions {
  /** Explicit Chrome/Chromium binary.  Falls back to the installed Chrome. */
  executablePath?: string;
  /**
   * Persistent profile directory.  Used by the Session Channel so the linked
   * device survives restarts even when local storage is not enough.
   */
  userDataDir?: string;
  headless?: boolean;
}

/** A page handed out for longer than one callback.  `release()` disposes it. */
export interface BorrowedPage {
  page: Page;
  release(): Promise<void>;
}

export class BrowserManager {
  // ── Singleton plumbing ─────────────────────────────────

  private static instance: BrowserManager | null = null;
  private browser: Browser | null = null;
  private options: BrowserOptions = {};

  private constructor() {}

  static getInstance(): BrowserManager {
    if (!BrowserManager.instance) {
      BrowserManager.instance = new BrowserManager();
    }
    return BrowserManager.instance;
  }

  /**
   * Set launch options.  Takes effect on the next launch, so call it before
   * the first page is requested.
   */
  configure(options: BrowserOptions): void {
    this.options = { ...this.options, ...options };
  }

  // ── Core API ───────────────────────────────────────────

  /**
   * Run `fn` with a fresh incognito page sized to `profile`, then dispose the
   * context whatever happens.
   */
  async withPage<T>(profile: QualityProfile, fn: (page: Page) => Promise<T>): Promise<T> {
    const browser = await this.ensureBrowser();
    const context: BrowserContext = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      await page.setViewport({
        width: profile.width,
        height: profile.height,
        deviceScaleFactor: profile.deviceScaleFactor,
      });
      await page.setExtraHTTPHeaders({ 'accept-language': ACCEPT_LANGUAGE });
      return await fn(page);
    } finally {
      await context.close().catch((err: unknown) => {
        logger.warn(`Could not close browser context: ${describe(err)}`);
      });
    }
  }

  /**
   * Hand out a page in the browser's default (non-incognito) context, so that
   * it shares the persistent profile.  The caller must `release()` it.
   */
  async borrowPage(): Promise<BorrowedPage> {
    const browser = await this.ensureBrowser();
    const page = await browser.defaultBrowserContext().newPage();
    await page.setViewport({ width: 1366, height: 900 });
    await page.setExtraHTTPHeaders({ 'accept-language': ACCEPT_LANGUAGE });

    return {
      page,
      release: async () => {
        await page.close().catch((err: unknown) => {
          logger.warn(`Could not close borrowed page: ${describe(err)}`);
        });
      },
    };
  }

  /** Gracefully shut down the browser. */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (browser) {
      await browser.close().catch((err: unknown) => {
        logger.warn(`Browser did not close cleanly: ${describe(err)}`);
      });
      logger.info('Browser closed');
    }
  }

  // ── Internals ──────────────────────────────────────────

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser && this.browser.connected) {
      return this.browser;
    }

    const { executablePath, userDataDir, headless = true } = this.options;
    logger.info(
      `Launching Chromium (${executablePath ?? 'installed Chrome'}` +
        `${userDataDir ? `, profile ${userDataDir}` : ''})…`,
    );

    const browser: Browser = await puppeteer.launch({
      headless,
      ...(executablePath ? { executablePath } : { channel: 'chrome' }),
      userDataDir,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--lang=en-IN',
      ],
    });

    this.browser = browser;
    return browser;
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

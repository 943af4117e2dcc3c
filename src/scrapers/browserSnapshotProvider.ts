/**
 * browserSnapshotProvider.ts — Render the court page in headless Chromium.
 *
 * The cause list is a server-rendered table, but the site loads fonts and a
 * header banner late, so the page is given until network-idle before its HTML
 * is read and the full-page screenshot taken.  No screenshot is taken when
 * the HTML holds no plausible date.
 */

import type { CaptureResult, QualityProfile } from '../core/types';
import { BrowserManager } from '../core/browserManager';
import { BaseSnapshotProvider, type SnapshotSettings } from './baseScraper';
import { writeFileAtomic } from '../services/atomicFile';

const NAVIGATION_TIMEOUT_MS = 60_000;

export class BrowserSnapshotProvider extends BaseSnapshotProvider {
  readonly name = 'browser';

  constructor(
    settings: SnapshotSettings,
    private readonly browser: BrowserManager = BrowserManager.getInstance(),
  ) {
    super(settings);
  }

  protected async render(targetUrl: string, profile: QualityProfile): Promise<CaptureResult> {
    return this.browser.withPage<CaptureResult>(profile, async (page) => {
      const response = await page.goto(targetUrl, {
        waitUntil: 'networkidle2',
        timeout: NAVIGATION_TIMEOUT_MS,
      });

      const status = response?.status() ?? 0;
      if (status >= 400) {
        return { status: 'failed', reason: `HTTP ${status} from ${targetUrl}` };
      }

      const html = await page.content();
      const extraction = this.extractDate(html);
      if (!extraction) {
        return { status: 'not-found' };
      }

      const image = await page.screenshot({ fullPage: true, type: 'png' });
      await writeFileAtomic(this.imagePath, image);
      this.logger.info(`Saved ${profile.width}×${profile.height}@${profile.deviceScaleFactor}x snapshot to ${this.imagePath}`);

      return {
        status: 'captured',
        date: extraction.date,
        imagePath: this.imagePath,
        contentType: 'image/png',
        extraction,
      };
    });
  }
}

/**
 * baseScraper.ts — Shared contract and plumbing for snapshot providers.
 *
 * A snapshot provider answers one question per poll: "is a cause list for a
 * plausible date on the page, and if so, what does the page look like?"  The
 * concrete providers differ only in *how* they get HTML and pixels (a local
 * headless browser, or a remote screenshot API).  Everything else lives here:
 *
 *   • the compliance gate (robots.txt + per-host rate limit);
 *   • date extraction against the page HTML;
 *   • where the image goes and how it is thrown away;
 *   • turning any thrown error into a `failed` result, because retries are
 *     the scheduler's decision and never the provider's.
 */

import { join } from 'path';
import type {
  CaptureResult,
  DateExtraction,
  PlausibilityWindow,
  QualityProfile,
} from '../core/types';
import type { NowFn } from '../core/clock';
import { systemNow } from '../core/clock';
import { extractCauseListDate } from '../core/dateExtractor';
import { isAllowedByRobots, throttled } from '../middleware/compliance';
import { removeFile } from '../services/atomicFile';
import { Logger } from '../core/logger';

export const SCREENSHOT_FILE = 'screenshot.png';

export interface SnapshotSettings {
  cacheDir: string;
  timezone: string;
  plausibility: PlausibilityWindow;
  headerSelector?: string;
  botUserAgent: string;
  rateLimitMs: number;
  /** Set to false to skip the robots.txt lookup (tests, local mirrors). */
  respectRobots?: boolean;
  now?: NowFn;
}

export interface SnapshotProvider {
  readonly name: string;
  /**
   * Fetch `targetUrl`, extract its cause-list date and, when one is found,
   * leave a PNG at the returned `imagePath`.  Never throws.
   */
  capture(targetUrl: string, profile: QualityProfile): Promise<CaptureResult>;
}

export abstract class BaseSnapshotProvider implements SnapshotProvider {
  abstract readonly name: string;
  protected readonly logger: Logger;
  readonly imagePath: string;

  constructor(protected readonly settings: SnapshotSettings) {
    this.logger = new Logger(new.target.name);
    this.imagePath = join(settings.cacheDir, SCREENSHOT_FILE);
  }

  async capture(targetUrl: string, profile: QualityProfile): Promise<CaptureResult> {
    try {
      if (this.settings.respectRobots !== false) {
        const allowed = await isAllowedByRobots(targetUrl, this.settings.botUserAgent);
        if (!allowed) {
          return { status: 'failed', reason: 'disallowed by robots.txt' };
        }
      }

      this.logger.info(`Capturing ${targetUrl} at ${profile.name} quality…`);
      const result = await throttled(targetUrl, this.settings.rateLimitMs, () =>
        this.render(targetUrl, profile),
      );

      if (result.status !== 'captured') {
        await this.discardImage();
      }
      return result;
    } catch (err) {
      await this.discardImage();
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`Capture of ${targetUrl} failed: ${reason}`);
      return { status: 'failed', reason };
    }
  }

  /** Delete the image file if one was written. */
  async discardImage(): Promise<void> {
    await removeFile(this.imagePath);
  }

  /**
   * Provider-specific fetch + screenshot.  May throw; `capture()` converts
   * errors into `failed`.
   */
  protected abstract render(targetUrl: string, profile: QualityProfile): Promise<CaptureResult>;

  protected extractDate(html: string): DateExtraction | null {
    return extractCauseListDate(html, {
      timezone: this.settings.timezone,
      window: this.settings.plausibility,
      headerSelector: this.settings.headerSelector,
      now: (this.settings.now ?? systemNow)(),
    });
  }
}

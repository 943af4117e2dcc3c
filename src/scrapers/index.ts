/**
 * scrapers/index.ts — Pick the snapshot provider named by the configuration.
 */

import type { CourierConfig } from '../core/config';
import type { NowFn } from '../core/clock';
import { BrowserManager } from '../core/browserManager';
import { ApiSnapshotProvider } from './apiSnapshotProvider';
import { BrowserSnapshotProvider } from './browserSnapshotProvider';
import type { SnapshotProvider, SnapshotSettings } from './baseScraper';

export { ApiSnapshotProvider, readScreenshotUrl } from './apiSnapshotProvider';
export { BrowserSnapshotProvider } from './browserSnapshotProvider';
export { BaseSnapshotProvider, SCREENSHOT_FILE } from './baseScraper';
export type { SnapshotProvider, SnapshotSettings } from './baseScraper';

export function createSnapshotProvider(config: CourierConfig, now?: NowFn): SnapshotProvider {
  const settings: SnapshotSettings = {
    cacheDir: config.cacheDir,
    timezone: config.timezone,
    plausibility: config.plausibility,
    headerSelector: config.headerSelector,
    botUserAgent: config.botUserAgent,
    rateLimitMs: config.rateLimitMs,
    now,
  };

  switch (config.snapshotProvider) {
    case 'api':
      return new ApiSnapshotProvider(settings, config.screenshotApiUrl);
    case 'browser':
      return new BrowserSnapshotProvider(settings, BrowserManager.getInstance());
  }
}

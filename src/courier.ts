/**
 * courier.ts — Wire the configured components into a runnable courier.
 */

import type { Server } from 'http';
import type { CourierConfig } from './core/config';
import type { NowFn } from './core/clock';
import { systemNow } from './core/clock';
import { BrowserManager } from './core/browserManager';
import { DailyGate } from './core/dailyGate';
import { Logger } from './core/logger';
import { getQualityProfile } from './core/qualityProfiles';
import { PairingBoard, startPairingServer } from './agents/pairingServer';
import { createDeliveryChannel } from './channels';
import { createSnapshotProvider } from './scrapers';
import { BulkDispatcher } from './services/bulkDispatcher';
import { FileSentMarkerStore } from './services/sentMarkerStore';
import { CauseListWatcher } from './causeListWatcher';
import { Scheduler } from './scheduler';

const logger = new Logger('Courier');

export interface Courier {
  scheduler: Scheduler;
  /** Stop ticking and release the browser and the status page. */
  shutdown(): Promise<void>;
}

export function buildCourier(config: CourierConfig, now: NowFn = systemNow): Courier {
  Logger.setLevel(config.logLevel);

  const browser = BrowserManager.getInstance();
  browser.configure({
    executablePath: config.session.chromeExecutablePath,
    userDataDir: config.channel === 'session' ? config.session.browserProfileDir : undefined,
  });

  const board = new PairingBoard(config.cacheDir);
  let server: Server | null = null;
  if (config.channel === 'session' && config.session.pairingPort > 0) {
    server = startPairingServer(board, config.session.pairingPort);
  }

  const gate = new DailyGate(new FileSentMarkerStore(config.cacheDir), {
    timezone: config.timezone,
    window: config.sendWindow,
  });

  const watcher = new CauseListWatcher(
    {
      targetUrl: config.targetUrl,
      profile: getQualityProfile(config.quality),
      recipients: config.recipients,
      captionTitle: config.captionTitle,
      interSendDelayMs: config.interSendDelayMs,
    },
    createSnapshotProvider(config, now),
    createDeliveryChannel(config, board),
    new BulkDispatcher(),
    gate,
  );

  const scheduler = new Scheduler(watcher, gate, {
    tickIntervalMinutes: config.tickIntervalMinutes,
    now,
  });

  logger.info(
    `Watching ${config.targetUrl} for ${config.recipients.length} recipient(s) ` +
      `via the ${config.channel} channel (${config.snapshotProvider} snapshots)`,
  );

  return {
    scheduler,
    shutdown: async () => {
      scheduler.stop();
      if (server) {
        const closing = server;
        server = null;
        await new Promise<void>((resolve) => closing.close(() => resolve()));
      }
      await browser.close();
    },
  };
}

/**
 * causeListWatcher.ts — One detection-and-delivery cycle.
 *
 *   capture page ─► date found? ─► strictly after today? ─► send to everyone
 *                                                          ─► record the day
 *
 * The snapshot belongs to the cycle: whatever happens after capture, it is
 * deleted before `runCycle` returns.
 */

import type { DateTime } from 'luxon';
import type { CycleOutcome, QualityProfile, Recipient } from './core/types';
import { formatCauseListDate } from './core/dateExtractor';
import type { DailyGate } from './core/dailyGate';
import { Logger } from './core/logger';
import type { SnapshotProvider } from './scrapers/baseScraper';
import type { DeliveryChannel } from './channels/deliveryChannel';
import type { BulkDispatcher } from './services/bulkDispatcher';
import { removeFile } from './services/atomicFile';

const logger = new Logger('CauseListWatcher');

export interface WatcherSettings {
  targetUrl: string;
  profile: QualityProfile;
  recipients: readonly Recipient[];
  captionTitle: string;
  interSendDelayMs: number;
}

export class CauseListWatcher {
  constructor(
    private readonly settings: WatcherSettings,
    private readonly provider: SnapshotProvider,
    private readonly channel: DeliveryChannel,
    private readonly dispatcher: BulkDispatcher,
    private readonly gate: DailyGate,
  ) {}

  /**
   * Run one cycle.  The gate's window and already-sent checks are the
   * caller's business; the future-date rule is enforced here.
   */
  async runCycle(now: DateTime): Promise<CycleOutcome> {
    const { targetUrl, profile } = this.settings;
    const capture = await this.provider.capture(targetUrl, profile);

    if (capture.status === 'failed') {
      logger.warn(`Capture failed: ${capture.reason}`);
      return { kind: 'capture-failed', reason: capture.reason };
    }
    if (capture.status === 'not-found') {
      logger.info('No cause-list date on the page yet');
      return { kind: 'not-found' };
    }

    try {
      if (!this.gate.acceptsDate(capture.date, now)) {
        logger.info(`Cause list is for ${capture.date}, not a future date — skipping`);
        return { kind: 'not-future', date: capture.date };
      }

      const caption = buildCaption(this.settings.captionTitle, capture.date);
      logger.info(
        `Cause list for ${capture.date} found — sending to ` +
          `${this.settings.recipients.length} recipient(s)`,
      );

      const summary = await this.dispatcher.sendAll(
        capture.imagePath,
        caption,
        this.settings.recipients,
        this.channel,
        this.settings.interSendDelayMs,
      );

      if (summary.successCount > 0) {
        await this.gate.recordSuccess(now);
        return { kind: 'delivered', date: capture.date, summary };
      }

      logger.warn('No recipient received the cause list; will retry next tick');
      return { kind: 'undelivered', date: capture.date, summary };
    } finally {
      await removeFile(capture.imagePath);
    }
  }
}

/** Title line, then the date as dd-MM-yyyy. */
export function buildCaption(title: string, date: string): string {
  return `${title}\n${formatCauseListDate(date, 'dd-MM-yyyy')}`;
}

/**
 * bulkDispatcher.ts — Send one image to every recipient, one after another.
 *
 * A failed recipient never stops the pass and is never retried within it;
 * the tallies go back to the watcher, which decides whether the day counts as
 * sent.  Between two sends the dispatcher waits `interDelayMs`, so a pass over
 * n recipients sleeps exactly n − 1 times.
 */

import type { DeliveryOutcome, DispatchSummary, Recipient, SleepFn } from '../core/types';
import type { DeliveryChannel } from '../channels/deliveryChannel';
import { describeError } from '../channels/deliveryChannel';
import { realSleep } from '../core/clock';
import { Logger } from '../core/logger';

const logger = new Logger('BulkDispatcher');

export class BulkDispatcher {
  constructor(private readonly sleep: SleepFn = realSleep) {}

  /**
   * @throws Only when `channel.open()` fails; the pass never started then.
   */
  async sendAll(
    imagePath: string,
    caption: string,
    recipients: readonly Recipient[],
    channel: DeliveryChannel,
    interDelayMs: number,
  ): Promise<DispatchSummary> {
    const summary: DispatchSummary = { successCount: 0, failCount: 0, outcomes: [] };

    await channel.open();
    try {
      for (let i = 0; i < recipients.length; i++) {
        if (i > 0) {
          await this.sleep(interDelayMs);
        }

        const recipient = recipients[i];
        let outcome: DeliveryOutcome;
        try {
          outcome = await channel.send(recipient, imagePath, caption);
        } catch (err) {
          outcome = { ok: false, reason: describeError(err) };
        }

        summary.outcomes.push({ recipient, outcome });
        if (outcome.ok) {
          summary.successCount++;
        } else {
          summary.failCount++;
          logger.warn(`[${i + 1}/${recipients.length}] ${recipient}: ${outcome.reason}`);
        }
      }
    } finally {
      await channel.close().catch((err: unknown) => {
        logger.error(`Closing the ${channel.name} channel failed`, err);
      });
    }

    logger.info(
      `Dispatch via ${channel.name} finished: ${summary.successCount} sent, ` +
        `${summary.failCount} failed`,
    );
    return summary;
  }
}

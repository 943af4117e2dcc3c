/**
 * deliveryChannel.ts — The contract every delivery channel satisfies.
 *
 * A channel gets one image to one recipient.  `open()` / `close()` bracket a
 * dispatch pass so a stateful channel can hold its browser page (or a cached
 * upload) across recipients.  `send()` reports failures as values and never
 * throws.
 */

import type { DeliveryOutcome, Recipient } from '../core/types';

export interface DeliveryChannel {
  readonly name: string;
  open(): Promise<void>;
  send(recipient: Recipient, imagePath: string, caption: string): Promise<DeliveryOutcome>;
  close(): Promise<void>;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

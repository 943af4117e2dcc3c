/**
 * channels/index.ts — Build the delivery channel named by the configuration.
 *
 * The choice is made once, here.  The dispatcher and the gate only ever see a
 * `DeliveryChannel`.
 */

import type { CourierConfig } from '../core/config';
import { ConfigError } from '../core/config';
import { BrowserManager } from '../core/browserManager';
import { FileSessionStore } from '../agents/sessionManager';
import type { PairingBoard } from '../agents/pairingServer';
import { WhatsAppWebSurface } from '../agents/whatsappWebSurface';
import { DirectApiChannel } from './directApiChannel';
import { SessionChannel } from './sessionChannel';
import type { DeliveryChannel } from './deliveryChannel';

export type { DeliveryChannel } from './deliveryChannel';
export type { ChatSurface, UiHandle } from './chatSurface';
export { DirectApiChannel, readMediaId } from './directApiChannel';
export { SessionChannel } from './sessionChannel';
export type { SessionChannelOptions, SessionFailure } from './sessionChannel';

export function createDeliveryChannel(config: CourierConfig, board: PairingBoard): DeliveryChannel {
  switch (config.channel) {
    case 'api':
      if (!config.directApi) {
        throw new ConfigError('DELIVERY_CHANNEL=api needs PHONE_NUMBER_ID and ACCESS_TOKEN.');
      }
      return new DirectApiChannel(config.directApi);
    case 'session':
      return new SessionChannel(
        new WhatsAppWebSurface(BrowserManager.getInstance(), {
          uiWaitTimeoutMs: config.session.uiWaitTimeoutMs,
        }),
        new FileSessionStore(config.cacheDir, config.session.sessionTtlHours),
        board,
        {
          pairingMaxAttempts: config.session.pairingMaxAttempts,
          pairingPollMs: config.session.pairingPollMs,
          sendSettleMs: config.session.sendSettleMs,
        },
      );
  }
}

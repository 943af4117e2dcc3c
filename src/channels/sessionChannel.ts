/**
 * sessionChannel.ts — Delivery by driving WhatsApp Web like a person would.
 *
 * One pass = one browser page (`open()` … `close()`).  Each `send()` walks:
 *
 *   authenticate ─► open chat ─► attach ─► preview ─► caption ─► send ─► verify
 *
 * and every step that can fail has its own reason string, so a log line says
 * exactly where the UI drifted:
 *
 *   app-not-loaded · pairing-timeout · chat-not-loaded ·
 *   attachment-control-not-found · preview-not-ready ·
 *   caption-input-not-found · send-control-not-found · session-expired
 *
 * Authentication restores the saved session when there is one.  If the app
 * shows a pairing code or a logged-out notice instead, the saved session is
 * discarded and the code is published to the PairingBoard until somebody
 * scans it or the attempt budget runs out.  An app that never settles keeps
 * the saved session and fails the send with `app-not-loaded`.
 */

import type { DeliveryOutcome, Recipient, SleepFn } from '../core/types';
import { realSleep } from '../core/clock';
import { Logger } from '../core/logger';
import type { SessionStore } from '../agents/sessionManager';
import type { PairingBoard } from '../agents/pairingServer';
import { firstFound, pollUntil } from '../agents/uiStrategies';
import type { ChatSurface } from './chatSurface';
import { describeError, type DeliveryChannel } from './deliveryChannel';

export type SessionFailure =
  | 'app-not-loaded'
  | 'pairing-timeout'
  | 'chat-not-loaded'
  | 'attachment-control-not-found'
  | 'preview-not-ready'
  | 'caption-input-not-found'
  | 'send-control-not-found'
  | 'session-expired';

export interface SessionChannelOptions {
  pairingMaxAttempts: number;
  pairingPollMs: number;
  sendSettleMs: number;
  sleep?: SleepFn;
}

export class SessionChannel implements DeliveryChannel {
  readonly name = 'session';
  private readonly logger = new Logger('SessionChannel');
  private readonly sleep: SleepFn;
  private opened = false;

  constructor(
    private readonly surface: ChatSurface,
    private readonly sessions: SessionStore,
    private readonly board: PairingBoard,
    private readonly options: SessionChannelOptions,
  ) {
    this.sleep = options.sleep ?? realSleep;
  }

  async open(): Promise<void> {
    const saved = await this.sessions.load();
    this.logger.info(saved ? 'Opening WhatsApp Web with saved session…' : 'Opening WhatsApp Web…');
    try {
      await this.surface.launch(saved);
    } catch (err) {
      await this.surface.dispose().catch((disposeErr: unknown) => {
        this.logger.error('Could not release the page after a failed launch', disposeErr);
      });
      throw err;
    }
    this.opened = true;
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    this.opened = false;
    await this.surface.dispose();
  }

  async send(recipient: Recipient, imagePath: string, caption: string): Promise<DeliveryOutcome> {
    if (!this.opened) {
      return { ok: false, reason: 'channel is not open' };
    }

    try {
      const failure = await this.deliver(recipient, imagePath, caption);
      if (failure) {
        this.logger.warn(`Delivery to ${recipient} failed: ${failure}`);
        return { ok: false, reason: failure };
      }
      this.logger.info(`Image delivered to ${recipient}`);
      return { ok: true };
    } catch (err) {
      const reason = describeError(err);
      this.logger.error(`Delivery to ${recipient} threw: ${reason}`);
      return { ok: false, reason };
    }
  }

  // ── Steps ──────────────────────────────────────────────

  /** @returns `null` on success, otherwise the failing step. */
  private async deliver(
    recipient: Recipient,
    imagePath: string,
    caption: string,
  ): Promise<SessionFailure | null> {
    const auth = await this.ensureAuthenticated();
    if (auth) {
      return auth;
    }

    if (!(await this.surface.openConversation(recipient))) {
      return this.unlessLoggedOut('chat-not-loaded');
    }

    const attached = await firstFound(this.surface.attachmentStrategies(imagePath), 'Attach image');
    if (!attached) {
      return this.unlessLoggedOut('attachment-control-not-found');
    }

    if (!(await this.surface.waitForPreview())) {
      return this.unlessLoggedOut('preview-not-ready');
    }

    if (caption.length > 0) {
      const input = await firstFound(this.surface.captionInputStrategies(), 'Caption input');
      if (!input) {
        return this.unlessLoggedOut('caption-input-not-found');
      }
      await input.value.click();
      await this.typeCaption(caption);
    }

    const sendControl = await firstFound(this.surface.sendControlStrategies(), 'Send control');
    if (!sendControl) {
      return this.unlessLoggedOut('send-control-not-found');
    }
    await sendControl.value.click();

    await this.sleep(this.options.sendSettleMs);
    if (!(await this.surface.confirmInTranscript())) {
      this.logger.warn(`Could not confirm the message to ${recipient} in the transcript`);
    }
    return null;
  }

  private async typeCaption(caption: string): Promise<void> {
    const lines = caption.split('\n');
    for (let i = 0; i < lines.length; i++) {
      if (i > 0) {
        await this.surface.lineBreak();
      }
      if (lines[i].length > 0) {
        await this.surface.typeText(lines[i]);
      }
    }
  }

  /**
   * Make sure the app is logged in, pairing if necessary.
   *
   * @returns `null` once authenticated, otherwise the failure.
   */
  private async ensureAuthenticated(): Promise<'app-not-loaded' | 'pairing-timeout' | null> {
    const state = await this.surface.detectAuthState();
    if (state === 'authenticated') return null;
    if (state === 'loading') {
      this.logger.warn('WhatsApp Web did not finish loading; keeping the saved session');
      return 'app-not-loaded';
    }

    this.logger.warn(`WhatsApp Web is not logged in (${state}) — starting pairing`);
    await this.sessions.clear();

    const result = await pollUntil(
      async (attempt) => {
        const current = await this.surface.detectAuthState();
        if (current === 'authenticated') return true;

        const code = await this.surface.capturePairingCode();
        if (code) {
          await this.board.showCode(code);
        }
        this.logger.info(
          `Waiting for the pairing code to be scanned ` +
            `(attempt ${attempt}/${this.options.pairingMaxAttempts})…`,
        );
        return null;
      },
      {
        attempts: this.options.pairingMaxAttempts,
        intervalMs: this.options.pairingPollMs,
        sleep: this.sleep,
      },
    );

    if (!result.ok) {
      await this.board.markTimedOut();
      this.logger.error(`Pairing timed out after ${result.attempts} attempts`);
      return 'pairing-timeout';
    }

    await this.board.markPaired();
    await this.sessions.save(await this.surface.exportSession());
    this.logger.info('Pairing complete, session saved');
    return null;
  }

  /**
   * A step failed; if the reason is that the app logged out underneath us,
   * drop the saved session and say so instead.
   */
  private async unlessLoggedOut(failure: SessionFailure): Promise<SessionFailure> {
    const state = await this.surface.detectAuthState();
    if (state === 'logged-out' || state === 'awaiting-pairing') {
      await this.sessions.clear();
      return 'session-expired';
    }
    return failure;
  }
}

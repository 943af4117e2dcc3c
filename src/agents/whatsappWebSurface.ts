/**
 * whatsappWebSurface.ts — ChatSurface on top of WhatsApp Web in puppeteer.
 *
 * All selectors live in this file.  Each control has several, ordered from
 * the most specific (labelled, data-icon) to the most generic (geometry), and
 * the Session Channel tries them in that order through `firstFound`.
 */

import type { GhostCursor } from 'ghost-cursor';
import type { ElementHandle, Page } from 'puppeteer-core';
import type { AuthState, Recipient, StoredSession } from '../core/types';
import type { BorrowedPage, BrowserManager } from '../core/browserManager';
import { Logger } from '../core/logger';
import {
  createHumanCursor,
  humanClick,
  humanType,
  pressLineBreak,
} from '../middleware/humanBehavior';
import type { ChatSurface, UiHandle } from '../channels/chatSurface';
import { captureSession, restoreSession } from './sessionManager';
import type { LocatorStrategy } from './uiStrategies';

const logger = new Logger('WhatsAppWebSurface');

const APP_URL = 'https://web.whatsapp.com/';

const SELECTORS = {
  chatList: '#pane-side',
  pairingCode: 'canvas[aria-label*="Scan" i], div[data-ref] canvas',
  loggedOutNotice: '[data-testid="logged-out-dialog"]',
  composer: 'footer div[contenteditable="true"]',
  attachButtons: [
    'span[data-icon="plus-rounded"]',
    'span[data-icon="plus"]',
    'span[data-icon="clip"]',
    'div[title="Attach"]',
    '[aria-label="Attach"]',
  ],
  photoMenuItems: [
    'li[data-animate-dropdown-item] span[data-icon="media-filled-refreshed"]',
    'span[data-icon="attach-image"]',
    '[aria-label="Photos & videos"]',
  ],
  preview: [
    'div[role="dialog"] img[src^="blob:"]',
    'span[data-icon="wds-ic-send-filled"]',
    'div[aria-label*="caption" i][contenteditable="true"]',
  ],
  labelledCaption: 'div[contenteditable="true"][aria-label*="caption" i]',
  editable: 'div[contenteditable="true"]',
  sendControls: [
    'span[data-icon="wds-ic-send-filled"]',
    'span[data-icon="send"]',
    'div[role="button"][aria-label="Send"]',
    '[aria-label="Send"]',
  ],
  outgoingMedia: 'div.message-out img[src^="blob:"]',
} as const;

export interface WhatsAppWebSurfaceOptions {
  uiWaitTimeoutMs: number;
}

export class WhatsAppWebSurface implements ChatSurface {
  private borrowed: BorrowedPage | null = null;
  private cursor: GhostCursor | null = null;

  constructor(
    private readonly browser: BrowserManager,
    private readonly options: WhatsAppWebSurfaceOptions,
  ) {}

  // ── Lifecycle ──────────────────────────────────────────

  async launch(session: StoredSession | null): Promise<void> {
    const borrowed = await this.browser.borrowPage();
    this.borrowed = borrowed;
    this.cursor = createHumanCursor(borrowed.page);
    if (session) {
      await restoreSession(borrowed.page, session);
    }
    await borrowed.page.goto(APP_URL, { waitUntil: 'domcontentloaded', timeout: 60_000 });
  }

  async dispose(): Promise<void> {
    const borrowed = this.borrowed;
    this.borrowed = null;
    this.cursor = null;
    if (borrowed) {
      await borrowed.release();
    }
  }

  // ── Authentication ─────────────────────────────────────

  async detectAuthState(): Promise<AuthState> {
    const page = this.page();
    const deadline = Date.now() + this.options.uiWaitTimeoutMs;

    while (Date.now() < deadline) {
      const state = await page.evaluate(
        (chatList: string, pairingCode: string, loggedOut: string): AuthState => {
          if (document.querySelector(chatList)) return 'authenticated';
          if (document.querySelector(loggedOut)) return 'logged-out';
          if (document.querySelector(pairingCode)) return 'awaiting-pairing';
          return 'loading';
        },
        SELECTORS.chatList,
        SELECTORS.pairingCode,
        SELECTORS.loggedOutNotice,
      );
      if (state !== 'loading') return state;
      await new Promise((resolve) => setTimeout(resolve, 500));
    }
    return 'loading';
  }

  async capturePairingCode(): Promise<Buffer | null> {
    const canvas = await this.page().$(SELECTORS.pairingCode);
    if (!canvas) return null;
    const bytes = await canvas.screenshot({ type: 'png' });
    return Buffer.from(bytes);
  }

  async exportSession(): Promise<StoredSession> {
    return captureSession(this.page());
  }

  // ── Conversation ───────────────────────────────────────

  async openConversation(recipient: Recipient): Promise<boolean> {
    const page = this.page();
    const phone = recipient.replace(/[^\d]/g, '');
    await page.goto(`${APP_URL}send?phone=${phone}&type=phone_number&app_absent=0`, {
      waitUntil: 'domcontentloaded',
      timeout: 60_000,
    });
    return (await this.waitForAny([SELECTORS.composer])) !== null;
  }

  attachmentStrategies(imagePath: string): ReadonlyArray<LocatorStrategy<true>> {
    return [
      { name: 'attach-menu', locate: () => this.attachThroughMenu(imagePath) },
      { name: 'file-input', locate: () => this.attachThroughFileInput(imagePath) },
    ];
  }

  async waitForPreview(): Promise<boolean> {
    return (await this.waitForAny(SELECTORS.preview)) !== null;
  }

  captionInputStrategies(): ReadonlyArray<LocatorStrategy<UiHandle>> {
    const page = this.page();
    return [
      {
        name: 'labelled-caption',
        locate: async () => this.toHandle(await page.$(SELECTORS.labelledCaption)),
      },
      {
        name: 'editable-outside-footer',
        locate: async () => {
          for (const candidate of await page.$$(SELECTORS.editable)) {
            const inFooter = await candidate.evaluate((node) => node.closest('footer') !== null);
            if (!inFooter) return this.toHandle(candidate);
          }
          return null;
        },
      },
      {
        name: 'lowest-editable',
        locate: async () => {
          const candidates = await page.$$(SELECTORS.editable);
          let lowest: (typeof candidates)[number] | null = null;
          let lowestY = -Infinity;
          for (const candidate of candidates) {
            const box = await candidate.boundingBox();
            if (box && box.y > lowestY) {
              lowest = candidate;
              lowestY = box.y;
            }
          }
          return this.toHandle(lowest);
        },
      },
    ];
  }

  sendControlStrategies(): ReadonlyArray<LocatorStrategy<UiHandle>> {
    const page = this.page();
    return SELECTORS.sendControls.map((selector) => ({
      name: selector,
      locate: async () => this.toHandle(await page.$(selector)),
    }));
  }

  async typeText(text: string): Promise<void> {
    await humanType(this.page(), text);
  }

  async lineBreak(): Promise<void> {
    await pressLineBreak(this.page());
  }

  async confirmInTranscript(): Promise<boolean> {
    return (await this.waitForAny([SELECTORS.outgoingMedia])) !== null;
  }

  // ── Internals ──────────────────────────────────────────

  private page(): Page {
    if (!this.borrowed) {
      throw new Error('WhatsAppWebSurface: launch() has not been called');
    }
    return this.borrowed.page;
  }

  private mouse(): GhostCursor {
    if (!this.cursor) {
      throw new Error('WhatsAppWebSurface: launch() has not been called');
    }
    return this.cursor;
  }

  private toHandle<T extends Element>(element: ElementHandle<T> | null): UiHandle | null {
    if (!element) return null;
    const cursor = this.mouse();
    return { click: () => humanClick(cursor, element) };
  }

  private async attachThroughMenu(imagePath: string): Promise<true | null> {
    const page = this.page();
    const button = await this.findFirst(SELECTORS.attachButtons);
    if (!button) return null;
    await humanClick(this.mouse(), button);

    const menuItem = await this.waitForAny(SELECTORS.photoMenuItems);
    if (!menuItem) return null;

    const [chooser] = await Promise.all([
      page.waitForFileChooser({ timeout: this.options.uiWaitTimeoutMs }),
      humanClick(this.mouse(), menuItem),
    ]);
    await chooser.accept([imagePath]);
    return true;
  }

  private async attachThroughFileInput(imagePath: string): Promise<true | null> {
    const input = await this.page().$('input[type="file"][accept*="image"]');
    if (!input) return null;
    await input.uploadFile(imagePath);
    return true;
  }

  private async findFirst(selectors: readonly string[]): Promise<ElementHandle<Element> | null> {
    const page = this.page();
    for (const selector of selectors) {
      const handle = await page.$(selector);
      if (handle) return handle;
    }
    return null;
  }

  /** Wait until any of `selectors` appears, bounded by the UI timeout. */
  private async waitForAny(selectors: readonly string[]): Promise<ElementHandle<Element> | null> {
    try {
      return await this.page().waitForSelector(selectors.join(', '), {
        timeout: this.options.uiWaitTimeoutMs,
      });
    } catch (err) {
      logger.warn(
        `Timed out waiting for ${selectors[0]}` +
          `${selectors.length > 1 ? ` (+${selectors.length - 1} alternatives)` : ''}: ` +
          `${err instanceof Error ? err.message : String(err)}`,
      );
      return null;
    }
  }
}

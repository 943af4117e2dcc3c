/**
 * chatSurface.ts — What the Session Channel needs from a chat web app.
 *
 * The channel's state machine (authenticate → open chat → attach → caption →
 * send → verify) is written against this interface only.  The puppeteer
 * implementation lives in agents/whatsappWebSurface.ts; tests use a fake.
 */

import type { AuthState, Recipient, StoredSession } from '../core/types';
import type { LocatorStrategy } from '../agents/uiStrategies';

/** A located, clickable UI element. */
export interface UiHandle {
  click(): Promise<void>;
}

export interface ChatSurface {
  /** Start the app, seeding `session` first when one is given. */
  launch(session: StoredSession | null): Promise<void>;
  /** Bounded wait for the app to settle; `loading` means it never did. */
  detectAuthState(): Promise<AuthState>;
  /** PNG bytes of the pairing code currently on screen, if any. */
  capturePairingCode(): Promise<Buffer | null>;
  exportSession(): Promise<StoredSession>;

  /** Navigate to the recipient's conversation; `false` if it never loaded. */
  openConversation(recipient: Recipient): Promise<boolean>;
  /** Attachment strategies in preference order; each resolves `true` once the file is handed over. */
  attachmentStrategies(imagePath: string): ReadonlyArray<LocatorStrategy<true>>;
  waitForPreview(): Promise<boolean>;
  captionInputStrategies(): ReadonlyArray<LocatorStrategy<UiHandle>>;
  sendControlStrategies(): ReadonlyArray<LocatorStrategy<UiHandle>>;

  /** Type into the focused element. */
  typeText(text: string): Promise<void>;
  /** Insert a line break in the focused element without submitting. */
  lineBreak(): Promise<void>;

  /** Best-effort check that the last outgoing message is the media just sent. */
  confirmInTranscript(): Promise<boolean>;
  dispose(): Promise<void>;
}

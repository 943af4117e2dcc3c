/**
 * humanBehavior.ts — Keyboard and mouse input that looks typed by a person.
 *
 * WhatsApp Web watches input cadence.  A caption pasted in one frame, or a
 * send button clicked 2 ms after the preview opened, is a bot signature, so
 * the Session Channel's browser surface goes through these helpers instead of
 * `page.type()` / `element.click()` directly.  Mouse motion comes from
 * ghost-cursor: Bezier paths, overshoot on small targets, a random hold time.
 */

import { createCursor, type GhostCursor } from 'ghost-cursor';
import type { ElementHandle, Page } from 'puppeteer-core';
import { realSleep } from '../core/clock';
import { Logger } from '../core/logger';

const logger = new Logger('HumanBehavior');

// ─── Mouse ──────────────────────────────────────────────────

/** A ghost-cursor bound to `page`; keep one per page so motion starts where it left off. */
export function createHumanCursor(page: Page): GhostCursor {
  return createCursor(page);
}

/**
 * Move the cursor onto `target` (an element or a selector), pause briefly
 * (perceptual verification), then click.
 */
export async function humanClick<T extends Element>(
  cursor: Pick<GhostCursor, 'move' | 'click'>,
  target: string | ElementHandle<T>,
): Promise<void> {
  await cursor.move(target);
  await realSleep(randomBetween(50, 150));
  await cursor.click(target);
}

// ─── Typing ─────────────────────────────────────────────────

/**
 * Type `text` into the focused element character by character.
 *
 * Inter-key delay is normally distributed around 70 ms with an occasional
 * longer pause after a space, which is how people actually type.
 */
export async function humanType(page: Page, text: string): Promise<void> {
  logger.info(`Typing ${text.length} characters…`);

  for (const char of text) {
    await page.keyboard.type(char);

    let delay = gaussianRandom(70, 25);
    if (char === ' ') {
      delay += randomBetween(40, 200);
    }
    await realSleep(Math.max(15, Math.min(delay, 400)));
  }
}

/**
 * Insert a line break without submitting.  In WhatsApp Web a bare Enter
 * sends the message; Shift+Enter starts a new line.
 */
export async function pressLineBreak(page: Page): Promise<void> {
  await page.keyboard.down('Shift');
  await page.keyboard.press('Enter');
  await page.keyboard.up('Shift');
  await realSleep(randomBetween(60, 160));
}

// ─── Randomness helpers ─────────────────────────────────────

export function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}

/** Box-Muller transform: a normally distributed sample. */
function gaussianRandom(mean: number, stdDev: number): number {
  const u = 1 - Math.random();
  const v = Math.random();
  const z = Math.sqrt(-2.0 * Math.log(u)) * Math.cos(2.0 * Math.PI * v);
  return mean + z * stdDev;
}

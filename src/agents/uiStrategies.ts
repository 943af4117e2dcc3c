/**
 * uiStrategies.ts — Ordered locator lists and bounded polling.
 *
 * WhatsApp Web ships DOM changes without notice, so no single selector is
 * trusted.  Every control the Session Channel needs is described as a list of
 * `LocatorStrategy` entries, tried in order; the first that yields a value
 * wins, and the winning strategy's name is logged so a drifting UI shows up
 * in the logs before it breaks entirely.
 */

import type { SleepFn } from '../core/types';
import { realSleep } from '../core/clock';
import { Logger } from '../core/logger';

const logger = new Logger('UiStrategies');

export interface LocatorStrategy<T> {
  /** Short label for logs, e.g. "labelled-caption". */
  readonly name: string;
  /** Resolve the target, or `null` when this strategy does not apply. */
  locate(): Promise<T | null>;
}

export interface Located<T> {
  strategy: string;
  value: T;
}

/**
 * Try each strategy in order and return the first hit.  A strategy that throws
 * counts as a miss.
 */
export async function firstFound<T>(
  strategies: ReadonlyArray<LocatorStrategy<T>>,
  purpose: string,
): Promise<Located<T> | null> {
  for (const strategy of strategies) {
    try {
      const value = await strategy.locate();
      if (value !== null) {
        logger.info(`${purpose}: matched by "${strategy.name}"`);
        return { strategy: strategy.name, value };
      }
    } catch (err) {
      logger.warn(
        `${purpose}: strategy "${strategy.name}" threw — ` +
          `${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
  logger.warn(`${purpose}: no strategy matched (tried ${strategies.length})`);
  return null;
}

export interface PollOptions {
  attempts: number;
  intervalMs: number;
  sleep?: SleepFn;
}

export type PollResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number };

/**
 * Call `check` up to `attempts` times, sleeping `intervalMs` between calls,
 * until it returns a non-null value.  No sleep follows the last attempt.
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<T | null>,
  options: PollOptions,
): Promise<PollResult<T>> {
  const sleep = options.sleep ?? realSleep;

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    const value = await check(attempt);
    if (value !== null) {
      return { ok: true, value, attempts: attempt };
    }
    if (attempt < options.attempts) {
      await sleep(options.intervalMs);
    }
  }
  return { ok: false, attempts: options.attempts };
}

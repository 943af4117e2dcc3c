/**
 * scheduler.ts — Fixed-interval loop around the watcher.
 *
 * Each tick asks the DailyGate first and only runs a cycle when it says
 * `ready`.  A cycle that throws is logged and forgotten: the next tick is the
 * retry.  Ticks never overlap because the loop awaits each one before
 * sleeping.
 */

import type { CycleOutcome, SleepFn } from './core/types';
import type { NowFn } from './core/clock';
import { realSleep, systemNow } from './core/clock';
import type { DailyGate } from './core/dailyGate';
import { Logger } from './core/logger';
import type { CauseListWatcher } from './causeListWatcher';

const logger = new Logger('Scheduler');

export interface SchedulerOptions {
  tickIntervalMinutes: number;
  now?: NowFn;
  sleep?: SleepFn;
}

export class Scheduler {
  private readonly now: NowFn;
  private readonly sleep: SleepFn;
  private running = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly watcher: CauseListWatcher,
    private readonly gate: DailyGate,
    private readonly options: SchedulerOptions,
  ) {
    this.now = options.now ?? systemNow;
    this.sleep = options.sleep ?? realSleep;
  }

  /** One gated tick. */
  async tick(): Promise<CycleOutcome> {
    const now = this.now();
    const gateState = await this.gate.evaluate(now);
    if (gateState !== 'ready') {
      return { kind: 'skipped', gate: gateState };
    }
    return this.guardedCycle(now);
  }

  /**
   * Single-shot mode: one cycle, ignoring the send window and the already-sent
   * marker.  The cause-list date must still be in the future.
   */
  async runOnce(): Promise<CycleOutcome> {
    logger.info('Single-shot run (send window and daily marker ignored)');
    return this.guardedCycle(this.now());
  }

  /** Tick until `stop()` is called. */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    logger.info(`Scheduler started, ticking every ${this.options.tickIntervalMinutes} minute(s)`);

    while (this.running) {
      const outcome = await this.tick();
      logger.info(`Tick finished: ${describeOutcome(outcome)}`);
      if (!this.running) break;
      await this.interruptibleSleep(this.options.tickIntervalMinutes * 60_000);
    }
    logger.info('Scheduler stopped');
  }

  stop(): void {
    this.running = false;
    this.wake?.();
  }

  private async guardedCycle(now: ReturnType<NowFn>): Promise<CycleOutcome> {
    try {
      return await this.watcher.runCycle(now);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`Cycle crashed: ${message}`, err);
      return { kind: 'crashed', error: message };
    }
  }

  private async interruptibleSleep(ms: number): Promise<void> {
    await Promise.race([
      this.sleep(ms),
      new Promise<void>((resolve) => {
        this.wake = resolve;
      }),
    ]);
    this.wake = null;
  }
}

export function describeOutcome(outcome: CycleOutcome): string {
  switch (outcome.kind) {
    case 'skipped':
      return `skipped (${outcome.gate})`;
    case 'capture-failed':
      return `capture failed (${outcome.reason})`;
    case 'not-found':
      return 'no cause list yet';
    case 'not-future':
      return `cause list for ${outcome.date} is not in the future`;
    case 'delivered':
      return `delivered list for ${outcome.date} to ${outcome.summary.successCount} recipient(s), ${outcome.summary.failCount} failed`;
    case 'undelivered':
      return `list for ${outcome.date} reached nobody (${outcome.summary.failCount} failed)`;
    case 'crashed':
      return `crashed (${outcome.error})`;
  }
}

/**
 * dailyGate.ts — "May we try to send right now?"
 *
 *   idle ──evaluate──► outside-window
 *                   ├► already-sent-today
 *                   └► ready ──recordSuccess──► sent
 *
 * The gate is re-evaluated on every tick, and "today" is always the calendar
 * date in the configured zone, so it reopens at local midnight without any
 * explicit reset.
 */

import type { DateTime } from 'luxon';
import type { GateState, IsoDate, SendWindow } from './types';
import { calendarDate, formatTimeOfDay, isAfter, isWithinWindow } from './clock';
import { Logger } from './logger';
import type { SentMarkerStore } from '../services/sentMarkerStore';

export interface DailyGateOptions {
  timezone: string;
  window: SendWindow;
}

export class DailyGate {
  private readonly logger = new Logger('DailyGate');
  private current: GateState = 'idle';

  constructor(
    private readonly marker: SentMarkerStore,
    private readonly options: DailyGateOptions,
  ) {}

  get state(): GateState {
    return this.current;
  }

  /** Reads the marker once and decides whether a cycle may run. */
  async evaluate(now: DateTime): Promise<GateState> {
    const { timezone, window } = this.options;

    if (!isWithinWindow(now, window, timezone)) {
      this.current = 'outside-window';
      this.logger.info(
        `Outside the send window ${formatTimeOfDay(window.start)}–` +
          `${formatTimeOfDay(window.end)} ${timezone}`,
      );
      return this.current;
    }

    const today = calendarDate(now, timezone);
    const lastSent = await this.marker.read();
    if (lastSent === today) {
      this.current = 'already-sent-today';
      this.logger.info(`Already sent today (${today})`);
      return this.current;
    }

    this.current = 'ready';
    return this.current;
  }

  /** A cause-list date qualifies only when it is strictly after today. */
  acceptsDate(date: IsoDate, now: DateTime): boolean {
    return isAfter(date, calendarDate(now, this.options.timezone));
  }

  async recordSuccess(now: DateTime): Promise<void> {
    await this.marker.write(calendarDate(now, this.options.timezone));
    this.current = 'sent';
  }
}

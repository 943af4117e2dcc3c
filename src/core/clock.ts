/**
 * clock.ts — Calendar arithmetic in the scheduler's fixed time zone.
 *
 * The court publishes in IST and the "once per day" rule is about IST days, so
 * every "today" in the courier is computed here with an explicit zone instead
 * of the host's local time.
 */

import { DateTime } from 'luxon';
import type { IsoDate, SendWindow, SleepFn, TimeOfDay } from './types';

/** Returns the current instant; injected so tests can pin "now". */
export type NowFn = () => DateTime;

export const systemNow: NowFn = () => DateTime.now();

export const realSleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** The calendar date of `now` in `zone`, as `yyyy-MM-dd`. */
export function calendarDate(now: DateTime, zone: string): IsoDate {
  const local = now.setZone(zone);
  if (!local.isValid) {
    throw new Error(`Clock: cannot express ${now.toISO()} in zone "${zone}"`);
  }
  return local.toFormat('yyyy-MM-dd');
}

/** Shift an ISO date by whole days (negative = past). */
export function addDays(date: IsoDate, days: number): IsoDate {
  return DateTime.fromISO(date, { zone: 'utc' }).plus({ days }).toFormat('yyyy-MM-dd');
}

/** ISO dates compare correctly as strings; this names the intent. */
export function isAfter(candidate: IsoDate, reference: IsoDate): boolean {
  return candidate > reference;
}

function minutesOfDay(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

/**
 * Whether `now` (in `zone`) falls inside the send window, bounds inclusive.
 *
 * A window whose end is earlier than its start wraps past midnight
 * (e.g. 22:00–01:00).
 */
export function isWithinWindow(now: DateTime, window: SendWindow, zone: string): boolean {
  const local = now.setZone(zone);
  const current = local.hour * 60 + local.minute;
  const start = minutesOfDay(window.start);
  const end = minutesOfDay(window.end);

  if (start <= end) {
    return current >= start && current <= end;
  }
  return current >= start || current <= end;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

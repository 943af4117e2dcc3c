import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'fs';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DateTime } from 'luxon';
import { Scheduler } from '../scheduler';
import { CauseListWatcher, buildCaption } from '../causeListWatcher';
import { DailyGate } from '../core/dailyGate';
import { QUALITY_PROFILES } from '../core/qualityProfiles';
import { BulkDispatcher } from '../services/bulkDispatcher';
import type { SnapshotProvider } from '../scrapers/baseScraper';
import type { DeliveryChannel } from '../channels/deliveryChannel';
import type { CaptureResult, DeliveryOutcome, SleepFn } from '../core/types';
import type { SentMarkerStore } from '../services/sentMarkerStore';

const ZONE = 'Asia/Kolkata';
const RECIPIENTS = ['111', '222', '333'];

function ist(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: ZONE });
}

interface World {
  now: DateTime;
  marker: string | null;
  nextCapture: () => Promise<CaptureResult>;
  outcomeFor: (recipient: string) => DeliveryOutcome;
}

describe('Scheduler', () => {
  let dir: string;
  let imagePath: string;
  let world: World;

  async function capturedFor(date: string): Promise<CaptureResult> {
    await writeFile(imagePath, 'png');
    return {
      status: 'captured',
      date,
      imagePath,
      contentType: 'image/png',
      extraction: { date, raw: date, format: 'yyyy-MM-dd', source: 'header' },
    };
  }

  function setup(sleep: SleepFn = async () => {}) {
    const markerStore: SentMarkerStore = {
      read: async () => world.marker,
      write: async (date) => {
        world.marker = date;
      },
    };
    const capture = vi.fn(async () => world.nextCapture());
    const provider: SnapshotProvider = { name: 'fake', capture };
    const open = vi.fn(async () => {});
    const send = vi.fn(async (recipient: string) => world.outcomeFor(recipient));
    const channel: DeliveryChannel = { name: 'fake', open, send, close: async () => {} };

    const gate = new DailyGate(markerStore, {
      timezone: ZONE,
      window: { start: { hour: 20, minute: 0 }, end: { hour: 23, minute: 30 } },
    });
    const watcher = new CauseListWatcher(
      {
        targetUrl: 'https://court.example.test/causelist',
        profile: QUALITY_PROFILES.medium,
        recipients: RECIPIENTS,
        captionTitle: 'Patna High Court Cause List',
        interSendDelayMs: 0,
      },
      provider,
      channel,
      new BulkDispatcher(async () => {}),
      gate,
    );
    const scheduler = new Scheduler(watcher, gate, {
      tickIntervalMinutes: 10,
      now: () => world.now,
      sleep,
    });
    return { scheduler, capture, open, send };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'courier-scheduler-'));
    imagePath = join(dir, 'screenshot.png');
    world = {
      now: ist('2026-10-19T19:59'),
      marker: null,
      nextCapture: () => capturedFor('2026-10-20'),
      outcomeFor: () => ({ ok: true }),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('waits for the window, sends once, then stays quiet for the rest of the evening', async () => {
    const { scheduler, capture, send } = setup();

    expect(await scheduler.tick()).toEqual({ kind: 'skipped', gate: 'outside-window' });
    expect(capture).not.toHaveBeenCalled();

    world.now = ist('2026-10-19T20:05');
    const delivered = await scheduler.tick();
    expect(delivered).toMatchObject({ kind: 'delivered', date: '2026-10-20' });
    expect(send).toHaveBeenCalledTimes(3);
    expect(send).toHaveBeenCalledWith(
      '111',
      imagePath,
      'Patna High Court Cause List\n20-10-2026',
    );
    expect(world.marker).toBe('2026-10-19');
    expect(existsSync(imagePath)).toBe(false);

    world.now = ist('2026-10-19T20:15');
    expect(await scheduler.tick()).toEqual({ kind: 'skipped', gate: 'already-sent-today' });
    expect(capture).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledTimes(3);
  });

  it('makes no delivery attempt when the list is not published', async () => {
    const { scheduler, open, send } = setup();
    world.now = ist('2026-10-19T20:05');
    world.nextCapture = async () => ({ status: 'not-found' });

    expect(await scheduler.tick()).toEqual({ kind: 'not-found' });
    expect(open).not.toHaveBeenCalled();
    expect(send).not.toHaveBeenCalled();
    expect(world.marker).toBeNull();
  });

  it('discards a snapshot whose date is today', async () => {
    const { scheduler, send } = setup();
    world.now = ist('2026-10-19T20:05');
    world.nextCapture = () => capturedFor('2026-10-19');

    expect(await scheduler.tick()).toEqual({ kind: 'not-future', date: '2026-10-19' });
    expect(send).not.toHaveBeenCalled();
    expect(existsSync(imagePath)).toBe(false);
  });

  it('records the day after a partial success', async () => {
    const { scheduler } = setup();
    world.now = ist('2026-10-19T20:05');
    world.outcomeFor = (recipient) =>
      recipient === '222' ? { ok: false, reason: 'chat-not-loaded' } : { ok: true };

    const outcome = await scheduler.tick();

    expect(outcome.kind).toBe('delivered');
    if (outcome.kind !== 'delivered') return;
    expect(outcome.summary.successCount).toBe(2);
    expect(outcome.summary.failCount).toBe(1);
    expect(world.marker).toBe('2026-10-19');
  });

  it('leaves the marker alone and retries next tick when nobody received it', async () => {
    const { scheduler } = setup();
    world.now = ist('2026-10-19T20:05');
    world.outcomeFor = () => ({ ok: false, reason: 'pairing-timeout' });

    expect((await scheduler.tick()).kind).toBe('undelivered');
    expect(world.marker).toBeNull();
    expect(existsSync(imagePath)).toBe(false);

    world.now = ist('2026-10-19T20:15');
    world.outcomeFor = () => ({ ok: true });
    expect((await scheduler.tick()).kind).toBe('delivered');
    expect(world.marker).toBe('2026-10-19');
  });

  it('reports a capture failure without delivering', async () => {
    const { scheduler, send } = setup();
    world.now = ist('2026-10-19T20:05');
    world.nextCapture = async () => ({ status: 'failed', reason: 'navigation timeout' });

    expect(await scheduler.tick()).toEqual({ kind: 'capture-failed', reason: 'navigation timeout' });
    expect(send).not.toHaveBeenCalled();
  });

  it('survives a cycle that throws', async () => {
    const { scheduler, open } = setup();
    world.now = ist('2026-10-19T20:05');
    open.mockRejectedValueOnce(new Error('browser did not start'));

    expect(await scheduler.tick()).toEqual({ kind: 'crashed', error: 'browser did not start' });
    expect(existsSync(imagePath)).toBe(false);
  });

  it('runs once outside the window and after an earlier send', async () => {
    const { scheduler } = setup();
    world.now = ist('2026-10-19T09:00');
    world.marker = '2026-10-19';

    expect((await scheduler.runOnce()).kind).toBe('delivered');
  });

  it('still requires a future date when running once', async () => {
    const { scheduler } = setup();
    world.now = ist('2026-10-19T09:00');
    world.nextCapture = () => capturedFor('2026-10-18');

    expect(await scheduler.runOnce()).toEqual({ kind: 'not-future', date: '2026-10-18' });
  });

  it('keeps ticking until stopped', async () => {
    const intervals: number[] = [];
    const { scheduler, capture } = setup(async (ms) => {
      intervals.push(ms);
      if (intervals.length === 3) scheduler.stop();
    });

    await scheduler.start();

    expect(intervals).toEqual([600_000, 600_000, 600_000]);
    expect(capture).not.toHaveBeenCalled();
  });
});

describe('buildCaption', () => {
  it('puts the title on the first line and the date as dd-MM-yyyy on the second', () => {
    expect(buildCaption('Cause List', '2026-10-20')).toBe('Cause List\n20-10-2026');
  });
});

/**
 * types.ts — Shared type definitions for the courier pipeline.
 *
 * The scraper layer, the delivery channels and the scheduler all meet here, so
 * a change to (say) the capture result shape is a one-file change that the
 * compiler then chases through every caller.
 *
 * Dates cross module boundaries as ISO `yyyy-MM-dd` strings rather than Luxon
 * objects: they compare correctly as plain strings, serialise as-is into the
 * marker file, and keep Luxon an implementation detail of `core/`.
 */

// ─── Dates ─────────────────────────────────────────────────

/** A calendar date without time, e.g. "2026-10-20". */
export type IsoDate = string;

/** Which extraction pass found the date (see dateExtractor.ts). */
export type ExtractionSource = 'header' | 'page-text' | 'block-scan';

/** A successful date extraction. `null` stands for "not found". */
export interface DateExtraction {
  /** The cause-list date as `yyyy-MM-dd`. */
  date: IsoDate;
  /** The token exactly as it appeared on the page, e.g. "20-10-2026". */
  raw: string;
  /** The Luxon format that parsed `raw`; formatting `date` with it yields `raw`. */
  format: string;
  source: ExtractionSource;
}

/** Inclusive day offsets around "today" in which an extracted date is trusted. */
export interface PlausibilityWindow {
  pastDays: number;
  futureDays: number;
}

// ─── Snapshot capture ──────────────────────────────────────

export type QualityProfileName = 'low' | 'medium' | 'high';

export interface QualityProfile {
  name: QualityProfileName;
  width: number;
  height: number;
  deviceScaleFactor: number;
}

/**
 * What a SnapshotProvider returns.
 *
 * `not-found` is the normal answer before the list is published, so it is a
 * distinct tag rather than a failure.
 */
export type CaptureResult =
  | {
      status: 'captured';
      date: IsoDate;
      /** Where the PNG was written.  The caller deletes it. */
      imagePath: string;
      contentType: string;
      extraction: DateExtraction;
    }
  | { status: 'not-found' }
  | { status: 'failed'; reason: string };

// ─── Delivery ──────────────────────────────────────────────

/** An opaque, channel-specific address (phone-number-like). */
export type Recipient = string;

export type DeliveryOutcome = { ok: true } | { ok: false; reason: string };

export interface DispatchSummary {
  successCount: number;
  failCount: number;
  /** One entry per recipient, in sending order. */
  outcomes: Array<{ recipient: Recipient; outcome: DeliveryOutcome }>;
}

export type DeliveryChannelKind = 'api' | 'session';

export type SnapshotProviderKind = 'browser' | 'api';

// ─── Gate & scheduler ──────────────────────────────────────

export type GateState =
  | 'idle'
  | 'outside-window'
  | 'already-sent-today'
  | 'ready'
  | 'sent';

/** A wall-clock time of day, minute resolution. */
export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface SendWindow {
  start: TimeOfDay;
  end: TimeOfDay;
}

/** How a single cycle ended — returned to the scheduler for logging and tests. */
export type CycleOutcome =
  | { kind: 'skipped'; gate: GateState }
  | { kind: 'capture-failed'; reason: string }
  | { kind: 'not-found' }
  | { kind: 'not-future'; date: IsoDate }
  | { kind: 'delivered'; date: IsoDate; summary: DispatchSummary }
  | { kind: 'undelivered'; date: IsoDate; summary: DispatchSummary }
  | { kind: 'crashed'; error: string };

// ─── Session channel ───────────────────────────────────────

export type AuthState = 'authenticated' | 'awaiting-pairing' | 'logged-out' | 'loading';

/** A browser cookie in the shape puppeteer's `setCookie` accepts. */
export interface StoredCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

/** Persisted authentication state for the Session Channel. */
export interface StoredSession {
  savedAt: number;
  cookies: StoredCookie[];
  localStorage: Record<string, string>;
}

/** Shared between the Session Channel (writer) and the status page (reader). */
export interface PairingSnapshot {
  state: 'idle' | 'waiting-for-scan' | 'paired' | 'timed-out';
  updatedAt: number | null;
  /** The current pairing code as PNG bytes, if one is being shown. */
  image: Buffer | null;
}

// ─── Time ──────────────────────────────────────────────────

/** Injected so polling loops and delays can be driven by tests. */
export type SleepFn = (ms: number) => Promise<void>;

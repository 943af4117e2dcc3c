/**
 * config.ts — Build the courier's configuration from environment variables.
 *
 * Everything tunable lives in one `CourierConfig` object created at startup.
 * Missing credentials or malformed values raise `ConfigError`, which the CLI
 * turns into exit code 1 before any scheduling starts.
 */

import { IANAZone } from 'luxon';
import type {
  DeliveryChannelKind,
  PlausibilityWindow,
  QualityProfileName,
  Recipient,
  SendWindow,
  SnapshotProviderKind,
  TimeOfDay,
} from './types';
import type { LogLevel } from './logger';

export const DEFAULT_TARGET_URL =
  'https://patnahighcourt.gov.in/causelist/auin/view/4079/0/CLIST';

export const DEFAULT_HEADER_SELECTOR =
  '#causelist-date, .causelist-date, .cause-list-header';

/** Raised for configuration the process cannot start without. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface DirectApiSettings {
  graphApiUrl: string;
  phoneNumberId: string;
  accessToken: string;
}

export interface SessionChannelSettings {
  chromeExecutablePath?: string;
  browserProfileDir?: string;
  pairingMaxAttempts: number;
  pairingPollMs: number;
  /** 0 disables the status page. */
  pairingPort: number;
  sessionTtlHours: number;
  uiWaitTimeoutMs: number;
  sendSettleMs: number;
}

export interface CourierConfig {
  targetUrl: string;
  recipients: Recipient[];
  channel: DeliveryChannelKind;
  snapshotProvider: SnapshotProviderKind;
  quality: QualityProfileName;
  timezone: string;
  sendWindow: SendWindow;
  tickIntervalMinutes: number;
  plausibility: PlausibilityWindow;
  headerSelector: string;
  interSendDelayMs: number;
  cacheDir: string;
  captionTitle: string;
  screenshotApiUrl: string;
  botUserAgent: string;
  rateLimitMs: number;
  logLevel: LogLevel;
  /** Present only when `channel` is 'api'. */
  directApi?: DirectApiSettings;
  session: SessionChannelSettings;
}

type Env = Record<string, string | undefined>;

/**
 * Build a CourierConfig from `env` (defaults to process.env).
 *
 * @throws ConfigError when a required value is missing or malformed.
 */
export function loadCourierConfig(env: Env = process.env): CourierConfig {
  const recipients = parseRecipients(env.RECIPIENT_NUMBER);
  if (recipients.length === 0) {
    throw new ConfigError(
      'RECIPIENT_NUMBER must list at least one recipient (comma-separated).  ' +
        'See .env.example.',
    );
  }

  const channel = parseChoice<DeliveryChannelKind>(
    'DELIVERY_CHANNEL',
    env.DELIVERY_CHANNEL,
    ['api', 'session'],
    'api',
  );

  let directApi: DirectApiSettings | undefined;
  if (channel === 'api') {
    const phoneNumberId = env.PHONE_NUMBER_ID?.trim();
    const accessToken = env.ACCESS_TOKEN?.trim();
    if (!phoneNumberId || !accessToken) {
      throw new ConfigError(
        'PHONE_NUMBER_ID and ACCESS_TOKEN must be set when DELIVERY_CHANNEL=api.',
      );
    }
    directApi = {
      graphApiUrl: stripTrailingSlash(
        env.GRAPH_API_URL ?? 'https://graph.facebook.com/v21.0',
      ),
      phoneNumberId,
      accessToken,
    };
  }

  const timezone = env.TIMEZONE ?? 'Asia/Kolkata';
  if (!IANAZone.isValidZone(timezone)) {
    throw new ConfigError(`TIMEZONE "${timezone}" is not a valid IANA zone.`);
  }

  return {
    targetUrl: env.TARGET_URL ?? DEFAULT_TARGET_URL,
    recipients,
    channel,
    snapshotProvider: parseChoice<SnapshotProviderKind>(
      'SNAPSHOT_PROVIDER',
      env.SNAPSHOT_PROVIDER,
      ['browser', 'api'],
      'browser',
    ),
    quality: parseChoice<QualityProfileName>(
      'QUALITY',
      env.QUALITY,
      ['low', 'medium', 'high'],
      'medium',
    ),
    timezone,
    sendWindow: {
      start: parseTimeOfDay('SEND_WINDOW_START', env.SEND_WINDOW_START ?? '20:00'),
      end: parseTimeOfDay('SEND_WINDOW_END', env.SEND_WINDOW_END ?? '23:30'),
    },
    tickIntervalMinutes: parsePositiveInt(
      'TICK_INTERVAL_MINUTES',
      env.TICK_INTERVAL_MINUTES,
      10,
    ),
    plausibility: {
      pastDays: parseNonNegativeInt('DATE_WINDOW_PAST_DAYS', env.DATE_WINDOW_PAST_DAYS, 60),
      futureDays: parseNonNegativeInt(
        'DATE_WINDOW_FUTURE_DAYS',
        env.DATE_WINDOW_FUTURE_DAYS,
        30,
      ),
    },
    headerSelector: env.DATE_HEADER_SELECTOR ?? DEFAULT_HEADER_SELECTOR,
    interSendDelayMs: parseNonNegativeInt('INTER_SEND_DELAY_MS', env.INTER_SEND_DELAY_MS, 2000),
    cacheDir: env.CACHE_DIR ?? 'cache',
    captionTitle: env.CAPTION_TITLE ?? 'Patna High Court Cause List',
    screenshotApiUrl: env.SCREENSHOT_API_URL ?? 'https://api.microlink.io/',
    botUserAgent:
      env.BOT_USER_AGENT ??
      'CauseListCourier/1.0 (+https://github.com/causelist-courier)',
    rateLimitMs: parseNonNegativeInt('RATE_LIMIT_MS', env.RATE_LIMIT_MS, 2000),
    logLevel: parseChoice<LogLevel>('LOG_LEVEL', env.LOG_LEVEL, ['info', 'warn', 'error'], 'info'),
    directApi,
    session: {
      chromeExecutablePath: env.CHROME_EXECUTABLE_PATH || undefined,
      browserProfileDir: env.BROWSER_PROFILE_DIR || undefined,
      pairingMaxAttempts: parsePositiveInt('PAIRING_MAX_ATTEMPTS', env.PAIRING_MAX_ATTEMPTS, 36),
      pairingPollMs: parsePositiveInt('PAIRING_POLL_MS', env.PAIRING_POLL_MS, 5000),
      pairingPort: parseNonNegativeInt('PAIRING_PORT', env.PAIRING_PORT, 8080),
      sessionTtlHours: parsePositiveInt('SESSION_TTL_HOURS', env.SESSION_TTL_HOURS, 336),
      uiWaitTimeoutMs: parsePositiveInt('UI_WAIT_TIMEOUT_MS', env.UI_WAIT_TIMEOUT_MS, 20_000),
      sendSettleMs: parseNonNegativeInt('SEND_SETTLE_MS', env.SEND_SETTLE_MS, 3000),
    },
  };
}

// ── Parsers ────────────────────────────────────────────────

/** Split a comma-separated list, trimming blanks.  Duplicates are kept in order. */
export function parseRecipients(raw: string | undefined): Recipient[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Parse "HH:mm" (24-hour) into a TimeOfDay. */
export function parseTimeOfDay(name: string, raw: string): TimeOfDay {
  const match = raw.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    throw new ConfigError(`${name} must look like HH:mm, got "${raw}".`);
  }
  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  if (hour > 23 || minute > 59) {
    throw new ConfigError(`${name} is out of range: "${raw}".`);
  }
  return { hour, minute };
}

function parseChoice<T extends string>(
  name: string,
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new ConfigError(
      `${name} must be one of ${allowed.join(', ')}; got "${raw}".`,
    );
  }
  return match;
}

function parseNonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return value;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  const value = parseNonNegativeInt(name, raw, fallback);
  if (value === 0) {
    throw new ConfigError(`${name} must be greater than zero.`);
  }
  return value;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

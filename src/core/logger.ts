/**
 * logger.ts — Plain-language progress logger for the courier.
 *
 * Every module creates its own `Logger` with a context label, so a line like
 * "Sent to 3/3 recipients" is always attributable:
 *
 *   [2026-10-19T14:35:00.000Z] [INFO ] [Scheduler] Tick at 20:05 — gate is ready
 *
 * The threshold comes from LOG_LEVEL (info | warn | error) and can be changed at
 * runtime with `Logger.setLevel()`.
 */

export type LogLevel = 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('BulkDispatcher');
 *   logger.info('Sending to 3 recipient(s)…');
 */
export class Logger {
  private static threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL)
    ? process.env.LOG_LEVEL
    : 'info';

  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  static setLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  // ── Public API ─────────────────────────────────────────

  /** Routine progress: tick evaluated, page captured, message sent. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but non-fatal: unverifiable send, unreadable marker file. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: browser crash, API 500, cycle aborted. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    // The message is for operators; the raw error keeps the stack for debugging.
    if (err && this.enabled('error')) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[Logger.threshold];
  }

  private emit(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

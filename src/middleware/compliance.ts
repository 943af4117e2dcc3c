/**
 * compliance.ts — Good-citizen behaviour towards the court website.
 *
 * The courier polls a public government site every few minutes each evening.
 * Two things keep that polite:
 *
 * 1. **robots.txt** — checked once per host per run for our bot User-Agent.
 * 2. **Rate limiting** — a per-host Bottleneck limiter spaces requests, so a
 *    retry after a failure never hammers the site.
 */

import Bottleneck from 'bottleneck';
import robotsParser from 'robots-parser';
import { Logger } from '../core/logger';
import { lightFetch } from './lightFetcher';

const logger = new Logger('Compliance');

// ─── robots.txt checker ─────────────────────────────────────

const robotsCache = new Map<string, ReturnType<typeof robotsParser>>();

/**
 * Check if our bot may fetch `url` per the host's robots.txt.
 *
 * @returns `true` if allowed, or if robots.txt is missing or unreachable
 *   (RFC 9309 treats an unavailable file as "no restrictions").
 */
export async function isAllowedByRobots(url: string, userAgent: string): Promise<boolean> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    // Unparseable URL — the fetch itself will report it.
    return true;
  }

  const cached = robotsCache.get(parsed.hostname);
  if (cached) {
    return checkRules(cached, url, userAgent);
  }

  const robotsUrl = `${parsed.origin}/robots.txt`;
  try {
    const result = await lightFetch(robotsUrl, { timeout: 5_000 });
    if (result.statusCode === 200) {
      const robots = robotsParser(robotsUrl, result.body);
      robotsCache.set(parsed.hostname, robots);
      return checkRules(robots, url, userAgent);
    }
  } catch (err) {
    logger.warn(
      `Could not fetch robots.txt for ${parsed.hostname} — assuming allowed ` +
        `(${err instanceof Error ? err.message : String(err)})`,
    );
  }

  return true;
}

function checkRules(
  robots: ReturnType<typeof robotsParser>,
  url: string,
  userAgent: string,
): boolean {
  const allowed = robots.isAllowed(url, userAgent) ?? true;
  if (!allowed) {
    logger.warn(`robots.txt disallows ${url} for UA "${userAgent}"`);
  }
  return allowed;
}

export function clearRobotsCache(): void {
  robotsCache.clear();
}

// ─── Rate limiter (Bottleneck) ──────────────────────────────

const limiters = new Map<string, Bottleneck>();

/**
 * Create or retrieve the limiter for `hostname`: one request at a time with
 * at least `minTimeMs` between starts.
 */
export function getRateLimiter(hostname: string, minTimeMs: number): Bottleneck {
  const existing = limiters.get(hostname);
  if (existing) return existing;

  const limiter = new Bottleneck({ maxConcurrent: 1, minTime: minTimeMs });
  limiters.set(hostname, limiter);
  return limiter;
}

/** Run `task` through the limiter of the URL's host. */
export async function throttled<T>(url: string, minTimeMs: number, task: () => Promise<T>): Promise<T> {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    hostname = 'unknown';
  }
  return getRateLimiter(hostname, minTimeMs).schedule(task);
}

export async function clearRateLimiters(): Promise<void> {
  const active = [...limiters.values()];
  limiters.clear();
  await Promise.all(active.map((limiter) => limiter.disconnect()));
}

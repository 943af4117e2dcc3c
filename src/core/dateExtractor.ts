/**
 * dateExtractor.ts — Find the cause-list date in a court page.
 *
 * THE PROBLEM THIS SOLVES
 * ───────────────────────
 * The court page has no machine-readable "this list is for" field.  The date
 * shows up as text, in whichever of several shapes the registry used that day:
 *
 *   "CAUSE LIST FOR 20-10-2026"
 *   "Dated: 20/10/2026"
 *   "Tuesday, 20 October 2026"
 *
 * and the same page also carries unrelated dates (footer copyright, order
 * dates inside the table, "last updated" stamps).  The extractor therefore:
 *
 *   1. trusts a designated header element when the page has one;
 *   2. otherwise scans the whole text in document order, with whitespace at
 *      every block and cell boundary so that "Sl 2" + "1-10-2026" in adjacent
 *      cells never reads as "Sl 21-10-2026";
 *   3. otherwise scans individual elements, because inline markup still glues
 *      neighbouring text together ("<span>20-10-2026</span><span>12</span>"
 *      becomes "20-10-202612") and hides dates that sit alone in a span.
 *
 * Every candidate must land inside the plausibility window around today; a
 * 1998 judgment date quoted in the list is noise, not the list date.
 *
 * A page without any plausible date is the normal state before the list is
 * published, so "not found" is `null`, not an exception.
 */

import * as cheerio from 'cheerio';
import { DateTime } from 'luxon';
import type { DateExtraction, ExtractionSource, IsoDate, PlausibilityWindow } from './types';
import { addDays, calendarDate } from './clock';
import { Logger } from './logger';

const logger = new Logger('DateExtractor');

// ── Accepted formats ───────────────────────────────────────

/**
 * Luxon formats tried in order for each candidate token.
 *
 * Two-digit fields come before one-digit ones so that "05-03-2026" is claimed
 * by "dd-MM-yyyy" and formats back to exactly the same text.
 */
export const ACCEPTED_FORMATS: readonly string[] = [
  ...['-', '/'].flatMap((sep) => [
    `dd${sep}MM${sep}yyyy`,
    `d${sep}MM${sep}yyyy`,
    `dd${sep}M${sep}yyyy`,
    `d${sep}M${sep}yyyy`,
  ]),
  'dd MMMM yyyy',
  'd MMMM yyyy',
  'dd MMM yyyy',
  'd MMM yyyy',
];

const NUMERIC_DATE = /\b\d{1,2}([-/])\d{1,2}\1\d{4}\b/g;

const MONTH_NAMES =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|' +
  'Sep(?:tember)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const NAMED_DATE = new RegExp(
  `\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:${MONTH_NAMES})\\.?,?\\s+\\d{4}\\b`,
  'gi',
);

/** Elements whose edges separate words in the page-text pass. */
const BOUNDARY_SELECTOR =
  'address, article, aside, blockquote, caption, dd, div, dl, dt, footer, form, ' +
  'h1, h2, h3, h4, h5, h6, header, li, main, nav, ol, p, pre, section, table, ' +
  'tbody, td, tfoot, th, thead, tr, ul';

/** Elements scanned one by one in the last pass. */
const BLOCK_SELECTOR = 'h1, h2, h3, h4, h5, h6, p, div, span, td, th, li, b, strong, font, label';

// ── Public API ─────────────────────────────────────────────

export interface DateExtractorOptions {
  timezone: string;
  window: PlausibilityWindow;
  /** CSS selector of the authoritative header region. */
  headerSelector?: string;
  /** Reference instant for the plausibility window; defaults to now. */
  now?: DateTime;
}

/**
 * Extract the cause-list date from raw page HTML (or plain text).
 *
 * @returns The first plausible date by the priority rules above, or `null`.
 */
export function extractCauseListDate(
  content: string,
  options: DateExtractorOptions,
): DateExtraction | null {
  const today = calendarDate(options.now ?? DateTime.now(), options.timezone);
  const earliest = addDays(today, -options.window.pastDays);
  const latest = addDays(today, options.window.futureDays);
  const plausible = (date: IsoDate) => date >= earliest && date <= latest;

  const $ = cheerio.load(content);
  $('script, style, noscript').remove();

  // ── Pass 1: designated header ──────────────────────────
  if (options.headerSelector) {
    const header = $(options.headerSelector).first();
    if (header.length > 0) {
      const found = firstPlausible(header.text(), 'header', plausible, true);
      if (found) return report(found);
      logger.info('Header region present but holds no plausible date — scanning page text');
    }
  }

  // ── Pass 2: whole page text, document order ────────────
  $('br').replaceWith(' ');
  $(BOUNDARY_SELECTOR).prepend(' ').append(' ');
  const pageText = $('body').length > 0 ? $('body').text() : $.root().text();
  const fromText = firstPlausible(pageText, 'page-text', plausible, true);
  if (fromText) return report(fromText);

  // ── Pass 3: individual blocks with numeric dates ───────
  for (const el of $(BLOCK_SELECTOR).toArray()) {
    const text = $(el).text().trim();
    if (text.length === 0 || text.length > 200) continue;
    const found = firstPlausible(text, 'block-scan', plausible, false);
    if (found) return report(found);
  }

  logger.info(`No cause-list date between ${earliest} and ${latest} on the page yet`);
  return null;
}

/**
 * Parse a single date token with the accepted formats.
 *
 * @returns The ISO date and the format that matched, or `null` when no format
 *   accepts the token (including impossible dates like 31-02-2026).
 */
export function parseDateToken(token: string): { date: IsoDate; format: string } | null {
  for (const format of ACCEPTED_FORMATS) {
    const parsed = DateTime.fromFormat(token, format, { locale: 'en', zone: 'utc' });
    if (parsed.isValid) {
      return { date: parsed.toFormat('yyyy-MM-dd'), format };
    }
  }
  return null;
}

/** Render an ISO date with one of the accepted formats (inverse of parseDateToken). */
export function formatCauseListDate(date: IsoDate, format: string): string {
  return DateTime.fromISO(date, { zone: 'utc' }).setLocale('en').toFormat(format);
}

// ── Internals ──────────────────────────────────────────────

/**
 * Every date-shaped substring of `text`, in document order.
 *
 * Named-month tokens are normalised ("20th October, 2026" → "20 October 2026")
 * before parsing; the normalised form is what `raw` reports.
 */
function candidateTokens(text: string, includeNamed: boolean): string[] {
  const hits: Array<{ index: number; token: string }> = [];

  for (const match of text.matchAll(NUMERIC_DATE)) {
    hits.push({ index: match.index ?? 0, token: match[0] });
  }

  if (includeNamed) {
    for (const match of text.matchAll(NAMED_DATE)) {
      hits.push({ index: match.index ?? 0, token: normaliseNamedToken(match[0]) });
    }
  }

  return hits.sort((a, b) => a.index - b.index).map((hit) => hit.token);
}

function normaliseNamedToken(token: string): string {
  return token
    .replace(/^(\d{1,2})(?:st|nd|rd|th)/i, '$1')
    .replace(/[.,]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function firstPlausible(
  text: string,
  source: ExtractionSource,
  plausible: (date: IsoDate) => boolean,
  includeNamed: boolean,
): DateExtraction | null {
  for (const token of candidateTokens(text, includeNamed)) {
    const parsed = parseDateToken(token);
    if (!parsed) continue; // malformed or ambiguous — skip, never throw
    if (!plausible(parsed.date)) continue;
    return { date: parsed.date, raw: token, format: parsed.format, source };
  }
  return null;
}

function report(found: DateExtraction): DateExtraction {
  logger.info(`Found cause-list date ${found.date} ("${found.raw}") via ${found.source}`);
  return found;
}

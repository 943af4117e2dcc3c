import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import {
  ACCEPTED_FORMATS,
  extractCauseListDate,
  formatCauseListDate,
  parseDateToken,
} from '../../core/dateExtractor';
import { DEFAULT_HEADER_SELECTOR } from '../../core/config';

const NOW = DateTime.fromISO('2026-10-19T20:05:00', { zone: 'Asia/Kolkata' });

const OPTIONS = {
  timezone: 'Asia/Kolkata',
  window: { pastDays: 60, futureDays: 30 },
  headerSelector: DEFAULT_HEADER_SELECTOR,
  now: NOW,
};

describe('dateExtractor', () => {
  describe('parseDateToken', () => {
    it.each(ACCEPTED_FORMATS)('reads back a date rendered as %s', (format) => {
      const rendered = formatCauseListDate('2026-03-05', format);
      expect(parseDateToken(rendered)).toEqual({ date: '2026-03-05', format });
    });

    it('rejects impossible calendar dates', () => {
      expect(parseDateToken('31-02-2026')).toBeNull();
    });

    it('rejects tokens in no accepted format', () => {
      expect(parseDateToken('2026-10-20')).toBeNull();
    });
  });

  describe('extractCauseListDate', () => {
    it('finds a numeric date in page text', () => {
      const result = extractCauseListDate('<h2>CAUSE LIST FOR 20-10-2026</h2>', OPTIONS);

      expect(result).toEqual({
        date: '2026-10-20',
        raw: '20-10-2026',
        format: 'dd-MM-yyyy',
        source: 'page-text',
      });
    });

    it('normalises a named-month date with ordinal and comma', () => {
      const result = extractCauseListDate('<p>Tuesday, 20th October, 2026</p>', OPTIONS);

      expect(result).toEqual({
        date: '2026-10-20',
        raw: '20 October 2026',
        format: 'dd MMMM yyyy',
        source: 'page-text',
      });
    });

    it('prefers the header region over earlier page text', () => {
      const html =
        '<p>Updated on 19-10-2026</p>' +
        '<div id="causelist-date">List for 21/10/2026</div>';

      const result = extractCauseListDate(html, OPTIONS);

      expect(result?.date).toBe('2026-10-21');
      expect(result?.source).toBe('header');
      expect(result?.format).toBe('dd/MM/yyyy');
    });

    it('falls back to page text when the header holds no date', () => {
      const html = '<div class="cause-list-header">Daily List</div><p>Date: 22-10-2026</p>';

      expect(extractCauseListDate(html, OPTIONS)?.source).toBe('page-text');
    });

    it('keeps adjacent table cells apart in page text', () => {
      const html = '<table><tr><td>Sl 2</td><td>1-10-2026</td></tr></table>';

      expect(extractCauseListDate(html, OPTIONS)).toEqual({
        date: '2026-10-01',
        raw: '1-10-2026',
        format: 'd-MM-yyyy',
        source: 'page-text',
      });
    });

    it('takes a date alone in a cell before a later paragraph date', () => {
      const html =
        '<table><tr><td>21-10-2026</td><td>5</td></tr></table><p>Next 25-10-2026</p>';

      const result = extractCauseListDate(html, OPTIONS);

      expect(result?.date).toBe('2026-10-21');
      expect(result?.source).toBe('page-text');
    });

    it('finds a date in a span that page text glues to its neighbour', () => {
      const html = '<p><span>20-10-2026</span><span>12</span></p>';

      const result = extractCauseListDate(html, OPTIONS);

      expect(result).toEqual({
        date: '2026-10-20',
        raw: '20-10-2026',
        format: 'dd-MM-yyyy',
        source: 'block-scan',
      });
    });

    it('rejects a date 61 days in the past and accepts one 60 days back', () => {
      expect(extractCauseListDate('<p>19-08-2026</p>', OPTIONS)).toBeNull();
      expect(extractCauseListDate('<p>20-08-2026</p>', OPTIONS)?.date).toBe('2026-08-20');
    });

    it('rejects a date 31 days ahead and accepts one 30 days ahead', () => {
      expect(extractCauseListDate('<p>19-11-2026</p>', OPTIONS)).toBeNull();
      expect(extractCauseListDate('<p>18-11-2026</p>', OPTIONS)?.date).toBe('2026-11-18');
    });

    it('skips implausible dates and keeps scanning in document order', () => {
      const html = '<p>Judgment of 14-02-1998 cited. Listed 23-10-2026.</p>';

      expect(extractCauseListDate(html, OPTIONS)?.raw).toBe('23-10-2026');
    });

    it('skips malformed tokens without throwing', () => {
      const html = '<p>31-02-2026 then 22-10-2026</p>';

      expect(extractCauseListDate(html, OPTIONS)?.date).toBe('2026-10-22');
    });

    it('ignores dates inside scripts', () => {
      const html = '<script>var published = "21-10-2026";</script><p>Not yet published</p>';

      expect(extractCauseListDate(html, OPTIONS)).toBeNull();
    });

    it('returns null for a page without any date', () => {
      expect(extractCauseListDate('<p>Cause list will be uploaded shortly.</p>', OPTIONS)).toBeNull();
    });
  });
});

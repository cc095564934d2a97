/**
 * FILE PURPOSE: Literal date extraction from passage text
 *
 * WHY: Date-sensitive questions need to know whether a passage talks about
 *      upcoming or past events. Only dates that parse unambiguously count.
 * HOW: Three regex families (numeric US, written month, ISO). Every candidate
 *      is validated against the calendar; bad ones are dropped, never thrown.
 */

import type { ExtractedDate } from '@kbchat/shared-types';

const MONTH_PREFIXES = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
] as const;

/** MM/DD/YYYY or MM-DD-YYYY. The separator must repeat. */
const NUMERIC_PATTERN = /\b(\d{1,2})([/-])(\d{1,2})\2(\d{4})\b/g;

/** "March 5, 2026", "Mar. 5 2026", "Sept 21st, 2026". */
const WRITTEN_PATTERN =
  /\b(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:,\s*|\s+)(\d{4})\b/gi;

/** YYYY-MM-DD, also as the date part of a timestamp (2026-03-05T10:00). */
const ISO_PATTERN = /\b(\d{4})-(\d{2})-(\d{2})(?!\d)/g;

/** Sortable integer key for a calendar date, e.g. 2026-03-05 → 20260305. */
export function toDayNumber(date: ExtractedDate): number {
  return date.year * 10_000 + date.month * 100 + date.day;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Build a date from raw parts, or null when the combination isn't a real day. */
function toCalendarDate(year: number, month: number, day: number): ExtractedDate | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (year < 1000 || month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

function monthFromName(name: string): number {
  const prefix = name.slice(0, 3).toLowerCase();
  return MONTH_PREFIXES.findIndex((m) => m === prefix) + 1;
}

function* candidates(text: string): Generator<ExtractedDate | null> {
  for (const match of text.matchAll(NUMERIC_PATTERN)) {
    yield toCalendarDate(Number(match[4]), Number(match[1]), Number(match[3]));
  }
  for (const match of text.matchAll(WRITTEN_PATTERN)) {
    yield toCalendarDate(Number(match[3]), monthFromName(match[1] ?? ''), Number(match[2]));
  }
  for (const match of text.matchAll(ISO_PATTERN)) {
    yield toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }
}

/**
 * Extract every unambiguous calendar date from free text.
 *
 * Dates without a 4-digit year and impossible days (Feb 30, day 32) are
 * discarded. Each date appears once; the result is sorted ascending.
 *
 * @example
 * ```typescript
 * extractDates('Conference on March 5, 2019 and 03/05/2019');
 * // [{ year: 2019, month: 3, day: 5 }]
 * ```
 */
export function extractDates(text: string): ExtractedDate[] {
  const unique = new Map<number, ExtractedDate>();

  for (const date of candidates(text)) {
    if (date) unique.set(toDayNumber(date), date);
  }

  return [...unique.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, date]) => date);
}

/**
 * FILE PURPOSE: Label a passage's dates as upcoming, past, or absent
 *
 * WHY: Stale event pages outrank upcoming ones under pure similarity ranking.
 *      The reranker needs a per-passage label to push past-only content down.
 * HOW: Compare each extracted date against the calendar day of referenceNow
 *      in an explicit time zone. The caller always supplies referenceNow.
 *      An unknown zone falls back to UTC and an invalid referenceNow leaves
 *      every passage 'no-dates'; neither throws.
 */

import type { DateRelevance, ExtractedDate } from '@kbchat/shared-types';
import { extractDates, toDayNumber } from './extract.js';

export const DEFAULT_TIME_ZONE = 'UTC';

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/** The zone itself when valid, otherwise DEFAULT_TIME_ZONE with a WARN line. */
export function resolveTimeZone(zone: string | undefined, label = 'time zone'): string {
  const candidate = zone?.trim() || DEFAULT_TIME_ZONE;
  if (isValidTimeZone(candidate)) return candidate;

  process.stderr.write(`WARN: ${label} "${candidate}" is not a valid IANA zone — using ${DEFAULT_TIME_ZONE}\n`);
  return DEFAULT_TIME_ZONE;
}

/**
 * Calendar day of an instant as seen in the given IANA time zone.
 * Throws RangeError for an invalid zone or instant; see referenceDayOf.
 */
export function calendarDayOf(instant: Date, timeZone: string = DEFAULT_TIME_ZONE): ExtractedDate {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
  }).formatToParts(instant);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);

  return { year: part('year'), month: part('month'), day: part('day') };
}

/**
 * Day number (see toDayNumber) of referenceNow, or null when referenceNow is
 * an Invalid Date. Expects a zone already passed through resolveTimeZone.
 */
export function referenceDayOf(referenceNow: Date, timeZone: string): number | null {
  if (Number.isNaN(referenceNow.getTime())) {
    process.stderr.write('WARN: referenceNow is not a valid date — date relevance skipped\n');
    return null;
  }
  return toDayNumber(calendarDayOf(referenceNow, timeZone));
}

/** Classify dates against a precomputed reference day. A null day labels everything 'no-dates'. */
export function classifyAgainstDay(dates: readonly ExtractedDate[], today: number | null): DateRelevance {
  if (dates.length === 0 || today === null) return 'no-dates';
  return dates.some((d) => toDayNumber(d) >= today) ? 'has-future-dates' : 'only-past-dates';
}

/**
 * Classify a set of dates against the reference day.
 *
 * A date on the reference day itself counts as upcoming. Mixed past and
 * future dates classify as 'has-future-dates'.
 */
export function classifyDateRelevance(
  dates: readonly ExtractedDate[],
  referenceNow: Date,
  timeZone: string = DEFAULT_TIME_ZONE,
): DateRelevance {
  if (dates.length === 0) return 'no-dates';
  return classifyAgainstDay(dates, referenceDayOf(referenceNow, resolveTimeZone(timeZone)));
}

/** Extract and classify in one step. */
export function classifyTextDateRelevance(
  text: string,
  referenceNow: Date,
  timeZone: string = DEFAULT_TIME_ZONE,
): DateRelevance {
  return classifyDateRelevance(extractDates(text), referenceNow, timeZone);
}

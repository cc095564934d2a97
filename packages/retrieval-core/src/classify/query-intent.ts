/**
 * FILE PURPOSE: Decide whether a user question is date-sensitive
 *
 * WHY: Only questions about schedules, events and deadlines get the
 *      future-dates-first pass. A false positive just adds a harmless sort;
 *      a false negative falls back to plain relevance order.
 * HOW: Case-insensitive keyword match anchored at word starts, so "dates"
 *      and "scheduled" match while "update" does not.
 */

import type { Query } from '@kbchat/shared-types';

/** Temporal vocabulary. Entries match as word prefixes. */
export const DATE_KEYWORDS: readonly string[] = [
  // interrogative
  'when',
  // scheduling
  'schedul', 'calendar', 'date', 'deadline', 'time',
  'today', 'tomorrow', 'tonight', 'upcoming', 'next',
  // recurring institutional events
  'conference', 'meeting', 'event', 'holiday',
  'graduation', 'semester', 'vacation',
];

export interface QueryIntent {
  isDateSensitive: boolean;
  /** First vocabulary term found in the query, for audit logs. */
  matchedKeyword: string | null;
}

function escapeRegex(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildPattern(extraKeywords: readonly string[]): RegExp {
  const terms = [...DATE_KEYWORDS, ...extraKeywords]
    .map((t) => t.trim().toLowerCase())
    .filter(Boolean)
    .map(escapeRegex);
  return new RegExp(`\\b(${terms.join('|')})`, 'i');
}

const DEFAULT_PATTERN = buildPattern([]);

export function classifyQueryIntent(
  query: string,
  extraKeywords: readonly string[] = [],
): QueryIntent {
  const pattern = extraKeywords.length > 0 ? buildPattern(extraKeywords) : DEFAULT_PATTERN;
  const match = pattern.exec(query);
  const keyword = match?.[1];

  return keyword
    ? { isDateSensitive: true, matchedKeyword: keyword.toLowerCase() }
    : { isDateSensitive: false, matchedKeyword: null };
}

export function isDateQuery(query: string, extraKeywords: readonly string[] = []): boolean {
  return classifyQueryIntent(query, extraKeywords).isDateSensitive;
}

/** Build the per-request Query. Intent is computed here and nowhere else. */
export function toQuery(text: string, extraKeywords: readonly string[] = []): Query {
  return { text, isDateSensitive: isDateQuery(text, extraKeywords) };
}

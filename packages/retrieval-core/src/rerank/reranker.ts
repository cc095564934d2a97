/**
 * FILE PURPOSE: Post-retrieval reranking — website before archive, upcoming before past
 *
 * WHY: Similarity ranking alone lets stale archived documents beat current
 *      website pages, and past events beat upcoming ones. Both produce
 *      confidently wrong answers about "the next meeting".
 * HOW: Label every passage, stable-partition by source type, and for
 *      date-sensitive queries stable-sort each partition by date relevance.
 *      Website partition first, archive second. Nothing is dropped or copied:
 *      upstream relevance order is the tie-break throughout.
 *
 * Groups are concatenated rather than score-blended so the position of any
 * passage can always be explained from its two labels.
 */

import type { DateRelevance, Passage, Query, RankedPassage } from '@kbchat/shared-types';
import { classifyAgainstDay, extractDates, referenceDayOf, resolveTimeZone } from '../dates/index.js';
import { classifySourceType, toQuery, DEFAULT_ARCHIVE_EXTENSIONS } from '../classify/index.js';

export interface RerankOptions {
  /** Extensions that mark an origin as archival. Default: ['.pdf']. */
  archiveExtensions?: readonly string[];
  /** Terms added to the date-query vocabulary. */
  extraDateKeywords?: readonly string[];
  /** IANA zone that defines "today". Default: 'UTC'. */
  timeZone?: string;
}

export interface RerankResult<T extends Passage> {
  passages: RankedPassage<T>[];
  query: Query;
  websiteCount: number;
  archiveCount: number;
}

/** Sort key within a partition for date-sensitive queries. */
const DATE_RELEVANCE_ORDER: Record<DateRelevance, number> = {
  'has-future-dates': 0,
  'no-dates': 1,
  'only-past-dates': 2,
};

function resolveQuery(query: Query | string, options: RerankOptions): Query {
  return typeof query === 'string' ? toQuery(query, options.extraDateKeywords) : query;
}

function annotate<T extends Passage>(
  passage: T,
  today: number | null,
  options: RerankOptions,
): RankedPassage<T> {
  return {
    passage,
    sourceType: classifySourceType(
      passage.origin,
      passage.secondaryLocator,
      options.archiveExtensions ?? DEFAULT_ARCHIVE_EXTENSIONS,
    ),
    dateRelevance: classifyAgainstDay(extractDates(passage.text), today),
  };
}

function byDateRelevance<T extends Passage>(group: RankedPassage<T>[]): RankedPassage<T>[] {
  // Array.prototype.sort is stable, so equal labels keep upstream order.
  return [...group].sort(
    (a, b) => DATE_RELEVANCE_ORDER[a.dateRelevance] - DATE_RELEVANCE_ORDER[b.dateRelevance],
  );
}

/**
 * Rerank passages and return them with their computed labels.
 *
 * @param passages - Upstream-ranked passages, best first
 * @param query - Raw question text, or a Query whose intent was already computed
 * @param referenceNow - The current instant at request time
 *
 * @example
 * ```typescript
 * const result = rerankDetailed(passages, 'When is the next board meeting?', new Date());
 * // result.passages[0].sourceType === 'website'
 * ```
 */
export function rerankDetailed<T extends Passage>(
  passages: readonly T[],
  query: Query | string,
  referenceNow: Date,
  options: RerankOptions = {},
): RerankResult<T> {
  const resolved = resolveQuery(query, options);
  // Reference day is computed once per call; a bad zone or instant degrades, never throws.
  const today = referenceDayOf(referenceNow, resolveTimeZone(options.timeZone));
  const ranked = passages.map((p) => annotate(p, today, options));

  let website = ranked.filter((r) => r.sourceType === 'website');
  let archive = ranked.filter((r) => r.sourceType === 'archive');

  if (resolved.isDateSensitive) {
    website = byDateRelevance(website);
    archive = byDateRelevance(archive);
  }

  return {
    passages: [...website, ...archive],
    query: resolved,
    websiteCount: website.length,
    archiveCount: archive.length,
  };
}

/** Rerank passages. Returns the caller's own passage objects in the new order. */
export function rerank<T extends Passage>(
  passages: readonly T[],
  query: Query | string,
  referenceNow: Date,
  options: RerankOptions = {},
): T[] {
  return rerankDetailed(passages, query, referenceNow, options).passages.map((r) => r.passage);
}

/**
 * Rerank several independently retrieved result lists, each on its own.
 * Group order is kept; passages never move between groups.
 */
export function rerankGroups<T extends Passage>(
  groups: readonly (readonly T[])[],
  query: Query | string,
  referenceNow: Date,
  options: RerankOptions = {},
): T[][] {
  const resolved = resolveQuery(query, options);
  const resolvedOptions = { ...options, timeZone: resolveTimeZone(options.timeZone) };
  return groups.map((group) => rerank(group, resolved, referenceNow, resolvedOptions));
}

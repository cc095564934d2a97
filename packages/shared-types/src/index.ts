/**
 * FILE PURPOSE: Shared types across all workspaces in the monorepo
 *
 * WHY: Single source of truth for the retrieval data model. The reranking
 *      core and the API import from here instead of defining their own copies.
 * HOW: Interfaces and unions only. Nothing here carries behaviour.
 */

/** One retrieved unit of content, as ranked by the external retrieval service. */
export interface Passage {
  /** The retrieved content body. */
  text: string;
  /** URL or storage path the content came from. May be empty. */
  origin: string;
  /** Similarity score from the retrieval service. Read-only here. */
  relevanceScore: number;
  /** Storage locator (e.g. an object-store URI) recorded alongside the origin. */
  secondaryLocator?: string;
  /** String metadata forwarded from the retrieval service (domain, meetingDate, ...). */
  metadata?: Record<string, string>;
}

/** Where a passage originated: live web content or a static archival document. */
export type SourceType = 'website' | 'archive';

/** Temporal label of a passage relative to the reference day. */
export type DateRelevance = 'has-future-dates' | 'no-dates' | 'only-past-dates';

/** A calendar date parsed out of free text. No time component. */
export interface ExtractedDate {
  year: number;
  /** 1–12 */
  month: number;
  day: number;
}

/** A user question plus its intent, computed once per request. */
export interface Query {
  text: string;
  isDateSensitive: boolean;
}

/** A passage with the labels computed for it during reranking. */
export interface RankedPassage<T extends Passage = Passage> {
  /** The caller's passage, by reference. */
  passage: T;
  sourceType: SourceType;
  dateRelevance: DateRelevance;
}

/** A source reference shown next to a generated answer. */
export interface SourceCitation {
  /** File name from the storage locator, or "Source N". */
  label: string;
  url: string | null;
  storageUri: string | null;
}

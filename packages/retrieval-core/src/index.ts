/**
 * FILE PURPOSE: Barrel export for post-retrieval reranking and its collaborators
 *
 * WHY: Single import point for the API and any other caller.
 *      Import: `import { rerank, createKnowledgeBaseClient } from '@kbchat/retrieval-core'`
 */

// ─── Reranking core ─────────────────────────────────────────────────────────
export { rerank, rerankDetailed, rerankGroups } from './rerank/index.js';
export type { RerankOptions, RerankResult } from './rerank/index.js';

// ─── Date extraction and relevance ──────────────────────────────────────────
export {
  extractDates,
  toDayNumber,
  classifyDateRelevance,
  classifyTextDateRelevance,
  classifyAgainstDay,
  calendarDayOf,
  referenceDayOf,
  resolveTimeZone,
  isValidTimeZone,
  DEFAULT_TIME_ZONE,
} from './dates/index.js';

// ─── Query intent and source type ───────────────────────────────────────────
export {
  classifyQueryIntent,
  isDateQuery,
  toQuery,
  DATE_KEYWORDS,
  classifySourceType,
  normalizeExtensions,
  DEFAULT_ARCHIVE_EXTENSIONS,
} from './classify/index.js';
export type { QueryIntent } from './classify/index.js';

// ─── Knowledge-base retrieval (upstream collaborator) ───────────────────────
export {
  createKnowledgeBaseClient,
  buildRetrieveRequest,
  toPassage,
  toPassages,
} from './knowledge-base/index.js';
export type { KnowledgeBaseClient, RetrieveOptions, RetrieveRequest } from './knowledge-base/index.js';

// ─── Prompt context and citations (downstream hand-off) ─────────────────────
export {
  buildPromptContext,
  parseSourcesUsed,
  selectCitedSources,
} from './context/index.js';
export type { ContextOptions, PromptContext, ParsedAnswer } from './context/index.js';

// ─── Configuration ──────────────────────────────────────────────────────────
export { loadRerankConfig, loadKnowledgeBaseConfig, DEFAULT_RESULT_COUNT } from './config.js';
export type { RerankConfig, KnowledgeBaseConfig } from './config.js';

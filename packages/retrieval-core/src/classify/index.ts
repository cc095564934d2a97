/**
 * FILE PURPOSE: Barrel export for query intent and source type classifiers
 */

export { classifyQueryIntent, isDateQuery, toQuery, DATE_KEYWORDS } from './query-intent.js';
export type { QueryIntent } from './query-intent.js';
export {
  classifySourceType,
  normalizeExtensions,
  DEFAULT_ARCHIVE_EXTENSIONS,
} from './source-type.js';

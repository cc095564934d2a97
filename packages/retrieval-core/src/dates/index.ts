/**
 * FILE PURPOSE: Barrel export for date extraction and date relevance
 */

export { extractDates, toDayNumber } from './extract.js';
export {
  classifyDateRelevance,
  classifyTextDateRelevance,
  classifyAgainstDay,
  calendarDayOf,
  referenceDayOf,
  resolveTimeZone,
  isValidTimeZone,
  DEFAULT_TIME_ZONE,
} from './relevance.js';

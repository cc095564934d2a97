/**
 * FILE PURPOSE: Barrel export for prompt context and citation handling
 */

export { buildPromptContext } from './context-builder.js';
export type { ContextOptions, PromptContext } from './context-builder.js';
export { parseSourcesUsed, selectCitedSources } from './citations.js';
export type { ParsedAnswer } from './citations.js';

/**
 * FILE PURPOSE: Turn reranked passage groups into numbered prompt context
 *
 * WHY: The answer model cites sources by number. Numbering must follow the
 *      reranked order so "[Source 1]" is the passage the reranker put first.
 * HOW: Groups are numbered consecutively from 1. Each block carries the
 *      origin, meeting date and domain label the model may need to quote.
 */

import type { Passage, SourceCitation } from '@kbchat/shared-types';

export interface ContextOptions {
  /** Human-readable names keyed by lower-cased site domain, e.g. { 'lakeview.example.org': 'Lakeview Junior High' }. */
  domainLabels?: Record<string, string>;
}

export interface PromptContext {
  context: string;
  /** sources[i] corresponds to "[Source i+1]" in the context. */
  sources: SourceCitation[];
}

const MISSING = 'NA';

/** Last path segment of a storage locator: "s3://bucket/docs/minutes.pdf" → "minutes.pdf". */
function fileNameOf(locator: string): string | null {
  const name = locator.split('/').pop();
  return name ? name : null;
}

function toCitation(passage: Passage, index: number): SourceCitation {
  const locator = passage.secondaryLocator || null;
  return {
    label: (locator && fileNameOf(locator)) ?? `Source ${index}`,
    url: passage.origin || null,
    storageUri: locator,
  };
}

function header(passage: Passage, index: number, options: ContextOptions): string {
  const domain = passage.metadata?.domain;
  const domainLabel = domain ? options.domainLabels?.[domain.toLowerCase()] ?? domain : MISSING;
  const meetingDate = passage.metadata?.meetingDate || MISSING;
  const url = passage.origin || MISSING;
  return `[Source ${index}] url: ${url} | meeting date: ${meetingDate} | domain: ${domainLabel}`;
}

export function buildPromptContext(
  groups: readonly (readonly Passage[])[],
  options: ContextOptions = {},
): PromptContext {
  let context = '';
  const sources: SourceCitation[] = [];

  for (const passage of groups.flat()) {
    const index = sources.length + 1;
    context += `${header(passage, index, options)}\n${passage.text}\n\n`;
    sources.push(toCitation(passage, index));
  }

  return { context, sources };
}

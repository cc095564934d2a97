/**
 * FILE PURPOSE: Resolve the sources an answer actually cited
 *
 * WHY: The answer model is asked to end with <sources_used>[1,3]</sources_used>.
 *      The tag is stripped from user-facing text and mapped back to citations.
 */

import type { SourceCitation } from '@kbchat/shared-types';

const SOURCES_USED_PATTERN = /<sources_used>\[(.*?)\]<\/sources_used>/;

export interface ParsedAnswer {
  text: string;
  /** 1-based source numbers, in the order the model listed them. */
  sourceNumbers: number[];
}

export function parseSourcesUsed(responseText: string): ParsedAnswer {
  const match = SOURCES_USED_PATTERN.exec(responseText);
  if (!match) return { text: responseText, sourceNumbers: [] };

  const sourceNumbers = (match[1] ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => /^\d+$/.test(s))
    .map((s) => parseInt(s, 10));

  return {
    text: responseText.replace(SOURCES_USED_PATTERN, '').trim(),
    sourceNumbers,
  };
}

/** Pick the cited sources. Numbers outside 1..sources.length are ignored. */
export function selectCitedSources(
  sources: readonly SourceCitation[],
  sourceNumbers: readonly number[],
): SourceCitation[] {
  const cited: SourceCitation[] = [];
  for (const n of sourceNumbers) {
    const source = n > 0 ? sources[n - 1] : undefined;
    if (source) cited.push(source);
  }
  return cited;
}

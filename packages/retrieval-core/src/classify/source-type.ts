/**
 * FILE PURPOSE: Classify a passage origin as live website or archival document
 *
 * WHY: Archived PDFs (old minutes, superseded handbooks) routinely outrank the
 *      current website page. The reranker puts website content first.
 * HOW: Archive only on a positive extension signal; everything else,
 *      including a missing origin, is website content.
 */

import type { SourceType } from '@kbchat/shared-types';

export const DEFAULT_ARCHIVE_EXTENSIONS: readonly string[] = ['.pdf'];

/** Lower-case and ensure a leading dot: "PDF" → ".pdf". */
export function normalizeExtensions(extensions: readonly string[]): string[] {
  return extensions
    .map((e) => e.trim().toLowerCase())
    .filter(Boolean)
    .map((e) => (e.startsWith('.') ? e : `.${e}`));
}

export function classifySourceType(
  origin: string | null | undefined,
  secondaryLocator?: string | null,
  archiveExtensions: readonly string[] = DEFAULT_ARCHIVE_EXTENSIONS,
): SourceType {
  const extensions = normalizeExtensions(archiveExtensions);
  const source = (origin ?? '').trim().toLowerCase();
  const locator = (secondaryLocator ?? '').toLowerCase();

  if (extensions.some((ext) => source.endsWith(ext))) return 'archive';
  if (locator && extensions.some((ext) => locator.includes(ext))) return 'archive';
  return 'website';
}

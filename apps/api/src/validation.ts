/**
 * FILE PURPOSE: Request body validation for rerank/retrieve/citation routes
 *
 * WHY: Bodies arrive as untyped JSON. Each field is checked and converted
 *      once, and a 400 names the first offending field.
 */

import type { Passage, SourceCitation } from '@kbchat/shared-types';

export type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function ok<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

function fail<T>(error: string): Parsed<T> {
  return { ok: false, error };
}

export function parseQueryText(raw: unknown): Parsed<string> {
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return fail('Required field: query (non-empty string)');
  }
  return ok(raw.trim());
}

/** Missing → the current instant. Never cached across requests. */
export function parseReferenceDate(raw: unknown): Parsed<Date> {
  if (raw === undefined || raw === null) return ok(new Date());
  if (typeof raw !== 'string') return fail('referenceDate must be an ISO 8601 string');

  const date = new Date(raw);
  if (Number.isNaN(date.getTime())) return fail('referenceDate must be an ISO 8601 string');
  return ok(date);
}

function parseMetadata(raw: unknown): Record<string, string> | undefined {
  if (!isObject(raw)) return undefined;
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') metadata[key] = value;
  }
  return metadata;
}

function parsePassage(raw: unknown, index: number): Parsed<Passage> {
  if (!isObject(raw)) return fail(`passages[${index}] must be an object`);

  const { text, origin, relevanceScore, secondaryLocator, metadata } = raw;
  if (typeof text !== 'string') return fail(`passages[${index}].text must be a string`);

  let source = '';
  if (typeof origin === 'string') source = origin;
  else if (origin !== undefined && origin !== null) return fail(`passages[${index}].origin must be a string`);

  let score = 0;
  if (typeof relevanceScore === 'number' && Number.isFinite(relevanceScore)) score = relevanceScore;
  else if (relevanceScore !== undefined) return fail(`passages[${index}].relevanceScore must be a number`);

  let locator: string | undefined;
  if (typeof secondaryLocator === 'string') locator = secondaryLocator;
  else if (secondaryLocator !== undefined) return fail(`passages[${index}].secondaryLocator must be a string`);

  const parsedMetadata = parseMetadata(metadata);
  return ok({
    text,
    origin: source,
    relevanceScore: score,
    ...(locator !== undefined ? { secondaryLocator: locator } : {}),
    ...(parsedMetadata ? { metadata: parsedMetadata } : {}),
  });
}

export function parsePassages(raw: unknown): Parsed<Passage[]> {
  if (!Array.isArray(raw)) return fail('Required field: passages (array)');

  const passages: Passage[] = [];
  for (const [index, item] of raw.entries()) {
    const parsed = parsePassage(item, index);
    if (!parsed.ok) return fail(parsed.error);
    passages.push(parsed.value);
  }
  return ok(passages);
}

export function parseCitations(raw: unknown): Parsed<SourceCitation[]> {
  if (!Array.isArray(raw)) return fail('Required field: sources (array)');

  const sources: SourceCitation[] = [];
  for (const [index, item] of raw.entries()) {
    if (!isObject(item) || typeof item.label !== 'string') {
      return fail(`sources[${index}].label must be a string`);
    }
    sources.push({
      label: item.label,
      url: typeof item.url === 'string' ? item.url : null,
      storageUri: typeof item.storageUri === 'string' ? item.storageUri : null,
    });
  }
  return ok(sources);
}

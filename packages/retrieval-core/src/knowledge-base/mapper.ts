/**
 * FILE PURPOSE: Map raw retrieval-service records to Passage
 *
 * WHY: The service returns loosely shaped JSON. Records are read field by
 *      field so one malformed entry never fails the whole response.
 */

import type { Passage } from '@kbchat/shared-types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

function stringMetadata(raw: unknown): Record<string, string> {
  const metadata: Record<string, string> = {};
  if (!isObject(raw)) return metadata;

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') metadata[key] = value;
  }
  // Snake-case key from the index; exposed in camelCase for the context builder.
  if (metadata.meeting_date !== undefined) {
    metadata.meetingDate = metadata.meeting_date;
    delete metadata.meeting_date;
  }
  return metadata;
}

/** Map one retrieval record. Returns null when it carries no text. */
export function toPassage(record: unknown): Passage | null {
  const text = field(field(record, 'content'), 'text');
  if (typeof text !== 'string') return null;

  const rawMetadata = field(record, 'metadata');
  const source = field(rawMetadata, 'source');
  const uri = field(field(field(record, 'location'), 's3Location'), 'uri');
  const score = field(record, 'score');
  const metadata = stringMetadata(rawMetadata);

  return {
    text,
    origin: typeof source === 'string' ? source : '',
    relevanceScore: typeof score === 'number' && Number.isFinite(score) ? score : 0,
    ...(typeof uri === 'string' ? { secondaryLocator: uri } : {}),
    ...(Object.keys(metadata).length > 0 ? { metadata } : {}),
  };
}

/** Map a full retrieval response, keeping upstream order. */
export function toPassages(response: unknown): Passage[] {
  const results = field(response, 'retrievalResults');
  if (!Array.isArray(results)) return [];

  const passages: Passage[] = [];
  for (const record of results) {
    const passage = toPassage(record);
    if (passage) passages.push(passage);
  }
  return passages;
}

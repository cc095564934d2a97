/**
 * FILE PURPOSE: Environment-driven configuration for reranking and retrieval
 *
 * WHY: Archive extensions, the date vocabulary, the reference time zone and
 *      the knowledge-base endpoint differ per deployment.
 * HOW: Plain loader functions over an env record (process.env by default),
 *      so tests pass their own record instead of mutating the process.
 */

import type { RerankOptions } from './rerank/index.js';
import { DEFAULT_ARCHIVE_EXTENSIONS, normalizeExtensions } from './classify/index.js';
import { resolveTimeZone } from './dates/index.js';

type Env = Record<string, string | undefined>;

export const DEFAULT_RESULT_COUNT = 40;

export type RerankConfig = Required<RerankOptions>;

export interface KnowledgeBaseConfig {
  /** Base URL of the retrieval service, without trailing slash. */
  baseUrl: string;
  knowledgeBaseId: string;
  apiKey: string | undefined;
  /** Results requested per retrieval call. */
  resultCount: number;
  /** Default domain filter, if any. */
  defaultDomain: string | undefined;
  /** Display names keyed by site domain, used in prompt context headers. */
  domainLabels: Record<string, string>;
  /** true only when both baseUrl and knowledgeBaseId are set. */
  enabled: boolean;
}

function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(',').map((s) => s.trim()).filter(Boolean);
}

/** "lakeview.example.org=Lakeview Junior High,hs.example.org=High School" → record. Malformed pairs are skipped. */
function parseDomainLabels(raw: string | undefined): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const pair of parseList(raw)) {
    const separator = pair.indexOf('=');
    if (separator <= 0) continue;
    const domain = pair.slice(0, separator).trim().toLowerCase();
    const label = pair.slice(separator + 1).trim();
    if (domain && label) labels[domain] = label;
  }
  return labels;
}

export function loadRerankConfig(env: Env = process.env): RerankConfig {
  const extensions = normalizeExtensions(parseList(env.RERANK_ARCHIVE_EXTENSIONS));

  return {
    archiveExtensions: extensions.length > 0 ? extensions : [...DEFAULT_ARCHIVE_EXTENSIONS],
    extraDateKeywords: parseList(env.RERANK_DATE_KEYWORDS),
    timeZone: resolveTimeZone(env.RERANK_TIME_ZONE, 'RERANK_TIME_ZONE'),
  };
}

export function loadKnowledgeBaseConfig(env: Env = process.env): KnowledgeBaseConfig {
  const baseUrl = (env.KNOWLEDGE_BASE_URL ?? '').trim().replace(/\/+$/, '');
  const knowledgeBaseId = (env.KNOWLEDGE_BASE_ID ?? '').trim();
  const resultCount = parseInt(env.RETRIEVAL_RESULT_COUNT ?? `${DEFAULT_RESULT_COUNT}`, 10);

  return {
    baseUrl,
    knowledgeBaseId,
    apiKey: env.KNOWLEDGE_BASE_API_KEY || undefined,
    resultCount: Number.isFinite(resultCount) && resultCount > 0 ? resultCount : DEFAULT_RESULT_COUNT,
    defaultDomain: env.KNOWLEDGE_BASE_DOMAIN?.trim() || undefined,
    domainLabels: parseDomainLabels(env.KNOWLEDGE_BASE_DOMAIN_LABELS),
    enabled: baseUrl.length > 0 && knowledgeBaseId.length > 0,
  };
}

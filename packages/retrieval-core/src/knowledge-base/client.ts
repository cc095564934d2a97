/**
 * FILE PURPOSE: HTTP client for the external knowledge-base retrieval service
 *
 * WHY: Passages come from a managed index. This client only asks for them;
 *      similarity scoring stays upstream.
 * HOW: REST over global fetch (no SDK). Always requests hybrid search so the
 *      reranker sees keyword-aware, higher-recall results. Fail-open: any
 *      failure writes a WARN line and resolves to null.
 */

import type { Passage } from '@kbchat/shared-types';
import type { KnowledgeBaseConfig } from '../config.js';
import type { RetrieveOptions, RetrieveRequest } from './types.js';
import { toPassages } from './mapper.js';

export interface KnowledgeBaseClient {
  readonly enabled: boolean;
  /** Ranked passages, best first, or null when the service is unavailable. */
  retrieve(query: string, options?: RetrieveOptions): Promise<Passage[] | null>;
}

export function buildRetrieveRequest(
  config: KnowledgeBaseConfig,
  query: string,
  options: RetrieveOptions = {},
): RetrieveRequest {
  const domain = options.domain ?? config.defaultDomain;
  const numberOfResults = options.numberOfResults ?? config.resultCount;

  return {
    knowledgeBaseId: config.knowledgeBaseId,
    retrievalQuery: { text: query },
    retrievalConfiguration: {
      vectorSearchConfiguration: {
        numberOfResults,
        overrideSearchType: 'HYBRID',
        ...(domain ? { filter: { equals: { key: 'domain', value: domain } } } : {}),
      },
    },
  };
}

export function createKnowledgeBaseClient(config: KnowledgeBaseConfig): KnowledgeBaseClient {
  return {
    enabled: config.enabled,

    async retrieve(query: string, options?: RetrieveOptions): Promise<Passage[] | null> {
      if (!config.enabled) {
        process.stderr.write('INFO: KNOWLEDGE_BASE_URL/KNOWLEDGE_BASE_ID not set — retrieval unavailable\n');
        return null;
      }

      try {
        const response = await fetch(`${config.baseUrl}/retrieve`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
          },
          body: JSON.stringify(buildRetrieveRequest(config, query, options)),
        });

        if (!response.ok) {
          process.stderr.write(`WARN: Knowledge base returned ${response.status}\n`);
          return null;
        }

        const json: unknown = await response.json();
        return toPassages(json);
      } catch (err) {
        process.stderr.write(`WARN: Knowledge base retrieval failed: ${err}\n`);
        return null;
      }
    },
  };
}

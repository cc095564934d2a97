/**
 * FILE PURPOSE: Retrieve API route — knowledge-base search, rerank, prompt context
 *
 * WHY: The chat front end sends only the question. This route fetches
 *      passages, fixes their order, and returns the numbered context the
 *      answer model consumes plus the matching citations.
 *
 * HOW: One district-wide retrieval, plus a smaller domain-scoped retrieval
 *      when the caller names a site domain. Each list is reranked on its own;
 *      the district list comes first in the context.
 *
 * Routes:
 *   POST /api/retrieve — { query, domain?, numberOfResults?, referenceDate? } → { context, sources, ... }
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Passage } from '@kbchat/shared-types';
import {
  createKnowledgeBaseClient,
  loadKnowledgeBaseConfig,
  loadRerankConfig,
  rerankGroups,
  toQuery,
  buildPromptContext,
} from '@kbchat/retrieval-core';
import { badRequest, handleRouteError, type BodyParser } from '../types.js';
import { parseQueryText, parseReferenceDate } from '../validation.js';

/** Results requested from a single site domain. */
const SCOPED_RESULT_COUNT = 10;
const MAX_RESULT_COUNT = 100;

export async function handleRetrieveRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  parseBody: BodyParser,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');

    if (parsedUrl.pathname === '/api/retrieve' && req.method === 'POST') {
      const body = await parseBody(req);
      const queryText = parseQueryText(body.query);
      const referenceNow = parseReferenceDate(body.referenceDate);
      if (!queryText.ok) return badRequest(res, queryText.error);
      if (!referenceNow.ok) return badRequest(res, referenceNow.error);

      const { domain, numberOfResults } = body;
      if (domain !== undefined && typeof domain !== 'string') {
        return badRequest(res, 'domain must be a string');
      }
      if (numberOfResults !== undefined
        && (typeof numberOfResults !== 'number' || !Number.isInteger(numberOfResults)
          || numberOfResults < 1 || numberOfResults > MAX_RESULT_COUNT)) {
        return badRequest(res, `numberOfResults must be an integer between 1 and ${MAX_RESULT_COUNT}`);
      }

      const kbConfig = loadKnowledgeBaseConfig();
      const client = createKnowledgeBaseClient(kbConfig);
      if (!client.enabled) {
        res.statusCode = 503;
        res.end(JSON.stringify({ error: 'Knowledge base not configured' }));
        return;
      }

      const main = await client.retrieve(
        queryText.value,
        typeof numberOfResults === 'number' ? { numberOfResults } : {},
      );
      if (!main) {
        res.statusCode = 502;
        res.end(JSON.stringify({ error: 'Retrieval service unavailable' }));
        return;
      }

      const groups: Passage[][] = [main];
      if (domain && domain !== kbConfig.defaultDomain) {
        // Scoped search is best-effort; the district results alone still answer.
        const scoped = await client.retrieve(queryText.value, { domain, numberOfResults: SCOPED_RESULT_COUNT });
        groups.push(scoped ?? []);
      }

      const rerankConfig = loadRerankConfig();
      const query = toQuery(queryText.value, rerankConfig.extraDateKeywords);
      const reranked = rerankGroups(groups, query, referenceNow.value, rerankConfig);
      const { context, sources } = buildPromptContext(reranked, { domainLabels: kbConfig.domainLabels });

      process.stdout.write(
        `INFO: retrieved ${sources.length} passages in ${groups.length} group(s), ` +
        `date-sensitive=${query.isDateSensitive}\n`,
      );

      res.statusCode = 200;
      res.end(JSON.stringify({
        query: query.text,
        dateSensitive: query.isDateSensitive,
        passageCount: sources.length,
        context,
        sources,
      }));
      return;
    }

    res.statusCode = 404;
    res.end(JSON.stringify({ error: 'Not found' }));
  } catch (err) {
    handleRouteError(res, 'retrieve', err);
  }
}

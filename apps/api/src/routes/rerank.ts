/**
 * FILE PURPOSE: Rerank API route — reorder caller-supplied passages
 *
 * WHY: Callers that run their own retrieval still want website-first,
 *      upcoming-first ordering before building a prompt.
 *
 * Routes:
 *   POST /api/rerank — { query, passages[], referenceDate? } → labelled passages in rerank order
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { rerankDetailed, loadRerankConfig } from '@kbchat/retrieval-core';
import { badRequest, handleRouteError, type BodyParser } from '../types.js';
import { parsePassages, parseQueryText, parseReferenceDate } from '../validation.js';

export async function handleRerankRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  parseBody: BodyParser,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');

    if (parsedUrl.pathname === '/api/rerank' && req.method === 'POST') {
      const body = await parseBody(req);
      const query = parseQueryText(body.query);
      const passages = parsePassages(body.passages);
      const referenceNow = parseReferenceDate(body.referenceDate);

      if (!query.ok) return badRequest(res, query.error);
      if (!passages.ok) return badRequest(res, passages.error);
      if (!referenceNow.ok) return badRequest(res, referenceNow.error);

      const result = rerankDetailed(passages.value, query.value, referenceNow.value, loadRerankConfig());
      process.stdout.write(
        `INFO: reranked ${result.passages.length} passages: ${result.websiteCount} website, ` +
        `${result.archiveCount} archive, date-sensitive=${result.query.isDateSensitive}\n`,
      );

      res.statusCode = 200;
      res.end(JSON.stringify({
        query: result.query.text,
        dateSensitive: result.query.isDateSensitive,
        websiteCount: result.websiteCount,
        archiveCount: result.archiveCount,
        passages: result.passages.map((r) => ({
          ...r.passage,
          sourceType: r.sourceType,
          dateRelevance: r.dateRelevance,
        })),
      }));
      return;
    }

    res.statusCode = 404;
    res.end(JSON.stringify({ error: 'Not found' }));
  } catch (err) {
    handleRouteError(res, 'rerank', err);
  }
}

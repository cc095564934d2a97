/**
 * FILE PURPOSE: Citation API route — strip the sources tag from an answer
 *
 * Routes:
 *   POST /api/citations — { responseText, sources[] } → { text, sources } (cited sources only)
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import { parseSourcesUsed, selectCitedSources } from '@kbchat/retrieval-core';
import { badRequest, handleRouteError, type BodyParser } from '../types.js';
import { parseCitations } from '../validation.js';

export async function handleCitationRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: string,
  parseBody: BodyParser,
): Promise<void> {
  try {
    const parsedUrl = new URL(url, 'http://localhost');

    if (parsedUrl.pathname === '/api/citations' && req.method === 'POST') {
      const body = await parseBody(req);
      if (typeof body.responseText !== 'string') {
        return badRequest(res, 'Required field: responseText (string)');
      }
      const sources = parseCitations(body.sources);
      if (!sources.ok) return badRequest(res, sources.error);

      const parsed = parseSourcesUsed(body.responseText);
      res.statusCode = 200;
      res.end(JSON.stringify({
        text: parsed.text,
        sources: selectCitedSources(sources.value, parsed.sourceNumbers),
      }));
      return;
    }

    res.statusCode = 404;
    res.end(JSON.stringify({ error: 'Not found' }));
  } catch (err) {
    handleRouteError(res, 'citations', err);
  }
}

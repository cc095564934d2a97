/**
 * FILE PURPOSE: Shared types and error handling for API route handlers
 *
 * WHY: BodyParser and the catch-block error handler are used by every route
 *      file. Centralising them here keeps the 500 path identical everywhere.
 */

import * as Sentry from '@sentry/node';
import type { IncomingMessage, ServerResponse } from 'node:http';

export type BodyParser = (req: IncomingMessage) => Promise<Record<string, unknown>>;

export function badRequest(res: ServerResponse, error: string): void {
  res.statusCode = 400;
  res.end(JSON.stringify({ error }));
}

export function handleRouteError(res: ServerResponse, routeName: string, err: unknown): void {
  process.stderr.write(`ERROR in ${routeName} routes: ${err}\n`);
  Sentry.captureException(err, { tags: { route: routeName } });
  if (!res.writableEnded) {
    res.statusCode = 500;
    res.end(JSON.stringify({ error: 'Internal server error' }));
  }
}

/**
 * FILE PURPOSE: HTTP request handling — CORS, health check, route dispatch
 *
 * WHY: Kept apart from server.ts so tests can start the server on an
 *      ephemeral port without triggering Sentry init or signal handlers.
 * HOW: Native Node.js HTTP server — zero framework deps.
 */

import { createServer, type IncomingMessage, type Server } from 'node:http';
import { loadKnowledgeBaseConfig } from '@kbchat/retrieval-core';
import { handleRerankRoutes } from './routes/rerank.js';
import { handleRetrieveRoutes } from './routes/retrieve.js';
import { handleCitationRoutes } from './routes/citations.js';

const startTime = Date.now();

/** Parse allowed origins from env var (comma-separated). */
function getAllowedOrigins(): Set<string> | null {
  const raw = process.env.ALLOWED_ORIGINS;
  if (!raw) return null;
  return new Set(raw.split(',').map((o) => o.trim()).filter(Boolean));
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse JSON body from incoming request. Malformed or non-object bodies become {}. */
export function parseBody(req: IncomingMessage): Promise<Record<string, unknown>> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString());
        resolve(isJsonObject(parsed) ? parsed : {});
      } catch {
        resolve({});
      }
    });
    req.on('error', () => resolve({}));
  });
}

export function createApiServer(): Server {
  return createServer(async (req, res) => {
    res.setHeader('Content-Type', 'application/json');

    // ─── CORS with origin restriction ───
    const allowedOrigins = getAllowedOrigins();
    const requestOrigin = req.headers.origin;

    if (allowedOrigins && requestOrigin) {
      if (allowedOrigins.has(requestOrigin)) {
        res.setHeader('Access-Control-Allow-Origin', requestOrigin);
      }
      // Unlisted origin: no header, the browser blocks the response
    } else {
      res.setHeader('Access-Control-Allow-Origin', '*');
    }

    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');

    // CORS preflight
    if (req.method === 'OPTIONS') {
      res.statusCode = 204;
      res.end();
      return;
    }

    const url = req.url ?? '';

    // ─── Health check (used by load balancers and Docker HEALTHCHECK) ───
    if (url === '/api/health') {
      const knowledgeBase = loadKnowledgeBaseConfig().enabled ? 'configured' : 'unconfigured';
      res.statusCode = 200;
      res.end(JSON.stringify({
        status: 'ok',
        timestamp: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startTime) / 1000),
        services: { knowledgeBase },
      }));
      return;
    }

    if (url.startsWith('/api/rerank')) {
      await handleRerankRoutes(req, res, url, parseBody);
      return;
    }

    if (url.startsWith('/api/retrieve')) {
      await handleRetrieveRoutes(req, res, url, parseBody);
      return;
    }

    if (url.startsWith('/api/citations')) {
      await handleCitationRoutes(req, res, url, parseBody);
      return;
    }

    res.statusCode = 404;
    res.end(JSON.stringify({ error: 'Not found' }));
  });
}

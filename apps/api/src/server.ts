/**
 * FILE PURPOSE: API server entry point — Sentry, listen, graceful shutdown
 *
 * WHY: Process-level concerns live here; request handling lives in app.ts.
 */

import * as Sentry from '@sentry/node';
import { createApiServer } from './app.js';

// Sentry — no-op when DSN not set
const sentryDsn = process.env.SENTRY_DSN;
if (sentryDsn) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.NODE_ENV ?? 'production',
    tracesSampleRate: 0.2,
    sendDefaultPii: false,
  });
}

const PORT = parseInt(process.env.PORT ?? '3002', 10);

const server = createApiServer();

server.listen(PORT, () => {
  process.stdout.write(`API server running on port ${PORT}\n`);
});

async function shutdown(): Promise<void> {
  process.stdout.write('SIGTERM received — shutting down gracefully\n');

  const forceExitTimer = setTimeout(() => {
    process.stderr.write('WARN: Graceful shutdown timed out after 30s — forcing exit\n');
    process.exit(1);
  }, 30_000);
  forceExitTimer.unref();

  try {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
    process.stdout.write('  Server closed\n');

    await Sentry.close(2_000);
    process.stdout.write('Shutdown complete\n');
  } catch (err) {
    process.stderr.write(`ERROR during shutdown: ${err}\n`);
  }
}

process.on('SIGTERM', () => {
  void shutdown();
});

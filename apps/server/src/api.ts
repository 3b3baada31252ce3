import type { Server } from 'net';
import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';
import type { DNSServer } from './dns-server.js';
import { toError } from './errors.js';
import { logger } from './logger.js';

const DEFAULT_QUERY_LIMIT = 100;
const MAX_QUERY_LIMIT = 1000;

/**
 * In production, error details stay in the server log
 */
function sanitizeErrorMessage(error: unknown, defaultMessage: string): string {
  if (process.env.NODE_ENV === 'production') {
    return defaultMessage;
  }
  return toError(error).message;
}

/**
 * Read-only HTTP status API over a running DNS server
 */
export function createApp(dnsServer: DNSServer): Hono {
  const app = new Hono();

  app.get('/health', (c) => {
    const health = dnsServer.getHealth();
    return c.json(health, health.status === 'unhealthy' ? 503 : 200);
  });

  // Always 200 so dashboards get the body even when the server is unhealthy
  app.get('/api/health', (c) => c.json(dnsServer.getHealth(), 200));

  app.get('/api/stats', (c) => c.json(dnsServer.getStats()));

  app.get('/api/queries', (c) => {
    const limitParam = c.req.query('limit');
    let limit = DEFAULT_QUERY_LIMIT;
    if (limitParam !== undefined) {
      if (!/^\d+$/.test(limitParam)) {
        return c.json({ error: 'limit must be a positive integer' }, 400);
      }
      limit = Math.min(Math.max(parseInt(limitParam, 10), 1), MAX_QUERY_LIMIT);
    }
    return c.json(dnsServer.getQueries(limit));
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    logger.error('Request error', error, { path: c.req.path, method: c.req.method });
    return c.json({ error: sanitizeErrorMessage(error, 'An error occurred') }, 500);
  });

  return app;
}

export interface ApiServer {
  server: ServerType;
  port: number;
}

/**
 * Serve the status API. Rejects when the port cannot be bound; later server
 * errors are logged.
 */
export function startApiServer(dnsServer: DNSServer, port: number): Promise<ApiServer> {
  const app = createApp(dnsServer);

  return new Promise<ApiServer>((resolve, reject) => {
    let listening = false;
    const server = serve({ fetch: app.fetch, port }, (info) => {
      listening = true;
      logger.info('API server running', { port: info.port, url: `http://localhost:${info.port}` });
      resolve({ server, port: info.port });
    });

    const httpServer: Server = server;
    httpServer.on('error', (error: Error) => {
      if (listening) {
        logger.error('API server error', error);
      } else {
        reject(error);
      }
    });
  });
}

export function closeApiServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Hono web server: webhook intake for chat transports and the read-only
 * stone map API.
 *
 * @module web/server
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';

import type { ConversationService } from '../bot/conversation.js';
import { debug } from '../shared/debug.js';
import type { Registry } from '../storage/registry.js';
import type { AppEnv } from './env.js';
import { eventRoutes } from './routes/events.js';
import { stoneRoutes } from './routes/stones.js';

export interface WebServerDeps {
  registry: Registry;
  conversation: ConversationService;
  /** Required value of the `x-stonetrail-secret` header on webhook calls. */
  webhookSecret: string | null;
}

/**
 * Creates a configured Hono app with middleware and route registration.
 */
export function createWebServer(deps: WebServerDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // CORS for a map page served from localhost
  app.use(
    '*',
    cors({
      origin: (origin) => {
        if (!origin) return '*';
        if (origin.startsWith('http://localhost:') || origin.startsWith('http://127.0.0.1:')) {
          return origin;
        }
        return null;
      },
    }),
  );

  app.use('*', async (c, next) => {
    c.set('registry', deps.registry);
    c.set('conversation', deps.conversation);
    c.set('webhookSecret', deps.webhookSecret);
    await next();
  });

  app.get('/api/health', (c) => {
    return c.json({ status: 'ok', timestamp: Date.now(), stones: c.get('registry').count() });
  });

  app.route('/api', stoneRoutes);
  app.route('/api', eventRoutes);

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    debug('web', 'Request failed', { path: c.req.path, error: err.message });
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

/**
 * Maximum number of alternate ports to try when the primary port is in use.
 */
const MAX_PORT_RETRIES = 10;

/**
 * Starts the Hono web server on the specified port.
 *
 * If the port is already in use (EADDRINUSE), tries incrementing ports up to
 * MAX_PORT_RETRIES times. If all ports fail, logs and continues without the
 * web server; the MCP transport keeps working.
 */
export function startWebServer(
  app: Hono<AppEnv>,
  port: number = 37830,
): ReturnType<typeof serve> {
  debug('web', `Starting web server on port ${port}`);

  function tryListen(attemptPort: number, retries: number): ReturnType<typeof serve> {
    const server = serve({
      fetch: app.fetch,
      port: attemptPort,
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE' && retries > 0) {
        server.close();
        const nextPort = attemptPort + 1;
        debug('web', `Port ${attemptPort} in use, trying ${nextPort}`);
        tryListen(nextPort, retries - 1);
      } else if (err.code === 'EADDRINUSE') {
        server.close();
        debug('web', `Web server disabled: all ports ${port}-${attemptPort} in use`);
      } else {
        debug('web', `Web server error: ${err.message}`);
      }
    });

    server.on('listening', () => {
      const addr = server.address();
      const actualPort = typeof addr === 'object' && addr ? addr.port : attemptPort;
      debug('web', `Web server listening on http://localhost:${actualPort}`);
    });

    return server;
  }

  return tryListen(port, MAX_PORT_RETRIES);
}

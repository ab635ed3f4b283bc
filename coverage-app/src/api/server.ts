import Fastify from 'fastify';
import { GdeltDocClient } from '../../../src/index.js';
import type { DocClient } from '../../../src/index.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerArticleRoutes } from '../features/articles/routes.js';
import { registerTimelineRoutes } from '../features/timeline/routes.js';

export interface ServerOptions {
  /** Defaults to a GdeltDocClient that logs through the server's logger. */
  client?: DocClient;
  docApiUrl?: string;
  logLevel?: string;
}

export function buildServer(options: ServerOptions = {}) {
  const app = Fastify({ logger: { level: options.logLevel ?? 'info' } });

  const client = options.client ?? new GdeltDocClient({
    ...(options.docApiUrl !== undefined ? { baseUrl: options.docApiUrl } : {}),
    onRequest: (mode, url) => app.log.debug({ mode, url }, 'Doc API request'),
    onError: (mode, err) => app.log.warn({ mode, err }, 'Doc API request failed'),
  });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerArticleRoutes(instance, client);
    await registerTimelineRoutes(instance, client);
  }, { prefix });

  return app;
}

/**
 * HTTP server: Fastify instance with the CRM routes mounted
 */

import Fastify, { type FastifyInstance } from 'fastify';
import { getConfig } from '../config/config.js';
import type { Config } from '../types/index.js';
import { apiLogger } from '../utils/logger.js';
import { apiRoutes, type ApiDependencies } from './routes.js';

export async function createServer(deps: ApiDependencies, config: Config = getConfig()): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // pino via apiLogger
    bodyLimit: config.api.body_limit_bytes,
  });

  app.addHook('onResponse', (request, reply, done) => {
    apiLogger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        elapsedMs: Math.round(reply.elapsedTime),
      },
      'Request completed'
    );
    done();
  });

  await app.register(apiRoutes, { deps, fileSizeLimit: config.api.body_limit_bytes });
  return app;
}

/**
 * Start listening and close the server and database on SIGINT/SIGTERM.
 */
export async function startServer(deps: ApiDependencies, config: Config = getConfig()): Promise<FastifyInstance> {
  const app = await createServer(deps, config);
  const address = await app.listen({ host: config.api.host, port: config.api.port });
  apiLogger.info({ address }, 'CRM API listening');

  const shutdown = (signal: string): void => {
    apiLogger.info({ signal }, 'Shutting down');
    app
      .close()
      .then(() => deps.db.close())
      .catch((error: unknown) => {
        apiLogger.error({ error: String(error) }, 'Error during shutdown');
        process.exitCode = 1;
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return app;
}

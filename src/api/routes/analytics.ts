/* eslint-disable @typescript-eslint/require-await */
import type { FastifyPluginAsync } from 'fastify';
import type { ApiRouteOptions } from './shared.js';

/**
 * Analytics and health endpoints
 */
export const analyticsRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options): Promise<void> => {
  const { deps } = options;

  fastify.get('/api/health', async (_request, reply) => {
    const databaseOpen = deps.db.isOpen;
    if (!databaseOpen) {
      reply.code(503);
    }
    return {
      status: databaseOpen ? 'healthy' : 'unavailable',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  fastify.get('/api/analytics/overview', async () => {
    return deps.analytics.overview();
  });
};

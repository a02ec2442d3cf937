/* eslint-disable @typescript-eslint/require-await */
import type { FastifyPluginAsync } from 'fastify';
import type { ApiRouteOptions } from './shared.js';

/**
 * CSV export: same filters and sort as the customer list, no page limit
 */
export const exportRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options): Promise<void> => {
  const { deps } = options;

  fastify.get('/api/export/customers.csv', async (request, reply) => {
    const stream = deps.exporter.stream(request.query);
    return reply
      .type('text/csv; charset=utf-8')
      .header('content-disposition', 'attachment; filename="customers.csv"')
      .send(stream);
  });
};

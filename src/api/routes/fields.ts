/* eslint-disable @typescript-eslint/require-await */
import type { FastifyPluginAsync } from 'fastify';
import type { ApiRouteOptions } from './shared.js';

type FieldParams = { Params: { key: string } };

/**
 * Custom field definition endpoints
 */
export const fieldRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options): Promise<void> => {
  const { deps } = options;

  fastify.get('/api/fields', async () => {
    return { items: deps.fields.list() };
  });

  fastify.post<{ Body: unknown }>('/api/fields', async (request, reply) => {
    const definition = deps.fields.create(request.body);
    reply.code(201);
    return definition;
  });

  fastify.get<FieldParams>('/api/fields/:key', async (request) => {
    return deps.fields.get(request.params.key);
  });

  fastify.put<FieldParams & { Body: unknown }>('/api/fields/:key', async (request) => {
    return deps.fields.update(request.params.key, request.body);
  });

  fastify.delete<FieldParams>('/api/fields/:key', async (request) => {
    deps.fields.delete(request.params.key);
    return { deleted: true };
  });
};

/* eslint-disable @typescript-eslint/require-await */
import type { FastifyPluginAsync } from 'fastify';
import type { ApiRouteOptions } from './shared.js';
import { toListResponse } from './shared.js';

type CustomerParams = { Params: { id: string } };

/**
 * Customer endpoints: list, CRUD
 */
export const customerRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options): Promise<void> => {
  const { deps } = options;

  fastify.get('/api/customers', async (request) => {
    return toListResponse(deps.customers.list(request.query));
  });

  fastify.post<{ Body: unknown }>('/api/customers', async (request, reply) => {
    const customer = deps.customers.create(request.body);
    reply.code(201);
    return customer;
  });

  fastify.get<CustomerParams>('/api/customers/:id', async (request) => {
    return deps.customers.get(request.params.id);
  });

  const update = async (request: { params: { id: string }; body: unknown }) =>
    deps.customers.update(request.params.id, request.body);

  fastify.patch<CustomerParams & { Body: unknown }>('/api/customers/:id', update);
  fastify.put<CustomerParams & { Body: unknown }>('/api/customers/:id', update);

  fastify.delete<CustomerParams>('/api/customers/:id', async (request) => {
    deps.customers.delete(request.params.id);
    return { deleted: true };
  });
};

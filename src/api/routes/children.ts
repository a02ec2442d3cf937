/* eslint-disable @typescript-eslint/require-await */
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { Page } from '../../domain/schemas.js';
import type { ApiRouteOptions } from './shared.js';
import { toListResponse } from './shared.js';

/** The shape shared by the interaction, opportunity and task services. */
export interface CustomerChildService<T> {
  list(customerId: string, query: unknown): Page<T>;
  get(customerId: string, id: string): T;
  create(customerId: string, payload: unknown): T;
  update(customerId: string, id: string, payload: unknown): T;
  delete(customerId: string, id: string): void;
}

type CollectionParams = { Params: { id: string } };
type ItemParams = { Params: { id: string; childId: string } };

function registerChildRoutes<T>(fastify: FastifyInstance, segment: string, service: CustomerChildService<T>): void {
  const collection = `/api/customers/:id/${segment}`;
  const item = `${collection}/:childId`;

  fastify.get<CollectionParams>(collection, async (request) => {
    return toListResponse(service.list(request.params.id, request.query));
  });

  fastify.post<CollectionParams & { Body: unknown }>(collection, async (request, reply) => {
    const created = service.create(request.params.id, request.body);
    reply.code(201);
    return created;
  });

  fastify.get<ItemParams>(item, async (request) => {
    return service.get(request.params.id, request.params.childId);
  });

  fastify.patch<ItemParams & { Body: unknown }>(item, async (request) => {
    return service.update(request.params.id, request.params.childId, request.body);
  });

  fastify.delete<ItemParams>(item, async (request) => {
    service.delete(request.params.id, request.params.childId);
    return { deleted: true };
  });
}

/**
 * Nested customer endpoints: interactions, opportunities, tasks
 */
export const customerChildRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options): Promise<void> => {
  const { deps } = options;

  registerChildRoutes(fastify, 'interactions', deps.interactions);
  registerChildRoutes(fastify, 'opportunities', deps.opportunities);
  registerChildRoutes(fastify, 'tasks', deps.tasks);
};

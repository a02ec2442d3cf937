/* eslint-disable @typescript-eslint/require-await */
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import multipart from '@fastify/multipart';
import { getConfig } from '../config/config.js';
import { registerErrorHandler } from './errors.js';
import type { ApiRouteOptions } from './routes/shared.js';
import { analyticsRoutes } from './routes/analytics.js';
import { customerChildRoutes } from './routes/children.js';
import { customerRoutes } from './routes/customers.js';
import { exportRoutes } from './routes/exports.js';
import { fieldRoutes } from './routes/fields.js';
import { importRoutes } from './routes/imports.js';

export type { ApiDependencies, ApiRouteOptions } from './routes/shared.js';

/**
 * REST API routes plugin for the CRM
 * All routes are prefixed with /api
 */
export const apiRoutes: FastifyPluginAsync<ApiRouteOptions> = async (
  fastify: FastifyInstance,
  options: ApiRouteOptions
): Promise<void> => {
  registerErrorHandler(fastify);

  await fastify.register(multipart, {
    limits: {
      fileSize: options.fileSizeLimit ?? getConfig().api.body_limit_bytes,
      files: 1,
    },
  });

  await fastify.register(analyticsRoutes, options);
  await fastify.register(customerRoutes, options);
  await fastify.register(customerChildRoutes, options);
  await fastify.register(fieldRoutes, options);
  await fastify.register(importRoutes, options);
  await fastify.register(exportRoutes, options);
};

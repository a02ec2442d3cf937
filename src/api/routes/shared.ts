import type { FastifyPluginOptions } from 'fastify';
import type { CrmServices } from '../../services/index.js';
import type { Page } from '../../domain/schemas.js';

export type ApiDependencies = CrmServices;

export interface ApiRouteOptions extends FastifyPluginOptions {
  deps: ApiDependencies;
  /** Upload size cap for multipart files; defaults to the configured body limit. */
  fileSizeLimit?: number;
}

export interface ListResponse<T> {
  items: T[];
  total: number;
  page: number;
  page_size: number;
}

export function toListResponse<T>(page: Page<T>): ListResponse<T> {
  return { items: page.items, total: page.total, page: page.page, page_size: page.pageSize };
}

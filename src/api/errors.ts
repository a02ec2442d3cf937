import type { FastifyError, FastifyInstance } from 'fastify';
import { ConflictError, CrmError, NotFoundError, ValidationError, type ValidationIssue } from '../domain/errors.js';
import { apiLogger, formatError } from '../utils/logger.js';

export interface ErrorBody {
  error: string;
  code: string;
  details?: ValidationIssue[];
}

export function statusForError(error: CrmError): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof ConflictError) return 409;
  return 500;
}

/**
 * Map domain errors onto HTTP responses. Fastify's own client errors keep
 * their status; anything else is a logged 500.
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | CrmError, request, reply) => {
    if (error instanceof CrmError) {
      const status = statusForError(error);
      const body: ErrorBody = { error: error.message, code: error.code };
      if (error instanceof ValidationError && error.issues.length > 0) {
        body.details = error.issues;
      }
      if (status >= 500) {
        apiLogger.error({ err: formatError(error), method: request.method, url: request.url }, 'Request failed');
      }
      return reply.code(status).send(body);
    }

    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode < 500) {
      const body: ErrorBody = { error: error.message, code: error.code ?? 'BAD_REQUEST' };
      return reply.code(statusCode).send(body);
    }

    apiLogger.error({ err: formatError(error), method: request.method, url: request.url }, 'Unhandled request error');
    const body: ErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' };
    return reply.code(500).send(body);
  });
}

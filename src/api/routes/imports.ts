/* eslint-disable @typescript-eslint/require-await */
import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { ImportOptionsSchema, type ImportOptions } from '../../import/customer-importer.js';
import { NotFoundError, ValidationError } from '../../domain/errors.js';
import type { ApiRouteOptions } from './shared.js';

interface ImportUpload {
  content: Buffer;
  options: ImportOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formValue(part: unknown): unknown {
  const first: unknown = Array.isArray(part) ? part[0] : part;
  return isRecord(first) && first.type === 'field' ? first.value : undefined;
}

/**
 * Accept a raw CSV body (text/csv, or text/plain as a string) or a multipart
 * upload with a `file` part.
 * Options come from the query string, overridden by multipart form fields.
 */
async function readUpload(request: FastifyRequest): Promise<ImportUpload> {
  const query: Record<string, unknown> = isRecord(request.query) ? { ...request.query } : {};
  let content: Buffer;

  if (request.isMultipart()) {
    const file = await request.file();
    if (!file) {
      throw ValidationError.forField('file', 'A CSV file is required');
    }
    content = await file.toBuffer();
    for (const name of ['mode', 'auto_create_fields']) {
      const value = formValue(file.fields[name]);
      if (value !== undefined) query[name] = value;
    }
  } else if (Buffer.isBuffer(request.body)) {
    content = request.body;
  } else if (typeof request.body === 'string') {
    content = Buffer.from(request.body, 'utf-8');
  } else {
    throw ValidationError.forField('file', 'Send the CSV as text/csv or as a multipart file');
  }

  const options = ImportOptionsSchema.safeParse(query);
  if (!options.success) {
    throw ValidationError.fromZod(options.error, 'Invalid import options');
  }
  return { content, options: options.data };
}

/**
 * CSV import endpoints: dry-run, commit, report download
 */
export const importRoutes: FastifyPluginAsync<ApiRouteOptions> = async (fastify, options): Promise<void> => {
  const { deps } = options;

  fastify.addContentTypeParser(
    ['text/csv', 'application/csv', 'application/octet-stream'],
    { parseAs: 'buffer' },
    (_request, body, done) => {
      done(null, body);
    }
  );

  fastify.post('/api/import/customers/dry-run', async (request) => {
    const upload = await readUpload(request);
    return deps.importer.dryRun(upload.content, upload.options);
  });

  fastify.post('/api/import/customers', async (request) => {
    const upload = await readUpload(request);
    return deps.importer.commit(upload.content, upload.options);
  });

  fastify.get<{ Params: { file: string } }>('/api/import/reports/:file', async (request, reply) => {
    const { file } = request.params;
    const token = file.endsWith('.csv') ? file.slice(0, -'.csv'.length) : '';
    const report = token ? deps.reports.fetch(token) : null;
    if (report === null) {
      throw new NotFoundError('Import report', file);
    }

    return reply
      .type('text/csv; charset=utf-8')
      .header('content-disposition', `attachment; filename="import-report-${token}.csv"`)
      .send(report);
  });
};

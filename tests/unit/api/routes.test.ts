import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { apiRoutes } from '../../../src/api/routes.js';
import { createServer } from '../../../src/api/server.js';
import { DEFAULT_CONFIG } from '../../../src/config/config.js';
import { createTestCrm, readCsvRecords, type TestCrm } from '../../helpers/crm.js';

describe('API Routes', () => {
  let fastify: FastifyInstance;
  let crm: TestCrm;

  beforeEach(async () => {
    crm = createTestCrm();
    fastify = Fastify();
    await fastify.register(apiRoutes, { deps: crm.services });
  });

  afterEach(async () => {
    await fastify.close();
    crm.db.close();
  });

  async function createCustomer(payload: Record<string, unknown>): Promise<string> {
    const response = await fastify.inject({ method: 'POST', url: '/api/customers', payload });
    expect(response.statusCode).toBe(201);
    return JSON.parse(response.body).id;
  }

  describe('Health endpoints', () => {
    it('should report healthy while the database is open', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.timestamp).toBeDefined();
      expect(body.uptime).toBeGreaterThanOrEqual(0);
    });

    it('should report 503 once the database is closed', async () => {
      crm.db.close();
      const response = await fastify.inject({ method: 'GET', url: '/api/health' });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body).status).toBe('unavailable');
    });
  });

  describe('Customer endpoints', () => {
    it('should create and fetch a customer', async () => {
      const id = await createCustomer({ name: 'Ada', email: 'ada@example.com' });
      const response = await fastify.inject({ method: 'GET', url: `/api/customers/${id}` });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.name).toBe('Ada');
      expect(body.status).toBe('lead');
      expect(body.custom).toEqual({});
    });

    it('should return 400 with issue details for an invalid payload', async () => {
      const response = await fastify.inject({ method: 'POST', url: '/api/customers', payload: { email: 'bad' } });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.error).toBe('Invalid customer');
      expect(body.details).toEqual([
        { path: 'name', message: 'Required' },
        { path: 'email', message: 'Invalid email format' },
      ]);
    });

    it('should return 404 for an unknown customer', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/customers/missing' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: 'Customer not found: missing', code: 'NOT_FOUND' });
    });

    it('should return 409 for a duplicate email', async () => {
      await createCustomer({ name: 'Ada', email: 'ada@example.com' });
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/customers',
        payload: { name: 'Other', email: 'ADA@example.com' },
      });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body).code).toBe('CONFLICT');
    });

    it('should apply partial updates with PATCH and PUT', async () => {
      const id = await createCustomer({ name: 'Ada', company: 'Analytical' });

      const patched = await fastify.inject({ method: 'PATCH', url: `/api/customers/${id}`, payload: { status: 'active' } });
      expect(patched.statusCode).toBe(200);
      expect(JSON.parse(patched.body)).toMatchObject({ name: 'Ada', company: 'Analytical', status: 'active' });

      const put = await fastify.inject({ method: 'PUT', url: `/api/customers/${id}`, payload: { company: null } });
      expect(JSON.parse(put.body)).toMatchObject({ company: null, status: 'active' });
    });

    it('should list with a pagination envelope', async () => {
      for (let i = 1; i <= 3; i++) {
        await createCustomer({ name: `Customer ${i}`, tags: i === 2 ? ['vip'] : [] });
      }

      const response = await fastify.inject({ method: 'GET', url: '/api/customers?page=2&page_size=2' });
      const body = JSON.parse(response.body);
      expect(body.total).toBe(3);
      expect(body.page).toBe(2);
      expect(body.page_size).toBe(2);
      expect(body.items.map((item: { name: string }) => item.name)).toEqual(['Customer 3']);

      const tagged = JSON.parse((await fastify.inject({ method: 'GET', url: '/api/customers?tag=vip' })).body);
      expect(tagged.items.map((item: { name: string }) => item.name)).toEqual(['Customer 2']);
    });

    it('should reject an unknown sort field', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/customers?sort_by=secret' });
      expect(response.statusCode).toBe(400);
    });

    it('should delete a customer with its children', async () => {
      const id = await createCustomer({ name: 'Ada' });
      const created = await fastify.inject({
        method: 'POST',
        url: `/api/customers/${id}/interactions`,
        payload: { type: 'call', happenedAt: '2024-01-01T10:00:00Z' },
      });
      const interactionId = JSON.parse(created.body).id;

      const deleted = await fastify.inject({ method: 'DELETE', url: `/api/customers/${id}` });
      expect(JSON.parse(deleted.body)).toEqual({ deleted: true });

      const child = await fastify.inject({ method: 'GET', url: `/api/customers/${id}/interactions/${interactionId}` });
      expect(child.statusCode).toBe(404);

      const list = await fastify.inject({ method: 'GET', url: `/api/customers/${id}/interactions` });
      expect(JSON.parse(list.body).items).toEqual([]);
    });
  });

  describe('Nested endpoints', () => {
    it('should return 404 when the customer does not exist', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/customers/missing/tasks',
        payload: { remindAt: '2024-05-01', content: 'Call back' },
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error).toBe('Customer not found: missing');
    });

    it('should create, update and delete an opportunity', async () => {
      const id = await createCustomer({ name: 'Ada' });
      const created = await fastify.inject({
        method: 'POST',
        url: `/api/customers/${id}/opportunities`,
        payload: { name: 'Renewal', amount: 500 },
      });
      expect(created.statusCode).toBe(201);
      const opportunityId = JSON.parse(created.body).id;

      const patched = await fastify.inject({
        method: 'PATCH',
        url: `/api/customers/${id}/opportunities/${opportunityId}`,
        payload: { status: 'won' },
      });
      expect(JSON.parse(patched.body)).toMatchObject({ status: 'won', amount: 500 });

      const deleted = await fastify.inject({ method: 'DELETE', url: `/api/customers/${id}/opportunities/${opportunityId}` });
      expect(deleted.statusCode).toBe(200);
    });
  });

  describe('Field endpoints', () => {
    it('should refuse to delete a field in use', async () => {
      const created = await fastify.inject({
        method: 'POST',
        url: '/api/fields',
        payload: { key: 'score', label: 'Score', type: 'number' },
      });
      expect(created.statusCode).toBe(201);
      await createCustomer({ name: 'Ada', custom: { score: 3 } });

      const response = await fastify.inject({ method: 'DELETE', url: '/api/fields/score' });
      expect(response.statusCode).toBe(409);

      const list = JSON.parse((await fastify.inject({ method: 'GET', url: '/api/fields' })).body);
      expect(list.items.map((field: { key: string }) => field.key)).toEqual(['score']);
    });
  });

  describe('Import endpoints', () => {
    const csv = 'name,email\nAda,ada@example.com\n,nameless@example.com\n';

    it('should dry-run a text/csv body', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/import/customers/dry-run',
        headers: { 'content-type': 'text/csv' },
        payload: csv,
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body).toMatchObject({ total: 2, valid: 1, invalid: 1 });
      expect(body.errors).toEqual([{ row: 2, message: 'name: Required' }]);
      expect(crm.services.customers.count()).toBe(0);
    });

    it('should commit and serve the report', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/import/customers',
        headers: { 'content-type': 'text/csv' },
        payload: csv,
      });
      const result = JSON.parse(response.body);
      expect(result).toMatchObject({ created: 1, updated: 0, skipped: 0, failed: 1 });

      const report = await fastify.inject({ method: 'GET', url: result.report_url });
      expect(report.statusCode).toBe(200);
      expect(report.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(report.body.trimEnd().split('\n')).toEqual([
        'name,email,status,message',
        'Ada,ada@example.com,created,',
        ',nameless@example.com,failed,name: Required',
      ]);
    });

    it('should accept a multipart upload with form options', async () => {
      await createCustomer({ name: 'Ada', email: 'ada@example.com' });
      const boundary = 'crmtestboundary';
      const payload = [
        `--${boundary}`,
        'Content-Disposition: form-data; name="mode"',
        '',
        'create_only',
        `--${boundary}`,
        'Content-Disposition: form-data; name="file"; filename="customers.csv"',
        'Content-Type: text/csv',
        '',
        'name,email\nAda,ada@example.com\nBob,bob@example.com',
        `--${boundary}--`,
        '',
      ].join('\r\n');

      const response = await fastify.inject({
        method: 'POST',
        url: '/api/import/customers',
        headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
        payload,
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toMatchObject({ created: 1, skipped: 1, failed: 0 });
    });

    it('should cap multipart uploads at the server body limit', async () => {
      const server = await createServer(crm.services, {
        ...DEFAULT_CONFIG,
        api: { ...DEFAULT_CONFIG.api, body_limit_bytes: 16 },
      });
      const boundary = 'crmtestboundary';
      const payload = [
        `--${boundary}`,
        'Content-Disposition: form-data; name="file"; filename="customers.csv"',
        'Content-Type: text/csv',
        '',
        'name,email\nAda,ada@example.com\nBob,bob@example.com',
        `--${boundary}--`,
        '',
      ].join('\r\n');

      try {
        const response = await server.inject({
          method: 'POST',
          url: '/api/import/customers/dry-run',
          headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
          payload,
        });

        expect(response.statusCode).toBe(413);
        expect(crm.services.customers.count()).toBe(0);
      } finally {
        await server.close();
      }
    });

    it('should return 400 for a file without a name column', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/api/import/customers',
        headers: { 'content-type': 'text/csv' },
        payload: 'email\na@example.com\n',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('Missing required column: name');
    });

    it('should return 404 for an unknown report', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/import/reports/unknown.csv' });
      expect(response.statusCode).toBe(404);
    });
  });

  describe('Export and analytics endpoints', () => {
    it('should stream matching customers as CSV', async () => {
      await createCustomer({ name: 'Ada', status: 'active' });
      await createCustomer({ name: 'Bob' });

      const response = await fastify.inject({ method: 'GET', url: '/api/export/customers.csv?status=active' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      const records = readCsvRecords(response.body);
      expect(records.map((record) => record.name)).toEqual(['Ada']);
    });

    it('should include email and phone only with include_private', async () => {
      await createCustomer({ name: 'Ada', email: 'ada@example.com' });

      const masked = await fastify.inject({ method: 'GET', url: '/api/export/customers.csv' });
      expect(readCsvRecords(masked.body)[0].email).toBe('');

      const full = await fastify.inject({ method: 'GET', url: '/api/export/customers.csv?include_private=true' });
      expect(readCsvRecords(full.body)[0].email).toBe('ada@example.com');
    });

    it('should return 400 for a malformed export window', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/api/export/customers.csv?from=soon' });
      expect(response.statusCode).toBe(400);
    });

    it('should return the overview counts', async () => {
      await createCustomer({ name: 'Ada' });
      const response = await fastify.inject({ method: 'GET', url: '/api/analytics/overview' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toMatchObject({ total_customers: 1, lead_count: 1, overdue_task_count: 0 });
    });
  });
});

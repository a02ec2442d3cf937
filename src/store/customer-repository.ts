/**
 * Customer Repository
 *
 * SQL for the customers table and the per-customer custom field values.
 * Custom values are read and written here as their stored text; the service
 * layer owns encoding them against the field definitions.
 */

import { z } from 'zod';
import type { CrmDatabase } from './database.js';
import { type PageRequest, isPastEnd, type SqlParams, WhereClause, containsPattern } from './query.js';
import {
  CustomerStatusSchema,
  type Customer,
  type CustomerSortField,
  type CustomerStatus,
  type SortDirection,
} from '../domain/schemas.js';
import type { NaturalKey } from '../types/index.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type CustomerRecord = Omit<Customer, 'custom'>;

export interface CustomerFilters {
  search?: string;
  status?: CustomerStatus;
  tags?: string[];
  company?: string;
  /** Exclusive bounds on last_interacted_at. */
  lastInteractedBefore?: string;
  lastInteractedAfter?: string;
  /** Inclusive bounds on last_interacted_at. */
  lastInteractedFrom?: string;
  lastInteractedTo?: string;
}

export interface CustomerSort {
  field?: CustomerSortField;
  direction?: SortDirection;
}

export interface StoredFieldValue {
  fieldKey: string;
  value: string;
}

interface CustomerRow {
  id: string;
  name: string;
  company: string | null;
  title: string | null;
  email: string | null;
  phone: string | null;
  note: string | null;
  status: string;
  tags: string;
  last_interacted_at: string | null;
  created_at: string;
  updated_at: string;
}

interface FieldValueRow {
  customer_id: string;
  field_key: string;
  value: string;
}

const StoredTagsSchema = z.array(z.string()).catch([]);

const SORT_COLUMNS: Record<CustomerSortField, string> = {
  name: 'c.name COLLATE NOCASE',
  company: 'c.company COLLATE NOCASE',
  email: 'c.email COLLATE NOCASE',
  status: 'c.status',
  created_at: 'c.created_at',
  updated_at: 'c.updated_at',
  last_interacted_at: 'c.last_interacted_at',
};

// ─── CustomerRepository ─────────────────────────────────────────────────────

export class CustomerRepository {
  constructor(private readonly db: CrmDatabase) {}

  insert(record: CustomerRecord): void {
    this.db.run('customer.insert', (db) => {
      db.prepare<SqlParams>(`
        INSERT INTO customers (id, name, company, title, email, phone, note, status, tags, last_interacted_at, created_at, updated_at)
        VALUES (@id, @name, @company, @title, @email, @phone, @note, @status, @tags, @last_interacted_at, @created_at, @updated_at)
      `).run(toParams(record));
    });
  }

  update(record: CustomerRecord): void {
    this.db.run('customer.update', (db) => {
      db.prepare<SqlParams>(`
        UPDATE customers SET
          name = @name, company = @company, title = @title, email = @email, phone = @phone,
          note = @note, status = @status, tags = @tags, last_interacted_at = @last_interacted_at,
          updated_at = @updated_at
        WHERE id = @id
      `).run(toParams(record));
    });
  }

  findById(id: string): CustomerRecord | null {
    return this.db.run('customer.get', (db) => {
      const row = db.prepare<[string], CustomerRow>('SELECT * FROM customers WHERE id = ?').get(id);
      return row ? rowToCustomer(row) : null;
    });
  }

  exists(id: string): boolean {
    return this.db.run('customer.exists', (db) => {
      return db.prepare<[string], { found: number }>('SELECT 1 AS found FROM customers WHERE id = ?').get(id) !== undefined;
    });
  }

  /**
   * Look up a customer by its import key. Emails compare case-insensitively.
   */
  findByNaturalKey(key: NaturalKey, value: string): CustomerRecord | null {
    const sql =
      key === 'email'
        ? 'SELECT * FROM customers WHERE email = ? COLLATE NOCASE'
        : 'SELECT * FROM customers WHERE phone = ?';
    return this.db.run('customer.findByKey', (db) => {
      const row = db.prepare<[string], CustomerRow>(sql).get(value);
      return row ? rowToCustomer(row) : null;
    });
  }

  /**
   * Delete a customer and everything it owns. Call inside a transaction.
   */
  delete(id: string): boolean {
    return this.db.run('customer.delete', (db) => {
      db.prepare<[string]>('DELETE FROM interactions WHERE customer_id = ?').run(id);
      db.prepare<[string]>('DELETE FROM opportunities WHERE customer_id = ?').run(id);
      db.prepare<[string]>('DELETE FROM tasks WHERE customer_id = ?').run(id);
      db.prepare<[string]>('DELETE FROM customer_field_values WHERE customer_id = ?').run(id);
      return db.prepare<[string]>('DELETE FROM customers WHERE id = ?').run(id).changes > 0;
    });
  }

  list(filters: CustomerFilters, sort: CustomerSort, page: PageRequest): { rows: CustomerRecord[]; total: number } {
    const where = buildWhere(filters);
    const order = buildOrder(sort);
    const params = { ...where.params, limit: page.limit, offset: page.offset };

    return this.db.run('customer.list', (db) => {
      const totalRow = db
        .prepare<SqlParams, { total: number }>(`SELECT COUNT(*) AS total FROM customers c ${where.toSql()}`)
        .get(where.params);
      const total = totalRow?.total ?? 0;
      const rows = isPastEnd(page, total)
        ? []
        : db
            .prepare<SqlParams, CustomerRow>(
              `SELECT c.* FROM customers c ${where.toSql()} ORDER BY ${order} LIMIT @limit OFFSET @offset`
            )
            .all(params);

      return { rows: rows.map(rowToCustomer), total };
    });
  }

  /**
   * Ids of every matching customer in list order, read in one statement so a
   * caller can hydrate them in batches against a fixed result set.
   */
  listIds(filters: CustomerFilters, sort: CustomerSort): string[] {
    const where = buildWhere(filters);
    const order = buildOrder(sort);
    return this.db.run('customer.listIds', (db) => {
      return db
        .prepare<SqlParams, { id: string }>(`SELECT c.id FROM customers c ${where.toSql()} ORDER BY ${order}`)
        .all(where.params)
        .map((row) => row.id);
    });
  }

  /** Customers with the given ids, in the order given. Missing ids are skipped. */
  findByIds(ids: string[]): CustomerRecord[] {
    if (ids.length === 0) return [];

    const placeholders = ids.map(() => '?').join(', ');
    return this.db.run('customer.findByIds', (db) => {
      const rows = db
        .prepare<string[], CustomerRow>(`SELECT * FROM customers WHERE id IN (${placeholders})`)
        .all(...ids);
      const byId = new Map(rows.map((row) => [row.id, rowToCustomer(row)]));
      return ids.flatMap((id) => byId.get(id) ?? []);
    });
  }

  count(filters: CustomerFilters = {}): number {
    const where = buildWhere(filters);
    return this.db.run('customer.count', (db) => {
      const row = db
        .prepare<SqlParams, { total: number }>(`SELECT COUNT(*) AS total FROM customers c ${where.toSql()}`)
        .get(where.params);
      return row?.total ?? 0;
    });
  }

  /**
   * Recompute last_interacted_at from the customer's interactions.
   */
  syncLastInteracted(customerId: string): string | null {
    return this.db.run('customer.syncLastInteracted', (db) => {
      const row = db
        .prepare<[string], { latest: string | null }>(
          'SELECT MAX(happened_at) AS latest FROM interactions WHERE customer_id = ?'
        )
        .get(customerId);
      const latest = row?.latest ?? null;
      db.prepare<[string | null, string]>('UPDATE customers SET last_interacted_at = ? WHERE id = ?').run(
        latest,
        customerId
      );
      return latest;
    });
  }

  // ─── Custom field values ────────────────────────────────────────────────────

  readFieldValues(customerIds: string[]): Map<string, StoredFieldValue[]> {
    const result = new Map<string, StoredFieldValue[]>();
    if (customerIds.length === 0) return result;

    const placeholders = customerIds.map(() => '?').join(', ');
    return this.db.run('customer.readFieldValues', (db) => {
      const rows = db
        .prepare<string[], FieldValueRow>(
          `SELECT customer_id, field_key, value FROM customer_field_values
           WHERE customer_id IN (${placeholders})
           ORDER BY field_key`
        )
        .all(...customerIds);

      for (const row of rows) {
        const list = result.get(row.customer_id) ?? [];
        list.push({ fieldKey: row.field_key, value: row.value });
        result.set(row.customer_id, list);
      }
      return result;
    });
  }

  /**
   * Upsert stored values; `null` removes the row.
   */
  writeFieldValues(customerId: string, values: Record<string, string | null>): void {
    this.db.run('customer.writeFieldValues', (db) => {
      const upsert = db.prepare<[string, string, string]>(`
        INSERT INTO customer_field_values (customer_id, field_key, value) VALUES (?, ?, ?)
        ON CONFLICT (customer_id, field_key) DO UPDATE SET value = excluded.value
      `);
      const remove = db.prepare<[string, string]>(
        'DELETE FROM customer_field_values WHERE customer_id = ? AND field_key = ?'
      );

      for (const [key, value] of Object.entries(values)) {
        if (value === null) {
          remove.run(customerId, key);
        } else {
          upsert.run(customerId, key, value);
        }
      }
    });
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function buildWhere(filters: CustomerFilters): WhereClause {
  const where = new WhereClause();

  if (filters.search) {
    const pattern = where.param(containsPattern(filters.search), 'search');
    where.add(
      `(c.name LIKE ${pattern} ESCAPE '\\' OR c.email LIKE ${pattern} ESCAPE '\\' ` +
        `OR c.phone LIKE ${pattern} ESCAPE '\\' OR c.company LIKE ${pattern} ESCAPE '\\')`
    );
  }
  if (filters.status) {
    where.add(`c.status = ${where.param(filters.status, 'status')}`);
  }
  for (const tag of filters.tags ?? []) {
    where.add(`EXISTS (SELECT 1 FROM json_each(c.tags) WHERE json_each.value = ${where.param(tag, 'tag')})`);
  }
  if (filters.company) {
    where.add(`c.company = ${where.param(filters.company, 'company')} COLLATE NOCASE`);
  }

  // A NULL last_interacted_at fails every comparison, so customers with no
  // interaction never match a bound.
  const bounds: Array<[string | undefined, string]> = [
    [filters.lastInteractedBefore, '<'],
    [filters.lastInteractedAfter, '>'],
    [filters.lastInteractedFrom, '>='],
    [filters.lastInteractedTo, '<='],
  ];
  for (const [value, operator] of bounds) {
    if (value) {
      where.add(`c.last_interacted_at ${operator} ${where.param(value, 'interacted')}`);
    }
  }

  return where;
}

function buildOrder(sort: CustomerSort): string {
  if (!sort.field) {
    return 'c.rowid ASC';
  }
  const direction = sort.direction === 'desc' ? 'DESC' : 'ASC';
  return `${SORT_COLUMNS[sort.field]} ${direction}, c.rowid ASC`;
}

function toParams(record: CustomerRecord): SqlParams {
  return {
    id: record.id,
    name: record.name,
    company: record.company,
    title: record.title,
    email: record.email,
    phone: record.phone,
    note: record.note,
    status: record.status,
    tags: JSON.stringify(record.tags),
    last_interacted_at: record.lastInteractedAt,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

function rowToCustomer(row: CustomerRow): CustomerRecord {
  return {
    id: row.id,
    name: row.name,
    company: row.company,
    title: row.title,
    email: row.email,
    phone: row.phone,
    note: row.note,
    status: CustomerStatusSchema.catch('lead').parse(row.status),
    tags: StoredTagsSchema.parse(parseJson(row.tags)),
    lastInteractedAt: row.last_interacted_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

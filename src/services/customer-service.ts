/**
 * Customer Service
 *
 * Validates customer payloads, applies partial updates, hydrates custom
 * values and owns the delete cascade. Every multi-step write runs in one
 * transaction.
 *
 * @module services/customer-service
 */

import { randomUUID } from 'node:crypto';
import type { CrmDatabase } from '../store/database.js';
import { CustomerRepository, type CustomerFilters, type CustomerRecord, type CustomerSort } from '../store/customer-repository.js';
import { resolvePage } from '../store/query.js';
import {
  CustomerCreateSchema,
  CustomerListQuerySchema,
  CustomerUpdateSchema,
  type Customer,
  type CustomerListQuery,
  type FieldDefinition,
  type Page,
} from '../domain/schemas.js';
import {
  type CustomValueUpdates,
  type CustomValues,
  prepareCustomValues,
  serializeFieldValue,
  toJsonValues,
} from '../domain/custom-fields.js';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import type { NaturalKey } from '../types/index.js';
import { FieldService, decodeStoredValues } from './field-service.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:customers');

/** Customer columns as written by services and the importer. */
export type CustomerDraft = Omit<CustomerRecord, 'id' | 'createdAt' | 'updatedAt'>;

export interface CustomerListOptions {
  filters: CustomerFilters;
  sort: CustomerSort;
  page?: number;
  pageSize?: number;
}

export function parseCustomerListQuery(query: unknown): CustomerListOptions {
  const parsed = CustomerListQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, 'Invalid query parameters');
  }
  return toListOptions(parsed.data);
}

export function toListOptions(query: CustomerListQuery): CustomerListOptions {
  return {
    filters: {
      search: query.search,
      status: query.status,
      tags: query.tag,
      company: query.company,
      lastInteractedBefore: query.last_interacted_before,
      lastInteractedAfter: query.last_interacted_after,
    },
    sort: { field: query.sort_by, direction: query.sort_dir },
    page: query.page,
    pageSize: query.page_size,
  };
}

export class CustomerService {
  readonly repository: CustomerRepository;
  private readonly fields: FieldService;

  constructor(private readonly db: CrmDatabase, fields?: FieldService) {
    this.repository = new CustomerRepository(db);
    this.fields = fields ?? new FieldService(db);
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  get(id: string): Customer {
    const record = this.repository.findById(id);
    if (!record) {
      throw new NotFoundError('Customer', id);
    }
    return this.hydrate([record])[0];
  }

  /** Throw NotFound unless the customer exists. */
  assertExists(id: string): void {
    if (!this.repository.exists(id)) {
      throw new NotFoundError('Customer', id);
    }
  }

  list(query: unknown): Page<Customer> {
    return this.listWith(parseCustomerListQuery(query));
  }

  listWith(options: CustomerListOptions): Page<Customer> {
    const page = resolvePage(options.page, options.pageSize);
    const { rows, total } = this.repository.list(options.filters, options.sort, page);
    return { items: this.hydrate(rows), total, page: page.page, pageSize: page.pageSize };
  }

  count(filters: CustomerFilters = {}): number {
    return this.repository.count(filters);
  }

  /** Attach decoded custom values to repository records. */
  hydrate(records: CustomerRecord[], definitions = this.fields.definitionMap()): Customer[] {
    const stored = this.repository.readFieldValues(records.map((record) => record.id));
    return records.map((record) => ({
      ...record,
      custom: toJsonValues(decodeStoredValues(definitions, stored.get(record.id) ?? [])),
    }));
  }

  customValues(id: string, definitions: ReadonlyMap<string, FieldDefinition>): CustomValues {
    return decodeStoredValues(definitions, this.repository.readFieldValues([id]).get(id) ?? []);
  }

  findByNaturalKey(key: NaturalKey, value: string): CustomerRecord | null {
    return this.repository.findByNaturalKey(key, value);
  }

  // ─── Writes ─────────────────────────────────────────────────────────────────

  create(payload: unknown): Customer {
    const parsed = CustomerCreateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid customer');
    }

    const { custom, ...fields } = parsed.data;
    const definitions = this.fields.definitionMap();
    const prepared = prepareCustomValues(definitions, custom);
    if (!prepared.success) {
      throw new ValidationError('Invalid custom fields', prepared.error);
    }

    const record = this.db.transaction('customer.create', () =>
      this.insertValidated(
        {
          name: fields.name,
          company: fields.company ?? null,
          title: fields.title ?? null,
          email: fields.email ?? null,
          phone: fields.phone ?? null,
          note: fields.note ?? null,
          status: fields.status,
          tags: fields.tags,
          lastInteractedAt: null,
        },
        prepared.data
      )
    );

    return this.hydrate([record], definitions)[0];
  }

  /**
   * Partial update: only supplied fields change. Required custom fields are
   * checked against the merged result.
   */
  update(id: string, payload: unknown): Customer {
    const parsed = CustomerUpdateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid customer');
    }

    const definitions = this.fields.definitionMap();
    const record = this.db.transaction('customer.update', () => {
      const existing = this.repository.findById(id);
      if (!existing) {
        throw new NotFoundError('Customer', id);
      }

      const { custom, ...fields } = parsed.data;
      const prepared = prepareCustomValues(definitions, custom ?? {}, this.customValues(id, definitions));
      if (!prepared.success) {
        throw new ValidationError('Invalid custom fields', prepared.error);
      }

      const changes: Partial<CustomerDraft> = {};
      if (fields.name !== undefined) changes.name = fields.name;
      if (fields.company !== undefined) changes.company = fields.company;
      if (fields.title !== undefined) changes.title = fields.title;
      if (fields.email !== undefined) changes.email = fields.email;
      if (fields.phone !== undefined) changes.phone = fields.phone;
      if (fields.note !== undefined) changes.note = fields.note;
      if (fields.status !== undefined) changes.status = fields.status;
      if (fields.tags !== undefined) changes.tags = fields.tags;

      return this.updateValidated(existing, changes, prepared.data);
    });

    return this.hydrate([record], definitions)[0];
  }

  delete(id: string): void {
    this.db.transaction('customer.delete', () => {
      if (!this.repository.delete(id)) {
        throw new NotFoundError('Customer', id);
      }
    });
    log.info({ customerId: id }, 'Customer deleted');
  }

  /**
   * Insert an already validated customer with its encoded custom values.
   * Callers own the transaction.
   */
  insertValidated(draft: CustomerDraft, custom: CustomValueUpdates): CustomerRecord {
    const now = new Date().toISOString();
    const record: CustomerRecord = { ...draft, id: randomUUID(), createdAt: now, updatedAt: now };

    this.repository.insert(record);
    this.repository.writeFieldValues(record.id, serializeUpdates(custom));

    log.info({ customerId: record.id, name: record.name }, 'Customer created');
    return record;
  }

  /**
   * Merge validated changes into an existing customer. Callers own the
   * transaction.
   */
  updateValidated(existing: CustomerRecord, changes: Partial<CustomerDraft>, custom: CustomValueUpdates): CustomerRecord {
    const record: CustomerRecord = {
      ...existing,
      ...changes,
      id: existing.id,
      createdAt: existing.createdAt,
      updatedAt: new Date().toISOString(),
    };

    this.repository.update(record);
    this.repository.writeFieldValues(record.id, serializeUpdates(custom));

    log.info({ customerId: record.id }, 'Customer updated');
    return record;
  }
}

function serializeUpdates(custom: CustomValueUpdates): Record<string, string | null> {
  const serialized: Record<string, string | null> = {};
  for (const [key, value] of Object.entries(custom)) {
    serialized[key] = value === null ? null : serializeFieldValue(value);
  }
  return serialized;
}

/**
 * Customer CSV Exporter
 *
 * Streams every customer matching the list filters as CSV. The matching ids
 * are read once up front, then hydrated and encoded one chunk at a time, so
 * writes landing between chunks cannot shift rows in or out of the export.
 * The page size limit of the list API does not apply. Email and phone stay
 * blank unless the caller asks for private columns.
 */

import { Readable } from 'node:stream';
import { stringify } from 'csv-stringify/sync';
import type { CustomerRecord } from '../store/customer-repository.js';
import type { InteractionRepository } from '../store/interaction-repository.js';
import { type CustomerListOptions, type CustomerService, toListOptions } from '../services/customer-service.js';
import { type FieldService, decodeStoredValues } from '../services/field-service.js';
import { formatCsvValue } from '../domain/custom-fields.js';
import { CustomerExportQuerySchema, type FieldDefinition, type Interaction } from '../domain/schemas.js';
import { ValidationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:export');

export const EXPORT_COLUMNS = [
  'id',
  'name',
  'company',
  'title',
  'email',
  'phone',
  'status',
  'tags',
  'note',
  'last_interacted_at',
  'created_at',
  'updated_at',
] as const;

export const DEFAULT_EXPORT_CHUNK_SIZE = 500;

export interface CustomerExportOptions extends CustomerListOptions {
  includePrivate: boolean;
}

/**
 * List query parameters plus `from`/`to` (inclusive last_interacted_at
 * bounds) and `include_private`.
 */
export function parseExportQuery(query: unknown): CustomerExportOptions {
  const parsed = CustomerExportQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, 'Invalid query parameters');
  }

  const options = toListOptions(parsed.data);
  return {
    ...options,
    filters: { ...options.filters, lastInteractedFrom: parsed.data.from, lastInteractedTo: parsed.data.to },
    includePrivate: parsed.data.include_private ?? false,
  };
}

export function summarizeInteraction(interaction: Interaction | undefined): string {
  if (!interaction) return '';
  return [interaction.happenedAt, interaction.type, interaction.summary].filter(Boolean).join(' ');
}

export class CustomerExporter {
  constructor(
    private readonly customers: CustomerService,
    private readonly fields: FieldService,
    private readonly interactions: InteractionRepository,
    private readonly chunkSize: number = DEFAULT_EXPORT_CHUNK_SIZE
  ) {}

  /** Header for the current set of field definitions. */
  columns(definitions: FieldDefinition[] = this.fields.list()): string[] {
    const customColumns = definitions.map((definition) => `custom.${definition.key}`).sort();
    return [...EXPORT_COLUMNS, ...customColumns, 'last_interaction_summary'];
  }

  /**
   * CSV text in chunks: the header first, then one chunk per batch of rows.
   */
  *chunks(options: CustomerExportOptions): Generator<string> {
    const definitionList = this.fields.list();
    const definitions = new Map(definitionList.map((definition) => [definition.key, definition]));
    const customKeys = definitionList.map((definition) => definition.key).sort();

    yield stringify([this.columns(definitionList)]);

    const ids = this.customers.repository.listIds(options.filters, options.sort);
    let exported = 0;
    for (let start = 0; start < ids.length; start += this.chunkSize) {
      // Customers deleted since the id read drop out here.
      const rows = this.customers.repository.findByIds(ids.slice(start, start + this.chunkSize));
      if (rows.length === 0) continue;

      yield stringify(this.encodeRows(rows, definitions, customKeys, options.includePrivate));
      exported += rows.length;
    }

    log.info({ exported }, 'Customer export finished');
  }

  stream(query: unknown): Readable {
    return Readable.from(this.chunks(parseExportQuery(query)));
  }

  /** The whole export as one string. */
  toCsv(query: unknown): string {
    return [...this.chunks(parseExportQuery(query))].join('');
  }

  private encodeRows(
    rows: CustomerRecord[],
    definitions: ReadonlyMap<string, FieldDefinition>,
    customKeys: string[],
    includePrivate: boolean
  ): string[][] {
    const ids = rows.map((row) => row.id);
    const stored = this.customers.repository.readFieldValues(ids);
    const latest = this.interactions.latestForCustomers(ids);

    return rows.map((row) => {
      const custom = decodeStoredValues(definitions, stored.get(row.id) ?? []);
      return [
        row.id,
        row.name,
        row.company ?? '',
        row.title ?? '',
        includePrivate ? (row.email ?? '') : '',
        includePrivate ? (row.phone ?? '') : '',
        row.status,
        row.tags.join(','),
        row.note ?? '',
        row.lastInteractedAt ?? '',
        row.createdAt,
        row.updatedAt,
        ...customKeys.map((key) => formatCsvValue(custom[key])),
        summarizeInteraction(latest.get(row.id)),
      ];
    });
  }
}

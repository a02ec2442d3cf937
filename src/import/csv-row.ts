/**
 * Import row parsing
 *
 * `parseImportRow` turns one CSV record into validated customer columns and
 * encoded custom values. It performs no I/O, so dry-run and commit share it.
 *
 * Columns missing from the header are left out of the result; an empty cell
 * in a present column clears the value.
 */

import { z } from 'zod';
import { type Result, ok, err } from '../types/index.js';
import {
  CustomerStatusSchema,
  EmailSchema,
  FIELD_KEY_PATTERN,
  PhoneSchema,
  TagsSchema,
  TimestampSchema,
  type CustomFieldJson,
  type FieldDefinition,
} from '../domain/schemas.js';
import { type CustomValueUpdates, type CustomValues, prepareCustomValues } from '../domain/custom-fields.js';
import { ValidationError, describeIssues } from '../domain/errors.js';
import type { CustomerDraft } from '../services/customer-service.js';

export const CUSTOM_PREFIX = 'custom.';

export const KNOWN_COLUMNS = [
  'name',
  'company',
  'title',
  'email',
  'phone',
  'status',
  'tags',
  'note',
  'last_interacted_at',
] as const;

export type RawImportRow = Record<string, string | undefined>;

export interface ImportRowContext {
  header: readonly string[];
  definitions: ReadonlyMap<string, FieldDefinition>;
  autoCreateFields: boolean;
  /** Custom values of the customer this row would update, if any. */
  existingCustom: CustomValues;
}

export type ImportedCustomer = Partial<CustomerDraft> & { name: string };

export interface ImportPreview {
  name: string;
  company: string | null;
  title: string | null;
  email: string | null;
  phone: string | null;
  status: string | null;
  tags: string[];
  note: string | null;
  lastInteractedAt: string | null;
  custom: Record<string, CustomFieldJson | null>;
}

export interface ParsedImportRow {
  customer: ImportedCustomer;
  custom: CustomValueUpdates;
  /** Custom columns that need a new text definition. */
  newFields: FieldDefinition[];
  preview: ImportPreview;
}

const text = (max: number) => z.string().trim().max(max).nullable().optional();

const ImportedCustomerSchema = z.object({
  name: z.string().trim().min(1, { message: 'Required' }).max(200),
  company: text(200),
  title: text(120),
  email: EmailSchema.nullable().optional(),
  phone: PhoneSchema.nullable().optional(),
  note: text(5000),
  status: z.string().trim().toLowerCase().pipe(CustomerStatusSchema).optional(),
  tags: TagsSchema.optional(),
  lastInteractedAt: TimestampSchema.nullable().optional(),
});

/**
 * Cell lookup: `undefined` when the column is absent, `null` when blank.
 */
function cell(row: RawImportRow, header: readonly string[], column: string): string | null | undefined {
  if (!header.includes(column)) return undefined;
  const value = row[column]?.trim() ?? '';
  return value === '' ? null : value;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseImportRow(row: RawImportRow, context: ImportRowContext): Result<ParsedImportRow, string> {
  const { header } = context;
  const tagsCell = cell(row, header, 'tags');
  const statusCell = cell(row, header, 'status');

  const parsed = ImportedCustomerSchema.safeParse({
    name: cell(row, header, 'name') ?? '',
    company: cell(row, header, 'company'),
    title: cell(row, header, 'title'),
    email: cell(row, header, 'email'),
    phone: cell(row, header, 'phone'),
    note: cell(row, header, 'note'),
    status: statusCell ?? undefined,
    tags: tagsCell === undefined ? undefined : splitList(tagsCell ?? ''),
    lastInteractedAt: cell(row, header, 'last_interacted_at'),
  });
  if (!parsed.success) {
    return err(describeIssues(ValidationError.fromZod(parsed.error).issues));
  }

  const definitions = new Map(context.definitions);
  const newFields: FieldDefinition[] = [];
  const payload: Record<string, unknown> = {};

  for (const column of header) {
    if (!column.startsWith(CUSTOM_PREFIX)) continue;
    const key = column.slice(CUSTOM_PREFIX.length);

    let definition = definitions.get(key);
    if (!definition) {
      if (!context.autoCreateFields) {
        return err(`Unknown custom field '${key}'`);
      }
      if (!FIELD_KEY_PATTERN.test(key) || key.length > 100) {
        return err(`Custom column '${column}': key must match pattern [A-Za-z0-9_]`);
      }
      definition = { key, label: key, type: 'text', options: null, required: false, createdAt: new Date().toISOString() };
      definitions.set(key, definition);
      newFields.push(definition);
    }

    const raw = cell(row, header, column) ?? null;
    payload[key] = raw !== null && definition.type === 'multi_select' ? splitList(raw) : raw;
  }

  const custom = prepareCustomValues(definitions, payload, context.existingCustom);
  if (!custom.success) {
    return err(describeIssues(custom.error));
  }

  const customer: ImportedCustomer = { name: parsed.data.name };
  const data = parsed.data;
  if (data.company !== undefined) customer.company = data.company;
  if (data.title !== undefined) customer.title = data.title;
  if (data.email !== undefined) customer.email = data.email;
  if (data.phone !== undefined) customer.phone = data.phone;
  if (data.note !== undefined) customer.note = data.note;
  if (data.status !== undefined) customer.status = data.status;
  if (data.tags !== undefined) customer.tags = data.tags;
  if (data.lastInteractedAt !== undefined) customer.lastInteractedAt = data.lastInteractedAt;

  const previewCustom: Record<string, CustomFieldJson | null> = {};
  for (const [key, value] of Object.entries(custom.data)) {
    previewCustom[key] = value === null ? null : value.value;
  }

  return ok({
    customer,
    custom: custom.data,
    newFields,
    preview: {
      name: customer.name,
      company: customer.company ?? null,
      title: customer.title ?? null,
      email: customer.email ?? null,
      phone: customer.phone ?? null,
      status: customer.status ?? null,
      tags: customer.tags ?? [],
      note: customer.note ?? null,
      lastInteractedAt: customer.lastInteractedAt ?? null,
      custom: previewCustom,
    },
  });
}

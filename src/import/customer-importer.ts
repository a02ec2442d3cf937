/**
 * Customer CSV Importer
 *
 * Two entry points over the same row parser:
 *   - dryRun(): validate every row, write nothing, return counts and a sample
 *   - commit(): upsert valid rows by natural key in one transaction, each row
 *     in its own savepoint, and publish a per-row CSV report
 *
 * Usage:
 *   const importer = new CustomerImporter(db, customers, fields, reports);
 *   const preview = importer.dryRun(csvText, { mode: 'upsert', autoCreateFields: false });
 *   const result = importer.commit(csvText, { mode: 'upsert', autoCreateFields: false });
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import type { CrmDatabase } from '../store/database.js';
import type { CustomerRecord } from '../store/customer-repository.js';
import type { CustomerService } from '../services/customer-service.js';
import type { FieldService } from '../services/field-service.js';
import { type CustomValues, mergeCustomValues, sameFieldValue } from '../domain/custom-fields.js';
import { ConflictError, ValidationError } from '../domain/errors.js';
import type { FieldDefinition } from '../domain/schemas.js';
import { getConfig } from '../config/config.js';
import type { Config, NaturalKey } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import {
  CUSTOM_PREFIX,
  KNOWN_COLUMNS,
  type ImportPreview,
  type ParsedImportRow,
  type RawImportRow,
  parseImportRow,
} from './csv-row.js';
import { type ImportReportStore, reportUrl } from './report-store.js';

const log = createLogger('crm:import');

// ─── Types ──────────────────────────────────────────────────────────────────

export const ImportModeSchema = z.enum(['upsert', 'create_only']);
export type ImportMode = z.infer<typeof ImportModeSchema>;

export interface ImportOptions {
  mode: ImportMode;
  autoCreateFields: boolean;
}

export const ImportOptionsSchema = z
  .object({
    mode: ImportModeSchema.default('upsert'),
    auto_create_fields: z
      .union([z.boolean(), z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])])
      .transform((value) => value === true || value === 'true' || value === '1' || value === 'yes' || value === 'on')
      .default(false),
  })
  .transform((value): ImportOptions => ({ mode: value.mode, autoCreateFields: value.auto_create_fields }));

export interface RowError {
  row: number;
  message: string;
}

export interface DryRunReport {
  total: number;
  valid: number;
  invalid: number;
  errors: RowError[];
  sample: Array<{ row: number; parsed: ImportPreview }>;
}

export interface CommitResult {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  report_url: string;
}

export type RowStatus = 'created' | 'updated' | 'skipped' | 'failed';

export interface ReportEntry {
  raw: RawImportRow;
  status: RowStatus;
  message: string;
}

interface CsvDocument {
  header: string[];
  rows: RawImportRow[];
}

const RawRowsSchema = z.array(z.record(z.string(), z.string().optional()));

// ─── CSV reading ────────────────────────────────────────────────────────────

/**
 * Decode and parse an uploaded document. Problems with the document as a
 * whole are ValidationErrors; row problems are left to the row parser.
 */
export function readCsvDocument(input: string | Buffer): CsvDocument {
  let text: string;
  if (typeof input === 'string') {
    text = input;
  } else {
    try {
      text = new TextDecoder('utf-8', { fatal: true }).decode(input);
    } catch {
      throw new ValidationError('Uploaded file must be UTF-8 encoded');
    }
  }

  let header: string[] = [];
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      columns: (first: string[]) => {
        header = first.map((column) => column.trim());
        return header;
      },
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new ValidationError(`Invalid CSV: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (header.length === 0) {
    throw new ValidationError('CSV file must include a header row');
  }
  if (!header.includes('name')) {
    throw new ValidationError('Missing required column: name', [{ path: 'name', message: 'Missing required column' }]);
  }

  const rows = RawRowsSchema.safeParse(records);
  if (!rows.success) {
    throw new ValidationError('Invalid CSV: unexpected record shape');
  }
  return { header, rows: rows.data };
}

// ─── CustomerImporter ───────────────────────────────────────────────────────

export class CustomerImporter {
  private readonly naturalKey: NaturalKey;
  private readonly settings: Config['import'];

  constructor(
    private readonly db: CrmDatabase,
    private readonly customers: CustomerService,
    private readonly fields: FieldService,
    private readonly reports: ImportReportStore,
    config: Config = getConfig()
  ) {
    this.settings = config.import;
    this.naturalKey = config.import.natural_key;
  }

  dryRun(input: string | Buffer, options: ImportOptions): DryRunReport {
    const { header, rows } = readCsvDocument(input);
    this.logIgnoredColumns(header);

    const definitions = this.fields.definitionMap();
    const report: DryRunReport = { total: rows.length, valid: 0, invalid: 0, errors: [], sample: [] };

    rows.forEach((raw, index) => {
      const row = index + 1;
      const match = this.findMatch(raw, header);
      const parsed = parseImportRow(raw, {
        header,
        definitions,
        autoCreateFields: options.autoCreateFields,
        existingCustom: match ? this.customers.customValues(match.id, definitions) : {},
      });

      if (!parsed.success) {
        report.invalid++;
        report.errors.push({ row, message: parsed.error });
        return;
      }

      report.valid++;
      for (const definition of parsed.data.newFields) {
        definitions.set(definition.key, definition);
      }
      if (report.sample.length < this.settings.sample_size) {
        report.sample.push({ row, parsed: parsed.data.preview });
      }
    });

    log.info({ total: report.total, valid: report.valid, invalid: report.invalid }, 'Import dry-run finished');
    return report;
  }

  commit(input: string | Buffer, options: ImportOptions): CommitResult {
    const { header, rows } = readCsvDocument(input);
    this.logIgnoredColumns(header);

    const entries: ReportEntry[] = [];
    const counts: Record<RowStatus, number> = { created: 0, updated: 0, skipped: 0, failed: 0 };

    this.db.transaction('import.commit', () => {
      const definitions = this.fields.definitionMap();

      rows.forEach((raw, index) => {
        let entry: ReportEntry;
        try {
          entry = this.db.transaction('import.row', () => this.commitRow(raw, header, definitions, options));
        } catch (error) {
          if (!(error instanceof ValidationError || error instanceof ConflictError)) {
            throw error;
          }
          entry = { raw, status: 'failed', message: error.message };
          log.debug({ row: index + 1, error: error.message }, 'Import row failed');
        }
        counts[entry.status]++;
        entries.push(entry);
      });
    });

    const token = this.reports.save(buildReportCsv(header, entries));
    log.info({ ...counts, token }, 'Import committed');

    return { ...counts, report_url: reportUrl(token) };
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  /**
   * Write one row. Runs inside its own savepoint; throwing rolls back only
   * this row. Newly created definitions join `definitions` once written.
   */
  private commitRow(
    raw: RawImportRow,
    header: string[],
    definitions: Map<string, FieldDefinition>,
    options: ImportOptions
  ): ReportEntry {
    const match = this.findMatch(raw, header);
    const existingCustom = match ? this.customers.customValues(match.id, definitions) : {};
    const parsed = parseImportRow(raw, {
      header,
      definitions,
      autoCreateFields: options.autoCreateFields,
      existingCustom,
    });
    if (!parsed.success) {
      throw new ValidationError(parsed.error);
    }

    const row = parsed.data;

    if (match && options.mode === 'create_only') {
      return { raw, status: 'skipped', message: 'Existing customer skipped' };
    }
    if (match && this.settings.skip_unchanged && isUnchanged(match, existingCustom, row)) {
      return { raw, status: 'skipped', message: 'No changes' };
    }

    const created: FieldDefinition[] = [];
    for (const definition of row.newFields) {
      created.push(this.fields.ensureTextField(definition.key));
    }

    if (match) {
      this.customers.updateValidated(match, row.customer, row.custom);
    } else {
      this.customers.insertValidated(
        {
          name: row.customer.name,
          company: row.customer.company ?? null,
          title: row.customer.title ?? null,
          email: row.customer.email ?? null,
          phone: row.customer.phone ?? null,
          note: row.customer.note ?? null,
          status: row.customer.status ?? 'lead',
          tags: row.customer.tags ?? [],
          lastInteractedAt: row.customer.lastInteractedAt ?? null,
        },
        row.custom
      );
    }

    for (const definition of created) {
      definitions.set(definition.key, definition);
    }
    return { raw, status: match ? 'updated' : 'created', message: '' };
  }

  /**
   * The customer a row would update, found by the configured natural key.
   * Earlier rows of the same commit are visible, so repeated keys in one
   * file land on the same customer.
   */
  private findMatch(raw: RawImportRow, header: string[]): CustomerRecord | null {
    if (!header.includes(this.naturalKey)) return null;
    const value = raw[this.naturalKey]?.trim() ?? '';
    if (value === '') return null;
    const lookup = this.naturalKey === 'email' ? value.toLowerCase() : value;
    return this.customers.findByNaturalKey(this.naturalKey, lookup);
  }

  private logIgnoredColumns(header: string[]): void {
    const known: readonly string[] = KNOWN_COLUMNS;
    const ignored = header.filter((column) => !known.includes(column) && !column.startsWith(CUSTOM_PREFIX));
    if (ignored.length > 0) {
      log.debug({ ignored }, 'Ignoring unrecognised import columns');
    }
  }
}

const IMPORTED_FIELDS = [
  'name',
  'company',
  'title',
  'email',
  'phone',
  'note',
  'status',
  'tags',
  'lastInteractedAt',
] as const satisfies ReadonlyArray<keyof CustomerRecord>;

function isUnchanged(existing: CustomerRecord, existingCustom: CustomValues, row: ParsedImportRow): boolean {
  for (const key of IMPORTED_FIELDS) {
    const next = row.customer[key];
    if (next !== undefined && JSON.stringify(existing[key]) !== JSON.stringify(next)) {
      return false;
    }
  }

  const merged = mergeCustomValues(existingCustom, row.custom);
  const keys = new Set([...Object.keys(existingCustom), ...Object.keys(merged)]);
  for (const key of keys) {
    if (!sameFieldValue(existingCustom[key], merged[key])) {
      return false;
    }
  }
  return row.newFields.length === 0;
}

/** Original columns plus status and message, one line per data row. */
export function buildReportCsv(header: string[], entries: ReportEntry[]): string {
  const columns = [...header, 'status', 'message'];
  const records = entries.map((entry) => [
    ...header.map((column) => entry.raw[column] ?? ''),
    entry.status,
    entry.message,
  ]);
  return stringify([columns, ...records]);
}

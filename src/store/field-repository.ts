/**
 * Field Repository: custom field definitions and their stored values
 */

import { z } from 'zod';
import type { CrmDatabase } from './database.js';
import type { SqlParams } from './query.js';
import { FieldTypeSchema, type FieldDefinition } from '../domain/schemas.js';

interface FieldDefinitionRow {
  key: string;
  label: string;
  type: string;
  options: string | null;
  required: number;
  created_at: string;
}

export interface StoredValueRow {
  customerId: string;
  value: string;
}

const StoredOptionsSchema = z.array(z.string()).nullable().catch(null);

export class FieldRepository {
  constructor(private readonly db: CrmDatabase) {}

  insert(definition: FieldDefinition): void {
    this.db.run('field.insert', (db) => {
      db.prepare<SqlParams>(`
        INSERT INTO field_definitions (key, label, type, options, required, created_at)
        VALUES (@key, @label, @type, @options, @required, @created_at)
      `).run(toParams(definition));
    });
  }

  /**
   * Rewrite a definition, optionally under a new key. Stored values follow
   * the rename through the ON UPDATE CASCADE foreign key.
   */
  update(currentKey: string, definition: FieldDefinition): void {
    this.db.run('field.update', (db) => {
      db.prepare<SqlParams>(`
        UPDATE field_definitions SET key = @key, label = @label, type = @type, options = @options, required = @required
        WHERE key = @current_key
      `).run({ ...toParams(definition), current_key: currentKey });
    });
  }

  delete(key: string): boolean {
    return this.db.run('field.delete', (db) => {
      return db.prepare<[string]>('DELETE FROM field_definitions WHERE key = ?').run(key).changes > 0;
    });
  }

  findByKey(key: string): FieldDefinition | null {
    return this.db.run('field.get', (db) => {
      const row = db.prepare<[string], FieldDefinitionRow>('SELECT * FROM field_definitions WHERE key = ?').get(key);
      return row ? rowToDefinition(row) : null;
    });
  }

  /** All definitions, ordered by key. */
  list(): FieldDefinition[] {
    return this.db.run('field.list', (db) => {
      return db.prepare<[], FieldDefinitionRow>('SELECT * FROM field_definitions ORDER BY key').all().map(rowToDefinition);
    });
  }

  countValues(key: string): number {
    return this.db.run('field.countValues', (db) => {
      const row = db
        .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM customer_field_values WHERE field_key = ?')
        .get(key);
      return row?.total ?? 0;
    });
  }

  storedValues(key: string): StoredValueRow[] {
    return this.db.run('field.storedValues', (db) => {
      return db
        .prepare<[string], { customer_id: string; value: string }>(
          'SELECT customer_id, value FROM customer_field_values WHERE field_key = ?'
        )
        .all(key)
        .map((row) => ({ customerId: row.customer_id, value: row.value }));
    });
  }

  /**
   * Rewrite stored values after a definition change normalised them.
   */
  rewriteValues(key: string, values: StoredValueRow[]): void {
    this.db.run('field.rewriteValues', (db) => {
      const stmt = db.prepare<[string, string, string]>(
        'UPDATE customer_field_values SET value = ? WHERE customer_id = ? AND field_key = ?'
      );
      for (const row of values) {
        stmt.run(row.value, row.customerId, key);
      }
    });
  }
}

function toParams(definition: FieldDefinition): SqlParams {
  return {
    key: definition.key,
    label: definition.label,
    type: definition.type,
    options: definition.options ? JSON.stringify(definition.options) : null,
    required: definition.required ? 1 : 0,
    created_at: definition.createdAt,
  };
}

function rowToDefinition(row: FieldDefinitionRow): FieldDefinition {
  let options: unknown = null;
  if (row.options !== null) {
    try {
      options = JSON.parse(row.options);
    } catch {
      options = null;
    }
  }

  return {
    key: row.key,
    label: row.label,
    type: FieldTypeSchema.catch('text').parse(row.type),
    options: StoredOptionsSchema.parse(options),
    required: row.required === 1,
    createdAt: row.created_at,
  };
}

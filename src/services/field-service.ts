/**
 * Field Service: custom field definitions
 *
 * Definitions decide how customer custom values validate and decode. Changing
 * a definition re-checks every stored value against it; deleting one that is
 * still in use is refused.
 *
 * @module services/field-service
 */

import type { CrmDatabase } from '../store/database.js';
import { FieldRepository } from '../store/field-repository.js';
import type { StoredFieldValue } from '../store/customer-repository.js';
import {
  FieldDefinitionCreateSchema,
  FieldDefinitionUpdateSchema,
  type FieldDefinition,
} from '../domain/schemas.js';
import { type CustomValues, deserializeFieldValue, serializeFieldValue } from '../domain/custom-fields.js';
import { ConflictError, NotFoundError, ValidationError } from '../domain/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:fields');

export class FieldService {
  private readonly fields: FieldRepository;

  constructor(private readonly db: CrmDatabase) {
    this.fields = new FieldRepository(db);
  }

  list(): FieldDefinition[] {
    return this.fields.list();
  }

  get(key: string): FieldDefinition {
    const definition = this.fields.findByKey(key);
    if (!definition) {
      throw new NotFoundError('Field definition', key);
    }
    return definition;
  }

  /** Definitions keyed by field key. */
  definitionMap(): Map<string, FieldDefinition> {
    return new Map(this.fields.list().map((definition) => [definition.key, definition]));
  }

  create(payload: unknown): FieldDefinition {
    const parsed = FieldDefinitionCreateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid field definition');
    }

    const definition: FieldDefinition = {
      key: parsed.data.key,
      label: parsed.data.label,
      type: parsed.data.type,
      options: parsed.data.options ?? null,
      required: parsed.data.required,
      createdAt: new Date().toISOString(),
    };

    this.db.transaction('field.create', () => {
      if (this.fields.findByKey(definition.key)) {
        throw new ConflictError(`Field key already exists: ${definition.key}`);
      }
      this.fields.insert(definition);
    });

    log.info({ key: definition.key, type: definition.type }, 'Field definition created');
    return definition;
  }

  /**
   * Replace a definition. Stored values must decode under the new one; a key
   * change carries them along.
   */
  update(key: string, payload: unknown): FieldDefinition {
    const parsed = FieldDefinitionUpdateSchema.safeParse(payload);
    if (!parsed.success) {
      throw ValidationError.fromZod(parsed.error, 'Invalid field definition');
    }

    return this.db.transaction('field.update', () => {
      const existing = this.get(key);
      const next: FieldDefinition = {
        key: parsed.data.key ?? existing.key,
        label: parsed.data.label,
        type: parsed.data.type,
        options: parsed.data.options ?? null,
        required: parsed.data.required,
        createdAt: existing.createdAt,
      };

      if (next.key !== existing.key && this.fields.findByKey(next.key)) {
        throw new ConflictError(`Field key already exists: ${next.key}`);
      }

      const normalised = this.fields.storedValues(existing.key).map((row) => {
        const decoded = deserializeFieldValue(next, row.value);
        if (!decoded.success) {
          throw ValidationError.forField(
            'type',
            `Existing value is incompatible with the updated field definition: ${decoded.error}`
          );
        }
        return { customerId: row.customerId, value: serializeFieldValue(decoded.data) };
      });

      this.fields.update(existing.key, next);
      this.fields.rewriteValues(next.key, normalised);

      log.info({ key: existing.key, newKey: next.key, revalidated: normalised.length }, 'Field definition updated');
      return next;
    });
  }

  delete(key: string): void {
    this.db.transaction('field.delete', () => {
      this.get(key);
      const inUse = this.fields.countValues(key);
      if (inUse > 0) {
        throw new ConflictError(`Field '${key}' still has ${inUse} stored value(s)`);
      }
      this.fields.delete(key);
    });

    log.info({ key }, 'Field definition deleted');
  }

  /**
   * Create a plain text definition for an unknown import column.
   * Call inside the import transaction.
   */
  ensureTextField(key: string): FieldDefinition {
    const existing = this.fields.findByKey(key);
    if (existing) return existing;

    const definition: FieldDefinition = {
      key,
      label: key,
      type: 'text',
      options: null,
      required: false,
      createdAt: new Date().toISOString(),
    };
    this.fields.insert(definition);
    log.info({ key }, 'Field definition auto-created');
    return definition;
  }
}

/**
 * Decode stored values with their definitions. Values without a definition,
 * or that no longer decode, are dropped.
 */
export function decodeStoredValues(
  definitions: ReadonlyMap<string, FieldDefinition>,
  stored: StoredFieldValue[]
): CustomValues {
  const values: CustomValues = {};
  for (const { fieldKey, value } of stored) {
    const definition = definitions.get(fieldKey);
    if (!definition) continue;
    const decoded = deserializeFieldValue(definition, value);
    if (decoded.success) {
      values[fieldKey] = decoded.data;
    } else {
      log.warn({ fieldKey, error: decoded.error }, 'Stored custom value does not decode');
    }
  }
  return values;
}

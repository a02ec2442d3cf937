/**
 * Custom field codec
 *
 * Custom values are a tagged variant keyed by field name. Each definition's
 * type decides which variant a raw value encodes to and how it is stored.
 *
 *   text | date | email | phone | single_select  -> { kind: 'text' }
 *   number                                       -> { kind: 'number' }
 *   bool                                         -> { kind: 'boolean' }
 *   multi_select                                 -> { kind: 'list' }
 */

import { z } from 'zod';
import { type Result, ok, err } from '../types/index.js';
import type { CustomFieldJson, FieldDefinition } from './schemas.js';
import { PHONE_PATTERN, isIsoDate } from './schemas.js';
import type { ValidationIssue } from './errors.js';

export type CustomFieldValue =
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'list'; value: string[] };

export type CustomValues = Record<string, CustomFieldValue>;

/** `null` clears the stored value for that key. */
export type CustomValueUpdates = Record<string, CustomFieldValue | null>;

const emailCheck = z.string().email();

// ── Encoding ────────────────────────────────────────────────────────────────

export function encodeFieldValue(definition: FieldDefinition, raw: unknown): Result<CustomFieldValue | null, string> {
  if (raw === null || raw === undefined) {
    if (definition.required) {
      return err(`Field '${definition.key}' is required`);
    }
    return ok(null);
  }

  switch (definition.type) {
    case 'text':
      if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
        return ok({ kind: 'text', value: String(raw) });
      }
      return err('Text fields require string values');

    case 'number': {
      const parsed = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw.trim()) : NaN;
      if (!Number.isFinite(parsed)) {
        return err('Number fields require numeric input');
      }
      return ok({ kind: 'number', value: parsed });
    }

    case 'date':
      if (typeof raw === 'string' && isIsoDate(raw.trim())) {
        return ok({ kind: 'text', value: raw.trim() });
      }
      return err('Date fields require ISO 8601 date strings');

    case 'email':
      if (typeof raw === 'string' && emailCheck.safeParse(raw.trim()).success) {
        return ok({ kind: 'text', value: raw.trim() });
      }
      return err('Invalid email format');

    case 'phone':
      if (typeof raw !== 'string') {
        return err('Phone fields require string values');
      }
      if (!PHONE_PATTERN.test(raw.trim())) {
        return err('Invalid phone number format');
      }
      return ok({ kind: 'text', value: raw.trim() });

    case 'single_select':
      if (typeof raw !== 'string') {
        return err('Single select values must be strings');
      }
      if (!(definition.options ?? []).includes(raw)) {
        return err('Value must be one of the available options');
      }
      return ok({ kind: 'text', value: raw });

    case 'multi_select': {
      if (!Array.isArray(raw)) {
        return err('Multi select values must be a list');
      }
      const options = definition.options ?? [];
      const selected: string[] = [];
      for (const item of raw) {
        if (typeof item !== 'string') {
          return err('Multi select values must be strings');
        }
        if (!options.includes(item)) {
          return err('Value must be one of the available options');
        }
        if (!selected.includes(item)) {
          selected.push(item);
        }
      }
      return ok({ kind: 'list', value: selected });
    }

    case 'bool': {
      if (typeof raw === 'boolean') {
        return ok({ kind: 'boolean', value: raw });
      }
      const lowered = typeof raw === 'string' ? raw.trim().toLowerCase() : '';
      if (lowered === 'true' || lowered === 'false') {
        return ok({ kind: 'boolean', value: lowered === 'true' });
      }
      return err('Boolean fields accept true/false');
    }
  }
}

/**
 * Validate a payload of raw custom values against the definitions and merge
 * it over the customer's existing values to check required fields.
 */
export function prepareCustomValues(
  definitions: ReadonlyMap<string, FieldDefinition>,
  payload: Record<string, unknown>,
  existing: CustomValues = {}
): Result<CustomValueUpdates, ValidationIssue[]> {
  const updates: CustomValueUpdates = {};
  const issues: ValidationIssue[] = [];

  for (const [key, raw] of Object.entries(payload)) {
    const definition = definitions.get(key);
    if (!definition) {
      issues.push({ path: `custom.${key}`, message: `Unknown custom field '${key}'` });
      continue;
    }
    const encoded = encodeFieldValue(definition, raw);
    if (encoded.success) {
      updates[key] = encoded.data;
    } else {
      issues.push({ path: `custom.${key}`, message: encoded.error });
    }
  }

  if (issues.length > 0) {
    return err(issues);
  }

  const missing = missingRequiredFields(definitions, mergeCustomValues(existing, updates));
  if (missing.length > 0) {
    return err(missing.map((key) => ({ path: `custom.${key}`, message: `Field '${key}' is required` })));
  }

  return ok(updates);
}

export function mergeCustomValues(existing: CustomValues, updates: CustomValueUpdates): CustomValues {
  const merged: CustomValues = { ...existing };
  for (const [key, value] of Object.entries(updates)) {
    if (value === null) {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

export function missingRequiredFields(definitions: ReadonlyMap<string, FieldDefinition>, values: CustomValues): string[] {
  const missing: string[] = [];
  for (const definition of definitions.values()) {
    if (definition.required && values[definition.key] === undefined) {
      missing.push(definition.key);
    }
  }
  return missing;
}

// ── Storage ─────────────────────────────────────────────────────────────────

export function serializeFieldValue(value: CustomFieldValue): string {
  switch (value.kind) {
    case 'text':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'list':
      return JSON.stringify(value.value);
  }
}

/**
 * Decode a stored string with the definition's current type. Returns an error
 * when the stored value no longer fits, e.g. after a type change.
 */
export function deserializeFieldValue(definition: FieldDefinition, stored: string): Result<CustomFieldValue, string> {
  if (definition.type === 'multi_select') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(stored);
    } catch {
      return err('Stored multi-select value is not a list');
    }
    const encoded = encodeFieldValue({ ...definition, required: false }, parsed);
    if (!encoded.success) return err(encoded.error);
    return encoded.data ? ok(encoded.data) : err('Stored multi-select value is empty');
  }

  const encoded = encodeFieldValue({ ...definition, required: false }, stored);
  if (!encoded.success) return err(encoded.error);
  return encoded.data ? ok(encoded.data) : err('Stored value is empty');
}

export function sameFieldValue(a: CustomFieldValue | undefined, b: CustomFieldValue | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return a.kind === b.kind && serializeFieldValue(a) === serializeFieldValue(b);
}

// ── Presentation ────────────────────────────────────────────────────────────

export function toJsonValues(values: CustomValues): Record<string, CustomFieldJson> {
  const result: Record<string, CustomFieldJson> = {};
  for (const key of Object.keys(values).sort()) {
    result[key] = values[key].value;
  }
  return result;
}

export function formatCsvValue(value: CustomFieldValue | undefined): string {
  if (!value) return '';
  switch (value.kind) {
    case 'list':
      return value.value.join(',');
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'number':
      return String(value.value);
    case 'text':
      return value.value;
  }
}

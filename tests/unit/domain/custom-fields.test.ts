import { describe, it, expect } from 'vitest';
import {
  deserializeFieldValue,
  encodeFieldValue,
  formatCsvValue,
  prepareCustomValues,
  serializeFieldValue,
  toJsonValues,
} from '../../../src/domain/custom-fields.js';
import type { FieldDefinition } from '../../../src/domain/schemas.js';

function field(key: string, type: FieldDefinition['type'], extra: Partial<FieldDefinition> = {}): FieldDefinition {
  return { key, label: key, type, options: null, required: false, createdAt: '2024-01-01T00:00:00.000Z', ...extra };
}

describe('encodeFieldValue', () => {
  it('coerces numeric strings for number fields', () => {
    expect(encodeFieldValue(field('score', 'number'), ' 42.5 ')).toEqual({
      success: true,
      data: { kind: 'number', value: 42.5 },
    });
  });

  it('rejects non-numeric input for number fields', () => {
    expect(encodeFieldValue(field('score', 'number'), 'abc')).toEqual({
      success: false,
      error: 'Number fields require numeric input',
    });
  });

  it('accepts true/false in any case for bool fields', () => {
    expect(encodeFieldValue(field('vip', 'bool'), 'TRUE')).toEqual({ success: true, data: { kind: 'boolean', value: true } });
    expect(encodeFieldValue(field('vip', 'bool'), 'yes').success).toBe(false);
  });

  it('validates calendar dates', () => {
    expect(encodeFieldValue(field('since', 'date'), '2024-02-29').success).toBe(true);
    expect(encodeFieldValue(field('since', 'date'), '2023-02-29').success).toBe(false);
  });

  it('restricts selects to their options and dedupes multi-select values', () => {
    const single = field('tier', 'single_select', { options: ['gold', 'silver'] });
    const multi = field('segments', 'multi_select', { options: ['a', 'b'] });

    expect(encodeFieldValue(single, 'bronze')).toEqual({
      success: false,
      error: 'Value must be one of the available options',
    });
    expect(encodeFieldValue(multi, ['b', 'a', 'b'])).toEqual({ success: true, data: { kind: 'list', value: ['b', 'a'] } });
    expect(encodeFieldValue(multi, 'a').success).toBe(false);
  });

  it('treats null as clearing unless the field is required', () => {
    expect(encodeFieldValue(field('note', 'text'), null)).toEqual({ success: true, data: null });
    expect(encodeFieldValue(field('note', 'text', { required: true }), null)).toEqual({
      success: false,
      error: "Field 'note' is required",
    });
  });
});

describe('prepareCustomValues', () => {
  const definitions = new Map([
    ['tier', field('tier', 'text', { required: true })],
    ['score', field('score', 'number')],
  ]);

  it('reports unknown keys with their path', () => {
    const result = prepareCustomValues(definitions, { tier: 'gold', nope: 1 });
    expect(result).toEqual({
      success: false,
      error: [{ path: 'custom.nope', message: "Unknown custom field 'nope'" }],
    });
  });

  it('checks required fields against existing values', () => {
    expect(prepareCustomValues(definitions, { score: 3 }).success).toBe(false);
    expect(prepareCustomValues(definitions, { score: 3 }, { tier: { kind: 'text', value: 'gold' } })).toEqual({
      success: true,
      data: { score: { kind: 'number', value: 3 } },
    });
  });
});

describe('storage and presentation', () => {
  it('stores lists as JSON and decodes them with the definition', () => {
    const multi = field('segments', 'multi_select', { options: ['a', 'b'] });
    const stored = serializeFieldValue({ kind: 'list', value: ['a', 'b'] });

    expect(stored).toBe('["a","b"]');
    expect(deserializeFieldValue(multi, stored)).toEqual({ success: true, data: { kind: 'list', value: ['a', 'b'] } });
  });

  it('fails to decode a stored value that no longer fits the type', () => {
    expect(deserializeFieldValue(field('score', 'number'), 'abc').success).toBe(false);
  });

  it('formats values for CSV cells', () => {
    expect(formatCsvValue({ kind: 'list', value: ['a', 'b'] })).toBe('a,b');
    expect(formatCsvValue({ kind: 'boolean', value: false })).toBe('false');
    expect(formatCsvValue(undefined)).toBe('');
  });

  it('sorts keys when converting to JSON', () => {
    const json = toJsonValues({ zeta: { kind: 'number', value: 1 }, alpha: { kind: 'text', value: 'x' } });
    expect(Object.keys(json)).toEqual(['alpha', 'zeta']);
  });
});

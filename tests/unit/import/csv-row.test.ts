import { describe, it, expect } from 'vitest';
import { parseImportRow, splitList, type ImportRowContext } from '../../../src/import/csv-row.js';
import type { FieldDefinition } from '../../../src/domain/schemas.js';

const tier: FieldDefinition = {
  key: 'tier',
  label: 'Tier',
  type: 'single_select',
  options: ['gold', 'silver'],
  required: false,
  createdAt: '2024-01-01T00:00:00.000Z',
};

function context(header: string[], overrides: Partial<ImportRowContext> = {}): ImportRowContext {
  return {
    header,
    definitions: new Map([['tier', tier]]),
    autoCreateFields: false,
    existingCustom: {},
    ...overrides,
  };
}

describe('splitList', () => {
  it('splits on commas and drops blanks', () => {
    expect(splitList(' vip, eu ,,')).toEqual(['vip', 'eu']);
  });
});

describe('parseImportRow', () => {
  it('parses known columns and normalises values', () => {
    const header = ['name', 'email', 'status', 'tags', 'last_interacted_at'];
    const result = parseImportRow(
      { name: ' Ada ', email: 'ADA@Example.com', status: 'Active', tags: 'vip,eu,vip', last_interacted_at: '2024-01-01T10:00:00+01:00' },
      context(header)
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.customer).toEqual({
        name: 'Ada',
        email: 'ada@example.com',
        status: 'active',
        tags: ['vip', 'eu'],
        lastInteractedAt: '2024-01-01T09:00:00.000Z',
      });
      expect(result.data.newFields).toEqual([]);
    }
  });

  it('leaves absent columns out and clears blank ones', () => {
    const result = parseImportRow({ name: 'Ada', company: '' }, context(['name', 'company']));

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.customer).toEqual({ name: 'Ada', company: null });
      expect(result.data.preview.status).toBeNull();
      expect(result.data.preview.tags).toEqual([]);
    }
  });

  it('reports a missing name', () => {
    expect(parseImportRow({ name: '' }, context(['name']))).toEqual({ success: false, error: 'name: Required' });
  });

  it('reports an invalid email', () => {
    expect(parseImportRow({ name: 'Ada', email: 'nope' }, context(['name', 'email']))).toEqual({
      success: false,
      error: 'email: Invalid email format',
    });
  });

  it('validates custom columns against their definition', () => {
    const header = ['name', 'custom.tier'];
    const good = parseImportRow({ name: 'Ada', 'custom.tier': 'gold' }, context(header));
    const bad = parseImportRow({ name: 'Ada', 'custom.tier': 'bronze' }, context(header));

    expect(good.success && good.data.custom).toEqual({ tier: { kind: 'text', value: 'gold' } });
    expect(bad).toEqual({ success: false, error: 'custom.tier: Value must be one of the available options' });
  });

  it('rejects unknown custom columns unless auto-creation is on', () => {
    const header = ['name', 'custom.industry'];
    const row = { name: 'Ada', 'custom.industry': 'Retail' };

    expect(parseImportRow(row, context(header))).toEqual({ success: false, error: "Unknown custom field 'industry'" });

    const created = parseImportRow(row, context(header, { autoCreateFields: true }));
    expect(created.success).toBe(true);
    if (created.success) {
      expect(created.data.newFields.map((field) => [field.key, field.type])).toEqual([['industry', 'text']]);
      expect(created.data.preview.custom).toEqual({ industry: 'Retail' });
    }
  });

  it('rejects auto-created keys outside [A-Za-z0-9_]', () => {
    const result = parseImportRow(
      { name: 'Ada', 'custom.bad-key': 'x' },
      context(['name', 'custom.bad-key'], { autoCreateFields: true })
    );
    expect(result).toEqual({
      success: false,
      error: "Custom column 'custom.bad-key': key must match pattern [A-Za-z0-9_]",
    });
  });
});

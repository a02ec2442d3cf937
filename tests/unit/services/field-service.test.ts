import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestCrm, type TestCrm } from '../../helpers/crm.js';
import { ConflictError, NotFoundError, ValidationError } from '../../../src/domain/errors.js';

describe('FieldService', () => {
  let crm: TestCrm;

  beforeEach(() => {
    crm = createTestCrm();
  });

  afterEach(() => {
    crm.db.close();
  });

  it('creates definitions and lists them by key', () => {
    const { fields } = crm.services;
    fields.create({ key: 'zeta', label: 'Zeta', type: 'text' });
    const created = fields.create({ key: 'alpha', label: 'Alpha', type: 'single_select', options: ['x', 'y', 'x'] });

    expect(created.options).toEqual(['x', 'y']);
    expect(created.required).toBe(false);
    expect(fields.list().map((field) => field.key)).toEqual(['alpha', 'zeta']);
  });

  it('rejects select fields without options and options on other types', () => {
    const { fields } = crm.services;
    expect(() => fields.create({ key: 'tier', label: 'Tier', type: 'single_select' })).toThrow(ValidationError);
    expect(() => fields.create({ key: 'note', label: 'Note', type: 'text', options: ['a'] })).toThrow(ValidationError);
  });

  it('rejects keys outside [A-Za-z0-9_]', () => {
    expect(() => crm.services.fields.create({ key: 'has space', label: 'X', type: 'text' })).toThrow(ValidationError);
  });

  it('rejects a duplicate key', () => {
    const { fields } = crm.services;
    fields.create({ key: 'score', label: 'Score', type: 'number' });
    expect(() => fields.create({ key: 'score', label: 'Again', type: 'text' })).toThrow(
      new ConflictError('Field key already exists: score')
    );
  });

  it('refuses to delete a definition that still has values', () => {
    const { fields, customers } = crm.services;
    fields.create({ key: 'score', label: 'Score', type: 'number' });
    const customer = customers.create({ name: 'Ada', custom: { score: 7 } });

    expect(() => fields.delete('score')).toThrow(ConflictError);

    customers.update(customer.id, { custom: { score: null } });
    fields.delete('score');
    expect(() => fields.get('score')).toThrow(NotFoundError);
  });

  describe('update', () => {
    let customerId: string;

    beforeEach(() => {
      crm.services.fields.create({ key: 'score', label: 'Score', type: 'number' });
      customerId = crm.services.customers.create({ name: 'Ada', custom: { score: 42 } }).id;
    });

    it('re-decodes stored values under a compatible type', () => {
      crm.services.fields.update('score', { label: 'Score', type: 'text' });
      expect(crm.services.customers.get(customerId).custom).toEqual({ score: '42' });
    });

    it('refuses a type whose validation existing values fail', () => {
      const { fields, customers } = crm.services;
      fields.update('score', { label: 'Score', type: 'text' });
      customers.update(customerId, { custom: { score: 'forty-two' } });

      expect(() => fields.update('score', { label: 'Score', type: 'number' })).toThrow(ValidationError);
      expect(fields.get('score').type).toBe('text');
    });

    it('carries values across a key rename', () => {
      crm.services.fields.update('score', { key: 'points', label: 'Points', type: 'number' });

      expect(crm.services.customers.get(customerId).custom).toEqual({ points: 42 });
      expect(() => crm.services.fields.get('score')).toThrow(NotFoundError);
    });

    it('throws NotFoundError for an unknown key', () => {
      expect(() => crm.services.fields.update('missing', { label: 'X', type: 'text' })).toThrow(NotFoundError);
    });
  });
});

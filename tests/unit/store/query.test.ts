import { describe, it, expect } from 'vitest';
import { WhereClause, containsPattern, escapeLike, isPastEnd, resolvePage } from '../../../src/store/query.js';

const settings = { default_page_size: 20, max_page_size: 100 };

describe('resolvePage', () => {
  it('falls back to the default page size', () => {
    expect(resolvePage(undefined, undefined, settings)).toEqual({ page: 1, pageSize: 20, limit: 20, offset: 0 });
  });

  it('computes the offset from page and size', () => {
    expect(resolvePage(3, 10, settings)).toEqual({ page: 3, pageSize: 10, limit: 10, offset: 20 });
  });

  it('clamps oversized pages to the maximum', () => {
    const page = resolvePage(2, 500, settings);
    expect(page.pageSize).toBe(100);
    expect(page.offset).toBe(100);
  });
});

describe('isPastEnd', () => {
  it('is true once the offset reaches the total', () => {
    expect(isPastEnd(resolvePage(3, 10, settings), 25)).toBe(false);
    expect(isPastEnd(resolvePage(4, 10, settings), 25)).toBe(true);
    expect(isPastEnd(resolvePage(1, 10, settings), 0)).toBe(true);
    expect(isPastEnd(resolvePage(1e18, 100, settings), 25)).toBe(true);
  });
});

describe('escapeLike', () => {
  it('escapes wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('wraps the escaped value for substring matching', () => {
    expect(containsPattern('a_b')).toBe('%a\\_b%');
  });
});

describe('WhereClause', () => {
  it('renders nothing without conditions', () => {
    expect(new WhereClause().toSql()).toBe('');
  });

  it('generates distinct parameter names', () => {
    const where = new WhereClause();
    const first = where.param('vip', 'tag');
    const second = where.param('eu', 'tag');
    where.add(`x = ${first}`).add(`y = ${second}`);

    expect(first).toBe('@tag1');
    expect(second).toBe('@tag2');
    expect(where.toSql()).toBe('WHERE x = @tag1 AND y = @tag2');
    expect(where.params).toEqual({ tag1: 'vip', tag2: 'eu' });
  });
});

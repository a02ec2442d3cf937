/**
 * Query building helpers shared by the repositories: WHERE clause assembly
 * with named parameters, LIKE escaping and offset pagination.
 */

import { getConfig } from '../config/config.js';
import type { Config } from '../types/index.js';
import type { SqlValue } from './database.js';

export type SqlParams = Record<string, SqlValue>;

// ─── Pagination ─────────────────────────────────────────────────────────────

export interface PageRequest {
  page: number;
  pageSize: number;
  limit: number;
  offset: number;
}

/**
 * Resolve page/page_size against the configured default and maximum.
 * Oversized pages are clamped, not rejected.
 */
export function resolvePage(
  page: number | undefined,
  pageSize: number | undefined,
  settings: Config['pagination'] = getConfig().pagination
): PageRequest {
  const resolvedPage = page !== undefined && page >= 1 ? Math.floor(page) : 1;
  const requested = pageSize !== undefined && pageSize >= 1 ? Math.floor(pageSize) : settings.default_page_size;
  const resolvedSize = Math.min(requested, settings.max_page_size);

  return {
    page: resolvedPage,
    pageSize: resolvedSize,
    limit: resolvedSize,
    offset: (resolvedPage - 1) * resolvedSize,
  };
}

/**
 * True when the page starts at or after the last matching row. The row query
 * is skipped then: SQLite rejects an OFFSET beyond its 64-bit range.
 */
export function isPastEnd(page: PageRequest, total: number): boolean {
  return page.offset >= total;
}

// ─── LIKE ───────────────────────────────────────────────────────────────────

/** Escape LIKE wildcards; pair with `ESCAPE '\'`. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function containsPattern(value: string): string {
  return `%${escapeLike(value)}%`;
}

// ─── WHERE ──────────────────────────────────────────────────────────────────

export class WhereClause {
  private readonly conditions: string[] = [];
  private readonly values: SqlParams = {};
  private counter = 0;

  /**
   * Register a parameter and return its placeholder. Names are generated so
   * conditions added in a loop never collide.
   */
  param(value: SqlValue, hint = 'p'): string {
    this.counter += 1;
    const name = `${hint}${this.counter}`;
    this.values[name] = value;
    return `@${name}`;
  }

  add(condition: string): this {
    this.conditions.push(condition);
    return this;
  }

  get params(): SqlParams {
    return { ...this.values };
  }

  toSql(): string {
    return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
  }
}

/**
 * Interaction Repository: per-customer interaction log
 */

import type { CrmDatabase } from './database.js';
import { type PageRequest, isPastEnd, type SqlParams, WhereClause } from './query.js';
import { InteractionTypeSchema, type Interaction, type InteractionType } from '../domain/schemas.js';

export interface InteractionFilters {
  type?: InteractionType;
  from?: string;
  to?: string;
}

interface InteractionRow {
  id: string;
  customer_id: string;
  type: string;
  happened_at: string;
  summary: string | null;
  content: string | null;
  created_at: string;
  updated_at: string;
}

export class InteractionRepository {
  constructor(private readonly db: CrmDatabase) {}

  insert(interaction: Interaction): void {
    this.db.run('interaction.insert', (db) => {
      db.prepare<SqlParams>(`
        INSERT INTO interactions (id, customer_id, type, happened_at, summary, content, created_at, updated_at)
        VALUES (@id, @customer_id, @type, @happened_at, @summary, @content, @created_at, @updated_at)
      `).run(toParams(interaction));
    });
  }

  update(interaction: Interaction): void {
    this.db.run('interaction.update', (db) => {
      db.prepare<SqlParams>(`
        UPDATE interactions SET
          type = @type, happened_at = @happened_at, summary = @summary, content = @content, updated_at = @updated_at
        WHERE id = @id AND customer_id = @customer_id
      `).run(toParams(interaction));
    });
  }

  /**
   * Fetch an interaction only if it belongs to the given customer.
   */
  findForCustomer(customerId: string, id: string): Interaction | null {
    return this.db.run('interaction.get', (db) => {
      const row = db
        .prepare<[string, string], InteractionRow>('SELECT * FROM interactions WHERE id = ? AND customer_id = ?')
        .get(id, customerId);
      return row ? rowToInteraction(row) : null;
    });
  }

  delete(customerId: string, id: string): boolean {
    return this.db.run('interaction.delete', (db) => {
      return db.prepare<[string, string]>('DELETE FROM interactions WHERE id = ? AND customer_id = ?').run(id, customerId)
        .changes > 0;
    });
  }

  /** Newest first. */
  list(customerId: string, filters: InteractionFilters, page: PageRequest): { rows: Interaction[]; total: number } {
    const where = new WhereClause();
    where.add(`customer_id = ${where.param(customerId, 'customer')}`);
    if (filters.type) where.add(`type = ${where.param(filters.type, 'type')}`);
    if (filters.from) where.add(`happened_at >= ${where.param(filters.from, 'from')}`);
    if (filters.to) where.add(`happened_at <= ${where.param(filters.to, 'to')}`);

    return this.db.run('interaction.list', (db) => {
      const totalRow = db
        .prepare<SqlParams, { total: number }>(`SELECT COUNT(*) AS total FROM interactions ${where.toSql()}`)
        .get(where.params);
      const total = totalRow?.total ?? 0;
      const rows = isPastEnd(page, total)
        ? []
        : db
            .prepare<SqlParams, InteractionRow>(
              `SELECT * FROM interactions ${where.toSql()}
               ORDER BY happened_at DESC, rowid DESC
               LIMIT @limit OFFSET @offset`
            )
            .all({ ...where.params, limit: page.limit, offset: page.offset });

      return { rows: rows.map(rowToInteraction), total };
    });
  }

  /**
   * The newest interaction of each listed customer, keyed by customer id.
   */
  latestForCustomers(customerIds: string[]): Map<string, Interaction> {
    const latest = new Map<string, Interaction>();
    if (customerIds.length === 0) return latest;

    const placeholders = customerIds.map(() => '?').join(', ');
    return this.db.run('interaction.latest', (db) => {
      const rows = db
        .prepare<string[], InteractionRow>(
          `SELECT * FROM interactions
           WHERE customer_id IN (${placeholders})
           ORDER BY customer_id, happened_at DESC, rowid DESC`
        )
        .all(...customerIds);

      for (const row of rows) {
        if (!latest.has(row.customer_id)) {
          latest.set(row.customer_id, rowToInteraction(row));
        }
      }
      return latest;
    });
  }
}

function toParams(interaction: Interaction): SqlParams {
  return {
    id: interaction.id,
    customer_id: interaction.customerId,
    type: interaction.type,
    happened_at: interaction.happenedAt,
    summary: interaction.summary,
    content: interaction.content,
    created_at: interaction.createdAt,
    updated_at: interaction.updatedAt,
  };
}

function rowToInteraction(row: InteractionRow): Interaction {
  return {
    id: row.id,
    customerId: row.customer_id,
    type: InteractionTypeSchema.catch('other').parse(row.type),
    happenedAt: row.happened_at,
    summary: row.summary,
    content: row.content,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Opportunity Repository: sales pipeline rows per customer
 */

import type { CrmDatabase } from './database.js';
import { type PageRequest, isPastEnd, type SqlParams, WhereClause } from './query.js';
import { OpportunityStatusSchema, type Opportunity, type OpportunityStatus } from '../domain/schemas.js';

export interface OpportunityFilters {
  status?: OpportunityStatus;
}

interface OpportunityRow {
  id: string;
  customer_id: string;
  name: string;
  description: string | null;
  status: string;
  amount: number;
  probability: number | null;
  expected_close_date: string | null;
  created_at: string;
  updated_at: string;
}

export class OpportunityRepository {
  constructor(private readonly db: CrmDatabase) {}

  insert(opportunity: Opportunity): void {
    this.db.run('opportunity.insert', (db) => {
      db.prepare<SqlParams>(`
        INSERT INTO opportunities (id, customer_id, name, description, status, amount, probability, expected_close_date, created_at, updated_at)
        VALUES (@id, @customer_id, @name, @description, @status, @amount, @probability, @expected_close_date, @created_at, @updated_at)
      `).run(toParams(opportunity));
    });
  }

  update(opportunity: Opportunity): void {
    this.db.run('opportunity.update', (db) => {
      db.prepare<SqlParams>(`
        UPDATE opportunities SET
          name = @name, description = @description, status = @status, amount = @amount,
          probability = @probability, expected_close_date = @expected_close_date, updated_at = @updated_at
        WHERE id = @id AND customer_id = @customer_id
      `).run(toParams(opportunity));
    });
  }

  findForCustomer(customerId: string, id: string): Opportunity | null {
    return this.db.run('opportunity.get', (db) => {
      const row = db
        .prepare<[string, string], OpportunityRow>('SELECT * FROM opportunities WHERE id = ? AND customer_id = ?')
        .get(id, customerId);
      return row ? rowToOpportunity(row) : null;
    });
  }

  delete(customerId: string, id: string): boolean {
    return this.db.run('opportunity.delete', (db) => {
      return db.prepare<[string, string]>('DELETE FROM opportunities WHERE id = ? AND customer_id = ?').run(id, customerId)
        .changes > 0;
    });
  }

  list(customerId: string, filters: OpportunityFilters, page: PageRequest): { rows: Opportunity[]; total: number } {
    const where = new WhereClause();
    where.add(`customer_id = ${where.param(customerId, 'customer')}`);
    if (filters.status) where.add(`status = ${where.param(filters.status, 'status')}`);

    return this.db.run('opportunity.list', (db) => {
      const totalRow = db
        .prepare<SqlParams, { total: number }>(`SELECT COUNT(*) AS total FROM opportunities ${where.toSql()}`)
        .get(where.params);
      const total = totalRow?.total ?? 0;
      const rows = isPastEnd(page, total)
        ? []
        : db
            .prepare<SqlParams, OpportunityRow>(
              `SELECT * FROM opportunities ${where.toSql()} ORDER BY rowid ASC LIMIT @limit OFFSET @offset`
            )
            .all({ ...where.params, limit: page.limit, offset: page.offset });

      return { rows: rows.map(rowToOpportunity), total };
    });
  }
}

function toParams(opportunity: Opportunity): SqlParams {
  return {
    id: opportunity.id,
    customer_id: opportunity.customerId,
    name: opportunity.name,
    description: opportunity.description,
    status: opportunity.status,
    amount: opportunity.amount,
    probability: opportunity.probability,
    expected_close_date: opportunity.expectedCloseDate,
    created_at: opportunity.createdAt,
    updated_at: opportunity.updatedAt,
  };
}

function rowToOpportunity(row: OpportunityRow): Opportunity {
  return {
    id: row.id,
    customerId: row.customer_id,
    name: row.name,
    description: row.description,
    status: OpportunityStatusSchema.catch('open').parse(row.status),
    amount: row.amount,
    probability: row.probability,
    expectedCloseDate: row.expected_close_date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Task Repository: follow-up reminders per customer
 *
 * remind_at holds either a bare date (YYYY-MM-DD) or a UTC timestamp. Both
 * sort lexically, so range filters and ordering work on the raw column.
 */

import type { CrmDatabase } from './database.js';
import { type PageRequest, isPastEnd, type SqlParams, WhereClause } from './query.js';
import type { Task } from '../domain/schemas.js';

export interface TaskFilters {
  done?: boolean;
  from?: string;
  to?: string;
}

interface TaskRow {
  id: string;
  customer_id: string;
  remind_at: string;
  content: string;
  done: number;
  sync_external: number;
  created_at: string;
  updated_at: string;
}

/**
 * Overdue: not done and remind_at already past. A date-only reminder is due
 * for the whole day, so it is overdue only once the UTC date has moved on.
 */
export const OVERDUE_CONDITION =
  'done = 0 AND CASE WHEN length(remind_at) = 10 THEN remind_at < @today ELSE remind_at < @now END';

export function overdueParams(now: Date = new Date()): { now: string; today: string } {
  const iso = now.toISOString();
  return { now: iso, today: iso.slice(0, 10) };
}

export class TaskRepository {
  constructor(private readonly db: CrmDatabase) {}

  insert(task: Task): void {
    this.db.run('task.insert', (db) => {
      db.prepare<SqlParams>(`
        INSERT INTO tasks (id, customer_id, remind_at, content, done, sync_external, created_at, updated_at)
        VALUES (@id, @customer_id, @remind_at, @content, @done, @sync_external, @created_at, @updated_at)
      `).run(toParams(task));
    });
  }

  update(task: Task): void {
    this.db.run('task.update', (db) => {
      db.prepare<SqlParams>(`
        UPDATE tasks SET
          remind_at = @remind_at, content = @content, done = @done, sync_external = @sync_external, updated_at = @updated_at
        WHERE id = @id AND customer_id = @customer_id
      `).run(toParams(task));
    });
  }

  findForCustomer(customerId: string, id: string): Task | null {
    return this.db.run('task.get', (db) => {
      const row = db.prepare<[string, string], TaskRow>('SELECT * FROM tasks WHERE id = ? AND customer_id = ?').get(id, customerId);
      return row ? rowToTask(row) : null;
    });
  }

  delete(customerId: string, id: string): boolean {
    return this.db.run('task.delete', (db) => {
      return db.prepare<[string, string]>('DELETE FROM tasks WHERE id = ? AND customer_id = ?').run(id, customerId).changes > 0;
    });
  }

  /** Soonest first. */
  list(customerId: string, filters: TaskFilters, page: PageRequest): { rows: Task[]; total: number } {
    const where = new WhereClause();
    where.add(`customer_id = ${where.param(customerId, 'customer')}`);
    if (filters.done !== undefined) where.add(`done = ${where.param(filters.done ? 1 : 0, 'done')}`);
    if (filters.from) where.add(`remind_at >= ${where.param(filters.from, 'from')}`);
    if (filters.to) where.add(`remind_at <= ${where.param(filters.to, 'to')}`);

    return this.db.run('task.list', (db) => {
      const totalRow = db
        .prepare<SqlParams, { total: number }>(`SELECT COUNT(*) AS total FROM tasks ${where.toSql()}`)
        .get(where.params);
      const total = totalRow?.total ?? 0;
      const rows = isPastEnd(page, total)
        ? []
        : db
            .prepare<SqlParams, TaskRow>(
              `SELECT * FROM tasks ${where.toSql()} ORDER BY remind_at ASC, rowid ASC LIMIT @limit OFFSET @offset`
            )
            .all({ ...where.params, limit: page.limit, offset: page.offset });

      return { rows: rows.map(rowToTask), total };
    });
  }
}

function toParams(task: Task): SqlParams {
  return {
    id: task.id,
    customer_id: task.customerId,
    remind_at: task.remindAt,
    content: task.content,
    done: task.done ? 1 : 0,
    sync_external: task.syncExternal ? 1 : 0,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    customerId: row.customer_id,
    remindAt: row.remind_at,
    content: row.content,
    done: row.done === 1,
    syncExternal: row.sync_external === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

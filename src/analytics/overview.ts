/**
 * Analytics overview: headline counts computed straight from the store on
 * every call.
 */

import type { CrmDatabase } from '../store/database.js';
import { OVERDUE_CONDITION, overdueParams } from '../store/task-repository.js';

export interface AnalyticsOverview {
  total_customers: number;
  lead_count: number;
  open_opportunity_count: number;
  overdue_task_count: number;
  won_opportunity_count: number;
  open_pipeline_amount: number;
}

interface OverviewRow {
  total_customers: number;
  lead_count: number | null;
  open_opportunity_count: number;
  won_opportunity_count: number;
  open_pipeline_amount: number | null;
  overdue_task_count: number;
}

export class AnalyticsService {
  constructor(private readonly db: CrmDatabase) {}

  overview(now: Date = new Date()): AnalyticsOverview {
    return this.db.run('analytics.overview', (db) => {
      const row = db
        .prepare<{ now: string; today: string }, OverviewRow>(`
          SELECT
            (SELECT COUNT(*) FROM customers) AS total_customers,
            (SELECT SUM(CASE WHEN status = 'lead' THEN 1 ELSE 0 END) FROM customers) AS lead_count,
            (SELECT COUNT(*) FROM opportunities WHERE status = 'open') AS open_opportunity_count,
            (SELECT COUNT(*) FROM opportunities WHERE status = 'won') AS won_opportunity_count,
            (SELECT SUM(amount) FROM opportunities WHERE status = 'open') AS open_pipeline_amount,
            (SELECT COUNT(*) FROM tasks WHERE ${OVERDUE_CONDITION}) AS overdue_task_count
        `)
        .get(overdueParams(now));

      return {
        total_customers: row?.total_customers ?? 0,
        lead_count: row?.lead_count ?? 0,
        open_opportunity_count: row?.open_opportunity_count ?? 0,
        overdue_task_count: row?.overdue_task_count ?? 0,
        won_opportunity_count: row?.won_opportunity_count ?? 0,
        open_pipeline_amount: row?.open_pipeline_amount ?? 0,
      };
    });
  }
}

/**
 * Import report store
 *
 * Keeps generated CSV reports in memory for a limited time so the client can
 * download them from the URL returned by an import. Reports do not survive a
 * restart.
 */

import { randomUUID } from 'node:crypto';
import { createLogger } from '../utils/logger.js';

const log = createLogger('crm:import-reports');

interface StoredReport {
  content: string;
  expiresAt: number;
}

export class ImportReportStore {
  private readonly reports = new Map<string, StoredReport>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Store a report and return its token. */
  save(content: string): string {
    this.purgeExpired();
    const token = randomUUID().replace(/-/g, '');
    this.reports.set(token, { content, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  fetch(token: string): string | null {
    const report = this.reports.get(token);
    if (!report) return null;
    if (report.expiresAt <= this.now()) {
      this.reports.delete(token);
      return null;
    }
    return report.content;
  }

  purgeExpired(): number {
    const now = this.now();
    let purged = 0;
    for (const [token, report] of this.reports) {
      if (report.expiresAt <= now) {
        this.reports.delete(token);
        purged++;
      }
    }
    if (purged > 0) {
      log.debug({ purged }, 'Expired import reports purged');
    }
    return purged;
  }

  get size(): number {
    return this.reports.size;
  }
}

export function reportUrl(token: string): string {
  return `/api/import/reports/${token}.csv`;
}

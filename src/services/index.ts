/**
 * Service wiring shared by the API server and the CLI.
 */

import type { CrmDatabase } from '../store/database.js';
import { InteractionRepository } from '../store/interaction-repository.js';
import { getConfig } from '../config/config.js';
import type { Config } from '../types/index.js';
import { AnalyticsService } from '../analytics/overview.js';
import { CustomerExporter } from '../export/customer-exporter.js';
import { CustomerImporter } from '../import/customer-importer.js';
import { ImportReportStore } from '../import/report-store.js';
import { CustomerService } from './customer-service.js';
import { FieldService } from './field-service.js';
import { InteractionService } from './interaction-service.js';
import { OpportunityService } from './opportunity-service.js';
import { TaskService } from './task-service.js';

export { CustomerService, FieldService, InteractionService, OpportunityService, TaskService };

export interface CrmServices {
  db: CrmDatabase;
  customers: CustomerService;
  interactions: InteractionService;
  opportunities: OpportunityService;
  tasks: TaskService;
  fields: FieldService;
  importer: CustomerImporter;
  exporter: CustomerExporter;
  reports: ImportReportStore;
  analytics: AnalyticsService;
}

export function createServices(db: CrmDatabase, config: Config = getConfig()): CrmServices {
  const fields = new FieldService(db);
  const customers = new CustomerService(db, fields);
  const reports = new ImportReportStore(config.import.report_ttl_hours * 60 * 60 * 1000);

  return {
    db,
    customers,
    interactions: new InteractionService(db),
    opportunities: new OpportunityService(db),
    tasks: new TaskService(db),
    fields,
    importer: new CustomerImporter(db, customers, fields, reports, config),
    exporter: new CustomerExporter(customers, fields, new InteractionRepository(db)),
    reports,
    analytics: new AnalyticsService(db),
  };
}

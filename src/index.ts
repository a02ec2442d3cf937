/**
 * CRM: Main Exports
 *
 * Public API surface for embedding the CRM backend.
 *
 * @module crm-backend
 * @version 1.0.0
 */

// Types
export { type Config, type NaturalKey, type Result, ok, err, isOk, isErr } from './types/index.js';
export * from './domain/schemas.js';
export {
  CrmError,
  ValidationError,
  NotFoundError,
  ConflictError,
  StorageError,
  type ValidationIssue,
} from './domain/errors.js';
export { type CustomFieldValue, encodeFieldValue, prepareCustomValues } from './domain/custom-fields.js';

// Config
export { getConfig, loadConfig, reloadConfig, DEFAULT_CONFIG, getDatabasePath } from './config/config.js';

// Logging
export { createLogger } from './utils/logger.js';

// Store
export { CrmDatabase } from './store/database.js';

// Services
export {
  createServices,
  type CrmServices,
  CustomerService,
  FieldService,
  InteractionService,
  OpportunityService,
  TaskService,
} from './services/index.js';

// Import / Export
export {
  CustomerImporter,
  type ImportOptions,
  type DryRunReport,
  type CommitResult,
} from './import/customer-importer.js';
export { parseImportRow } from './import/csv-row.js';
export { ImportReportStore } from './import/report-store.js';
export { CustomerExporter, parseExportQuery, type CustomerExportOptions } from './export/customer-exporter.js';

// Analytics
export { AnalyticsService, type AnalyticsOverview } from './analytics/overview.js';

// API
export { createServer, startServer } from './api/server.js';
export { apiRoutes, type ApiDependencies } from './api/routes.js';

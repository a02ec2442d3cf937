#!/usr/bin/env node

/**
 * CRM: Command Line Interface
 *
 * Runs the API server and the CSV import/export and analytics operations
 * against the configured database.
 *
 * @module cli
 * @version 1.0.0
 */

import { Command } from 'commander';
import { registerServeCommand } from './commands/serve.js';
import { registerImportCommand } from './commands/import.js';
import { registerExportCommand } from './commands/export.js';
import { registerOverviewCommand } from './commands/overview.js';

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('crm')
  .description('CRM backend: customers, interactions, opportunities and tasks')
  .version('1.0.0');

registerServeCommand(program);
registerImportCommand(program);
registerExportCommand(program);
registerOverviewCommand(program);

// ═══════════════════════════════════════════════════════════════════════════
// PARSE & EXECUTE
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});

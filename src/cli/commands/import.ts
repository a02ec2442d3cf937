import { Command } from 'commander';
import * as fs from 'node:fs';
import { ImportOptionsSchema } from '../../import/customer-importer.js';
import { ValidationError } from '../../domain/errors.js';
import { type CommonOptions, describeCliError, openServices } from '../context.js';

interface ImportCommandOptions extends CommonOptions {
  dryRun?: boolean;
  mode: string;
  autoCreateFields?: boolean;
  report?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// IMPORT CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export function registerImportCommand(program: Command): void {
  program
    .command('import <file>')
    .description('Import customers from a CSV file')
    .option('-c, --config <path>', 'Path to config file')
    .option('--dry-run', 'Validate only; write nothing')
    .option('--mode <mode>', 'upsert or create_only', 'upsert')
    .option('--auto-create-fields', 'Create text fields for unknown custom.<key> columns')
    .option('--report <path>', 'Write the per-row report CSV to this path')
    .action((file: string, options: ImportCommandOptions) => {
      try {
        const parsed = ImportOptionsSchema.safeParse({
          mode: options.mode,
          auto_create_fields: options.autoCreateFields ?? false,
        });
        if (!parsed.success) {
          throw ValidationError.fromZod(parsed.error, 'Invalid import options');
        }

        const content = fs.readFileSync(file);
        const { services } = openServices(options);
        try {
          if (options.dryRun) {
            const report = services.importer.dryRun(content, parsed.data);
            process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
            return;
          }

          const result = services.importer.commit(content, parsed.data);
          process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);

          if (options.report) {
            const token = /reports\/([0-9a-f]+)\.csv$/.exec(result.report_url)?.[1];
            const report = token ? services.reports.fetch(token) : null;
            if (report !== null) {
              fs.writeFileSync(options.report, report, 'utf-8');
              process.stdout.write(`Report written to ${options.report}\n`);
            }
          }
        } finally {
          services.db.close();
        }
      } catch (error) {
        console.error(`Error: ${describeCliError(error)}`);
        process.exit(1);
      }
    });
}

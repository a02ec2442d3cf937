import { Command } from 'commander';
import * as fs from 'node:fs';
import { pipeline } from 'node:stream/promises';
import { type CommonOptions, describeCliError, openServices } from '../context.js';

interface ExportCommandOptions extends CommonOptions {
  out?: string;
  search?: string;
  status?: string;
  tag?: string[];
  company?: string;
  sortBy?: string;
  sortDir?: string;
  from?: string;
  to?: string;
  includePrivate?: boolean;
}

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Export customers as CSV')
    .option('-c, --config <path>', 'Path to config file')
    .option('-o, --out <path>', 'Write to a file instead of stdout')
    .option('--search <text>', 'Substring match on name, email, phone, company')
    .option('--status <status>', 'Only customers with this status')
    .option('--tag <tags...>', 'Only customers carrying every tag')
    .option('--company <company>', 'Exact company, case-insensitive')
    .option('--sort-by <field>', 'Sort field')
    .option('--sort-dir <dir>', 'asc or desc')
    .option('--from <timestamp>', 'Last interaction at or after this time')
    .option('--to <timestamp>', 'Last interaction at or before this time')
    .option('--include-private', 'Write email and phone instead of leaving them blank')
    .action(async (options: ExportCommandOptions) => {
      try {
        const { services } = openServices(options);
        try {
          const stream = services.exporter.stream({
            search: options.search,
            status: options.status,
            tag: options.tag,
            company: options.company,
            sort_by: options.sortBy,
            sort_dir: options.sortDir,
            from: options.from,
            to: options.to,
            include_private: options.includePrivate,
          });
          const target: NodeJS.WritableStream = options.out ? fs.createWriteStream(options.out) : process.stdout;
          await pipeline(stream, target, { end: Boolean(options.out) });
        } finally {
          services.db.close();
        }
      } catch (error) {
        console.error(`Error: ${describeCliError(error)}`);
        process.exit(1);
      }
    });
}

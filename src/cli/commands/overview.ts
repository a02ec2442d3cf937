import { Command } from 'commander';
import { type CommonOptions, describeCliError, openServices } from '../context.js';

export function registerOverviewCommand(program: Command): void {
  program
    .command('overview')
    .description('Show headline CRM counts')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action((options: CommonOptions & { json?: boolean }) => {
      try {
        const { services } = openServices(options);
        try {
          const overview = services.analytics.overview();
          if (options.json) {
            console.log(JSON.stringify(overview, null, 2));
            return;
          }
          for (const [key, value] of Object.entries(overview)) {
            console.log(`${key.padEnd(24)} ${value}`);
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

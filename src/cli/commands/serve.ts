import { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { type CommonOptions, describeCliError, openServices } from '../context.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the REST API server')
    .option('-c, --config <path>', 'Path to config file')
    .option('-p, --port <port>', 'Port to listen on (overrides config)')
    .option('--host <host>', 'Host to bind (overrides config)')
    .action(async (options: CommonOptions & { port?: string; host?: string }) => {
      try {
        const { config, services } = openServices(options);

        const port = options.port !== undefined ? parseInt(options.port, 10) : config.api.port;
        if (isNaN(port) || port < 1 || port > 65535) {
          services.db.close();
          process.stderr.write('Error: Port must be between 1 and 65535\n');
          process.exit(1);
        }

        await startServer(services, {
          ...config,
          api: { ...config.api, port, host: options.host ?? config.api.host },
        });
        process.stdout.write(`CRM API running on http://${options.host ?? config.api.host}:${port}\n`);
      } catch (error) {
        process.stderr.write(`Failed to start server: ${describeCliError(error)}\n`);
        process.exit(1);
      }
    });
}

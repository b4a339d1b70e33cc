import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import type { ResolvedConfig } from '../../config/types.js';
import { startServer } from '../../server/index.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';
import { parseInteger } from '../options.js';

interface ServeCommandOptions {
  port?: number;
  host?: string;
  route?: string;
  contentType?: string;
  pollInterval?: number;
  config?: string;
}

export function registerServeCommand(program: Command): void {
  program
    .command('serve [file]')
    .description('Serve a file over HTTP and reload it whenever it changes')
    .option('-p, --port <port>', 'port to listen on (default 8080)', parseInteger)
    .option('--host <host>', 'address to bind (default 0.0.0.0)')
    .option('-r, --route <route>', 'route serving the file (default /metrics)')
    .option('--content-type <type>', 'Content-Type of the served file')
    .option('--poll-interval <ms>', 'symlink check interval (default 1000)', parseInteger)
    .option('-c, --config <path>', 'config file (default ./mountwatch.json)')
    .action(async (file: string | undefined, options: ServeCommandOptions): Promise<void> => {
      let config: ResolvedConfig;
      try {
        config = loadConfig({
          configPath: options.config,
          cli: {
            file,
            server: {
              port: options.port,
              host: options.host,
              route: options.route,
              contentType: options.contentType
            },
            watch: { pollIntervalMs: options.pollInterval }
          }
        });
      } catch (error) {
        console.error('❌', getErrorMessage(error));
        process.exit(1);
      }

      try {
        const running = await startServer(config);
        print(`✅ Serving ${config.file} at http://${config.server.host}:${config.server.port}${config.server.route}`);
        print('Press Ctrl+C to stop.');

        await new Promise<void>(resolve => {
          const shutdown = (): void => {
            print('\nStopping server...');
            void running
              .close()
              .catch((error: unknown) => {
                console.error('❌ Error while stopping:', getErrorMessage(error));
                process.exitCode = 1;
              })
              .finally(() => {
                process.off('SIGINT', shutdown);
                process.off('SIGTERM', shutdown);
                resolve();
              });
          };

          process.on('SIGINT', shutdown);
          process.on('SIGTERM', shutdown);
        });
      } catch (error) {
        console.error('❌ Failed to start server:', getErrorMessage(error));
        process.exit(1);
      }
    });
}

import chalk from 'chalk';
import { Command } from 'commander';
import { watch } from '../../filewatch/watch.js';
import type { WatchHandle } from '../../filewatch/channel.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { print } from '../../utils/logger.js';
import { parseInteger } from '../options.js';

interface WatchCommandOptions {
  pollInterval?: number;
}

export function registerWatchCommand(program: Command): void {
  program
    .command('watch <file>')
    .description('Print a line each time a file changes, following symlink swaps')
    .option('--poll-interval <ms>', 'symlink check interval (default 1000)', parseInteger)
    .action(async (file: string, options: WatchCommandOptions): Promise<void> => {
      const controller = new AbortController();
      const shutdown = (): void => {
        print('\nStopping watcher...');
        controller.abort();
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      print(chalk.cyan(`👀 Watching ${file} for changes... Press Ctrl+C to stop.`));

      let changes = 0;
      try {
        while (!controller.signal.aborted) {
          let handle: WatchHandle;
          try {
            handle = await watch(controller.signal, file, { pollIntervalMs: options.pollInterval });
          } catch (error) {
            console.error(chalk.red(`❌ ${getErrorMessage(error)}`));
            process.exitCode = 1;
            return;
          }

          while (!(await handle.receive()).done) {
            changes++;
            print(`${chalk.green('●')} ${new Date().toISOString()} changed (${changes})`);
          }

          if (!controller.signal.aborted) {
            print(chalk.yellow('↻ Watch ended (file replaced, removed or symlink changed), re-watching...'));
          }
        }
      } finally {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
      }
    });
}

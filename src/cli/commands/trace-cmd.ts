import { Command } from 'commander';
import { traceSymlinks } from '../../filewatch/trace.js';
import { print } from '../../utils/logger.js';

export function registerTraceCommand(program: Command): void {
  program
    .command('trace <file>')
    .description('Show the symbolic links a path resolves through')
    .action(async (file: string): Promise<void> => {
      const chain = await traceSymlinks(file);

      if (chain.length === 0) {
        print('(no symbolic links)');
        return;
      }

      for (const edge of chain) {
        print(`${edge.linkPath} -> ${edge.target}`);
      }
    });
}

import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigSources, loadConfig } from '../../config/loader.js';
import type { MountwatchConfig, ResolvedConfig } from '../../config/types.js';
import { getErrorMessage } from '../../utils/error-utils.js';

function displayConfig(config: MountwatchConfig | ResolvedConfig | null, title: string): void {
  if (!config || Object.keys(config).length === 0) {
    process.stdout.write(`${chalk.gray(`  ${title}: (empty)`)}\n`);
    return;
  }

  process.stdout.write(`${chalk.bold(`  ${title}:`)}\n`);
  process.stdout.write(`  ${JSON.stringify(config, null, 2).split('\n').join('\n  ')}\n`);
}

export function registerConfigCommands(program: Command): void {
  const configCommand = program
    .command('config')
    .description('Inspect mountwatch configuration');

  configCommand
    .command('show')
    .description('Show every configuration source and the resolved result')
    .option('-c, --config <path>', 'config file (default ./mountwatch.json)')
    .action((options: { config?: string }) => {
      try {
        const sources = getConfigSources({ configPath: options.config });

        process.stdout.write(`${chalk.bold('mountwatch configuration')}\n\n`);
        displayConfig(sources.file, `Config file${sources.filePath ? ` (${sources.filePath})` : ''}`);
        displayConfig(sources.env, 'Environment');
        process.stdout.write('\n');

        displayConfig(loadConfig({ configPath: options.config }), 'Resolved');
      } catch (error) {
        console.error(chalk.red(`❌ ${getErrorMessage(error)}`));
        process.exitCode = 1;
      }
    });
}

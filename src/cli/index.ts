import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { registerConfigCommands } from './commands/config-cmd.js';
import { registerServeCommand } from './commands/serve-cmd.js';
import { registerTraceCommand } from './commands/trace-cmd.js';
import { registerWatchCommand } from './commands/watch-cmd.js';

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('mountwatch')
    .description('Serve a file over HTTP and keep it fresh across writes and symlink swaps')
    .version(readPackageVersion());

  registerServeCommand(program);
  registerWatchCommand(program);
  registerTraceCommand(program);
  registerConfigCommands(program);

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}

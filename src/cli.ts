import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { handleInspectCommand } from './commands/inspect.js';
import { configure, resetConfig } from './config.js';
import { loadEnvFiles } from './env-loader.js';

function readVersion(): string {
  const packageJsonPath = path.join(__dirname, '..', 'package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('minion')
    .description('Minion Forge - build sealed classes from declarative specifications')
    .version(readVersion())
    .option('-v, --verbose', 'Enable debug logging', false)
    .hook('preAction', (command) => {
      if (command.opts<{ verbose?: boolean }>().verbose) {
        configure({ logLevel: 'debug' });
      }
    });

  program
    .command('inspect <module>')
    .description('Build every specification a JavaScript module exports and print the class layouts')
    .option(
      '--format <format>',
      'Output format: yaml or json',
      'yaml'
    )
    .action(handleInspectCommand);

  return program;
}

/**
 * Parse command line arguments and execute
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  loadEnvFiles(process.cwd());
  // Settings may have been read before the .env files were loaded
  resetConfig();

  const program = createProgram();
  await program.parseAsync(argv);
}

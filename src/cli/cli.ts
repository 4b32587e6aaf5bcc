/**
 * kvfn CLI
 *
 * Operator command-line interface for the function runtime: run it, seed
 * its input key, and read back its output key.
 *
 * @module kv-function-runtime/cli
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SERVICE_VERSION } from '../runtime/logger.js';
import { inspectCommand, seedCommand, startCommand } from './commands/index.js';
import { globalConfig, resolveCliConfig, setGlobalConfig, type GlobalOptions } from './config.js';
import { formatError } from './formatters.js';

/**
 * Main CLI program
 */
export const program = new Command();

program
  .name('kvfn')
  .description(chalk.bold('kvfn') + '\n\nRuns a handler against a Redis key whenever its value changes.')
  .version(SERVICE_VERSION, '-v, --version', 'Display version information')
  .option('--host <host>', 'Redis host (env REDIS_HOST)')
  .option('--port <port>', 'Redis port (env REDIS_PORT)')
  .option('--db <index>', 'Redis logical database (env REDIS_DB)')
  .option('--verbose', 'Enable verbose output')
  .option('-q, --quiet', 'Suppress all output except errors')
  .hook('preAction', (thisCommand) => {
    setGlobalConfig(resolveCliConfig(thisCommand.opts<GlobalOptions>()));
  });

// Register commands
program.addCommand(startCommand);
program.addCommand(seedCommand);
program.addCommand(inspectCommand);

/**
 * Error handler
 */
export function handleError(error: unknown): never {
  if (error instanceof Error) {
    console.error(formatError(error, globalConfig.verbose));
  } else {
    console.error(formatError(String(error)));
  }
  process.exit(1);
}

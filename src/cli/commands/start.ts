/**
 * Start Command
 *
 * Runs the function runtime in the foreground. Flags override the matching
 * environment variables; everything else is resolved exactly as the bare
 * entry point does.
 *
 * @module kv-function-runtime/cli/commands/start
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ENV_VARS } from '../../runtime/config.js';
import { main } from '../../runtime/entry.js';

/**
 * Options accepted by `start`
 */
export interface StartOptions {
  handler?: string;
  interval?: string;
  policy?: string;
  inputKey?: string;
  outputKey?: string;
  logLevel?: string;
}

/**
 * Layers command-line flags over an environment, leaving unset flags alone
 */
export function buildStartEnvironment(
  options: StartOptions,
  globals: { host?: string; port?: string; db?: string },
  env: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
  const overrides: Array<[string, string | undefined]> = [
    [ENV_VARS.REDIS_HOST, globals.host],
    [ENV_VARS.REDIS_PORT, globals.port],
    [ENV_VARS.REDIS_DB, globals.db],
    [ENV_VARS.HANDLER_PATH, options.handler],
    [ENV_VARS.POLL_INTERVAL_MS, options.interval],
    [ENV_VARS.CHANGE_POLICY, options.policy],
    [ENV_VARS.REDIS_INPUT_KEY, options.inputKey],
    [ENV_VARS.REDIS_OUTPUT_KEY, options.outputKey],
    [ENV_VARS.LOG_LEVEL, options.logLevel],
  ];

  const merged: NodeJS.ProcessEnv = { ...env };
  for (const [name, value] of overrides) {
    if (value !== undefined) {
      merged[name] = value;
    }
  }
  return merged;
}

/**
 * Start command
 */
export const startCommand = new Command('start')
  .description('Poll the input key and run the handler whenever its value changes')
  .option('--handler <path>', 'Handler module path (env HANDLER_PATH)')
  .option('--interval <ms>', 'Poll interval in milliseconds (env POLL_INTERVAL_MS)')
  .option('--policy <policy>', 'Change policy: advance-on-read or retry-on-failure (env CHANGE_POLICY)')
  .option('--input-key <key>', 'Key polled for input (env REDIS_INPUT_KEY)')
  .option('--output-key <key>', 'Key the result is written to (env REDIS_OUTPUT_KEY)')
  .option('--log-level <level>', 'Log level (env LOG_LEVEL)')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Run the handler at the default location')}
  $ kvfn start --output-key metrics-out

  ${chalk.dim('# Re-process an input whose previous cycle failed')}
  $ kvfn start --output-key metrics-out --policy retry-on-failure --handler ./handler.mjs
`)
  .action(async (options: StartOptions, command: Command) => {
    const globals = command.optsWithGlobals<{ host?: string; port?: string; db?: string }>();
    await main(buildStartEnvironment(options, globals));
  });

/**
 * Seed Command
 *
 * Writes a JSON object under a key so the runtime has input to work on.
 * Without --file, a small mock metrics payload is written.
 *
 * @module kv-function-runtime/cli/commands/seed
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { ENV_VARS, DEFAULTS } from '../../runtime/config.js';
import { createLogger } from '../../runtime/logger.js';
import { decodePayload } from '../../runtime/poll-loop.js';
import { createRedisStore } from '../../runtime/store.js';
import type { KeyValueStore, Payload } from '../../runtime/types.js';
import { globalConfig } from '../config.js';
import { formatJson } from '../formatters.js';

/**
 * Payload written when no file is given
 */
export const MOCK_METRICS_PAYLOAD: Payload = {
  'percent-network-egress': 100.0,
  'percent-memory-cache': 100.0,
  'avg-util-cpu0-60sec': 25.45,
  'avg-util-cpu1-60sec': 25.89,
  'avg-util-cpu2-60sec': 0.34,
  'avg-util-cpu3-60sec': 1.12,
};

/**
 * Options accepted by `seed`
 */
export interface SeedOptions {
  key: string;
  file?: string;
}

/**
 * Reads the seed payload from a JSON file, or falls back to the mock payload
 *
 * @throws DecodeError when the file does not hold a JSON object
 */
export async function loadSeedPayload(file?: string): Promise<Payload> {
  if (!file) {
    return MOCK_METRICS_PAYLOAD;
  }
  const raw = await readFile(file, 'utf-8');
  return decodePayload(raw);
}

/**
 * Encodes and writes the payload, returning what was written
 */
export async function seedKey(store: KeyValueStore, key: string, payload: Payload): Promise<string> {
  const encoded = JSON.stringify(payload);
  await store.set(key, encoded);
  return encoded;
}

/**
 * Seed command
 */
export const seedCommand = new Command('seed')
  .description('Write a JSON object under a key (mock metrics by default)')
  .option('--key <key>', 'Key to write (env REDIS_INPUT_KEY)', process.env[ENV_VARS.REDIS_INPUT_KEY] ?? DEFAULTS.inputKey)
  .option('--file <path>', 'JSON file holding the object to write')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Seed the default input key with mock metrics')}
  $ kvfn seed

  ${chalk.dim('# Seed a specific key from a file')}
  $ kvfn seed --key metrics --file ./sample.json
`)
  .action(async (options: SeedOptions) => {
    const spinner: Ora | null = globalConfig.quiet ? null : ora('Connecting...').start();
    const logger = createLogger({ level: globalConfig.verbose ? 'debug' : 'silent' });
    const store = createRedisStore({ host: globalConfig.host, port: globalConfig.port, db: globalConfig.db }, logger);

    try {
      const payload = await loadSeedPayload(options.file);
      await store.connect();
      if (spinner) spinner.text = `Writing ${options.key}...`;
      await seedKey(store, options.key, payload);
      if (spinner) spinner.succeed(`Seeded key '${options.key}' on ${globalConfig.host}:${globalConfig.port}/${globalConfig.db}`);

      if (!globalConfig.quiet) {
        console.log(chalk.dim('Payload:'));
        console.log(formatJson(payload));
      }
    } catch (error) {
      if (spinner) spinner.fail('Seeding failed');
      throw error;
    } finally {
      await store.close();
    }
  });

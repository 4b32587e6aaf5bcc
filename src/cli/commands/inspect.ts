/**
 * Inspect Command
 *
 * Reads the runtime's output key and prints it, either as-is or as a
 * summary of the VM metrics it holds. A missing key or a value that is not
 * a JSON object is reported as "no data" rather than an error. With
 * --watch the key is re-read at its own interval until interrupted.
 *
 * @module kv-function-runtime/cli/commands/inspect
 */

import { setTimeout as delay } from 'node:timers/promises';
import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { ENV_VARS } from '../../runtime/config.js';
import { createLogger } from '../../runtime/logger.js';
import { decodePayload } from '../../runtime/poll-loop.js';
import { createRedisStore } from '../../runtime/store.js';
import type { KeyValueStore, Payload } from '../../runtime/types.js';
import { globalConfig } from '../config.js';
import {
  createTable,
  formatDateTime,
  formatJson,
  formatKeyValueTable,
  formatMetric,
  isOutputFormat,
  type OutputFormat,
} from '../formatters.js';
import { summarizeMetrics, type MetricsSummary } from '../metrics.js';

/** Refresh interval of --watch when neither the flag nor REFRESH_MS sets one */
export const DEFAULT_REFRESH_MS = 5000;

/**
 * What was found under the inspected key
 */
export type Snapshot =
  | { readonly status: 'ok'; readonly key: string; readonly data: Payload; readonly readAt: Date }
  | { readonly status: 'no_data'; readonly key: string; readonly reason: 'missing' | 'unparseable'; readonly readAt: Date }
  | { readonly status: 'unavailable'; readonly key: string; readonly error: string; readonly readAt: Date };

/**
 * Result of a PING against the store
 */
export interface ConnectionStatus {
  ok: boolean;
  message: string;
}

/**
 * Options accepted by `inspect`
 */
export interface InspectOptions {
  key?: string;
  format: string;
  metrics?: boolean;
  watch?: string | boolean;
}

export interface WatchOptions {
  intervalMs: number;
  render: (snapshot: Snapshot, connection: ConnectionStatus) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  /** Stop after this many reads; unbounded by default */
  maxReads?: number;
  signal?: AbortSignal;
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
}

/**
 * Reads and decodes a key. Store errors propagate; decode errors do not.
 */
export async function readSnapshot(
  store: KeyValueStore,
  key: string,
  now: () => Date = () => new Date()
): Promise<Snapshot> {
  const raw = await store.get(key);
  const readAt = now();
  if (raw === null) {
    return { status: 'no_data', key, reason: 'missing', readAt };
  }
  try {
    return { status: 'ok', key, data: decodePayload(raw), readAt };
  } catch {
    return { status: 'no_data', key, reason: 'unparseable', readAt };
  }
}

/**
 * Like readSnapshot, but a store failure becomes an `unavailable` snapshot
 */
export async function pollSnapshot(
  store: KeyValueStore,
  key: string,
  now: () => Date = () => new Date()
): Promise<Snapshot> {
  try {
    return await readSnapshot(store, key, now);
  } catch (error) {
    return { status: 'unavailable', key, error: describeFailure(error), readAt: now() };
  }
}

export async function checkConnection(store: KeyValueStore): Promise<ConnectionStatus> {
  try {
    await store.ping();
    return { ok: true, message: 'PING ok' };
  } catch (error) {
    return { ok: false, message: describeFailure(error) };
  }
}

/**
 * Checks the connection and reads the key, over and over, rendering each
 * read. Returns the number of reads made.
 */
export async function watchSnapshots(store: KeyValueStore, key: string, options: WatchOptions): Promise<number> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const maxReads = options.maxReads ?? Number.POSITIVE_INFINITY;

  let reads = 0;
  while (reads < maxReads && !options.signal?.aborted) {
    const connection = await checkConnection(store);
    const snapshot = await pollSnapshot(store, key, options.now);
    options.render(snapshot, connection);
    reads++;
    if (reads < maxReads) {
      await sleep(options.intervalMs);
    }
  }
  return reads;
}

/**
 * Interval for --watch: the flag's value, else REFRESH_MS, else the default
 */
export function resolveRefreshInterval(watch: string | boolean, env: NodeJS.ProcessEnv = process.env): number {
  const value = typeof watch === 'string' ? watch : env['REFRESH_MS'];
  if (value === undefined) {
    return DEFAULT_REFRESH_MS;
  }
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed < 1) {
    throw new Error(`Invalid refresh interval: ${value}`);
  }
  return parsed;
}

function formatMetricsSummary(summary: MetricsSummary): string {
  const table = createTable(['Metric', 'Value']);
  table.push(['Network Egress (%)', formatMetric(summary.networkEgress)]);
  table.push(['Memory Cache (%)', formatMetric(summary.memoryCache)]);
  table.push(['CPU Avg 60s (all)', formatMetric(summary.cpuAverage)]);
  for (const cpu of summary.cpus) {
    table.push([`${cpu.label} (%)`, formatMetric(cpu.value)]);
  }
  return table.toString();
}

function printSnapshot(snapshot: Snapshot, metrics: boolean, connection?: ConnectionStatus): void {
  console.log(chalk.bold.underline(`Output key: ${snapshot.key}`));
  console.log(chalk.dim(`Read at ${formatDateTime(snapshot.readAt)}`));
  if (connection) {
    const status = connection.ok ? chalk.green('OK') : chalk.red(connection.message);
    console.log(`${chalk.dim('Connection:')} ${status}`);
  }
  console.log();

  switch (snapshot.status) {
    case 'unavailable':
      console.log(`${chalk.yellow('No data')} ${chalk.dim(`(store unavailable: ${snapshot.error})`)}`);
      return;
    case 'no_data': {
      const why = snapshot.reason === 'missing' ? 'key is not set' : 'value is not a JSON object';
      console.log(`${chalk.yellow('No data')} ${chalk.dim(`(${why})`)}`);
      return;
    }
    case 'ok':
      console.log(metrics ? formatMetricsSummary(summarizeMetrics(snapshot.data)) : formatKeyValueTable(snapshot.data));
  }
}

function snapshotJson(snapshot: Snapshot, metrics: boolean): unknown {
  if (snapshot.status !== 'ok') {
    return null;
  }
  return metrics ? summarizeMetrics(snapshot.data) : snapshot.data;
}

function renderer(format: OutputFormat, metrics: boolean): WatchOptions['render'] {
  if (format === 'json') {
    return (snapshot) => console.log(formatJson(snapshotJson(snapshot, metrics), true));
  }
  return (snapshot, connection) => {
    printSnapshot(snapshot, metrics, connection);
    console.log();
  };
}

/**
 * Inspect command
 */
export const inspectCommand = new Command('inspect')
  .description('Show the latest handler output stored under the output key')
  .option('--key <key>', 'Key to read (env REDIS_OUTPUT_KEY)')
  .option('-f, --format <format>', 'Output format (json, table)', 'table')
  .option('--metrics', 'Summarize network egress, memory cache and per-CPU load')
  .option('-w, --watch [ms]', 'Re-read the key every ms milliseconds (env REFRESH_MS, default 5000)')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.dim('# Show the output key as a table')}
  $ kvfn inspect --key metrics-out

  ${chalk.dim('# Raw JSON, for piping')}
  $ kvfn inspect --key metrics-out --format json

  ${chalk.dim('# Follow the VM metrics every two seconds')}
  $ kvfn inspect --key metrics-out --metrics --watch 2000
`)
  .action(async (options: InspectOptions) => {
    const key = options.key ?? process.env[ENV_VARS.REDIS_OUTPUT_KEY];
    if (key === undefined) {
      throw new Error('No key given: pass --key or set REDIS_OUTPUT_KEY');
    }
    const format = options.format;
    if (!isOutputFormat(format)) {
      throw new Error(`Unknown format: ${format}`);
    }
    const metrics = options.metrics ?? false;

    const logger = createLogger({ level: globalConfig.verbose ? 'debug' : 'silent' });
    const store = createRedisStore({ host: globalConfig.host, port: globalConfig.port, db: globalConfig.db }, logger);

    if (options.watch !== undefined && options.watch !== false) {
      const intervalMs = resolveRefreshInterval(options.watch);
      const controller = new AbortController();
      const stop = (): void => controller.abort();
      process.once('SIGINT', stop);

      const sleep = (ms: number): Promise<void> =>
        delay(ms, undefined, { signal: controller.signal }).catch((error: unknown) => {
          if (!controller.signal.aborted) {
            throw error;
          }
        });

      try {
        await watchSnapshots(store, key, { intervalMs, render: renderer(format, metrics), sleep, signal: controller.signal });
      } finally {
        process.off('SIGINT', stop);
        await store.close();
      }
      return;
    }

    const spinner: Ora | null = globalConfig.quiet ? null : ora('Reading...').start();
    try {
      await store.connect();
      const snapshot = await readSnapshot(store, key);
      if (spinner) spinner.stop();

      if (format === 'json') {
        console.log(formatJson(snapshotJson(snapshot, metrics)));
      } else {
        printSnapshot(snapshot, metrics);
      }
    } catch (error) {
      if (spinner) spinner.fail('Inspection failed');
      throw error;
    } finally {
      await store.close();
    }
  });

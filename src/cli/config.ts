/**
 * CLI global options
 *
 * Filled in by the program's preAction hook before any command runs.
 *
 * @module kv-function-runtime/cli/config
 */

import { DEFAULTS, ENV_VARS } from '../runtime/config.js';

/**
 * CLI Configuration interface
 */
export interface CliConfig {
  host: string;
  port: number;
  db: number;
  verbose: boolean;
  quiet: boolean;
}

/**
 * Global options as commander hands them over
 */
export type GlobalOptions = {
  host?: string;
  port?: string;
  db?: string;
  verbose?: boolean;
  quiet?: boolean;
};

function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || parsed < 1 || parsed > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return parsed;
}

function parseDb(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Invalid database index: ${value}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Global CLI configuration
 */
export let globalConfig: CliConfig = {
  host: DEFAULTS.redisHost,
  port: DEFAULTS.redisPort,
  db: DEFAULTS.redisDb,
  verbose: false,
  quiet: false,
};

/**
 * Resolves global options against the environment; flags win over variables
 */
export function resolveCliConfig(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    host: options.host ?? env[ENV_VARS.REDIS_HOST] ?? DEFAULTS.redisHost,
    port: parsePort(options.port ?? env[ENV_VARS.REDIS_PORT], DEFAULTS.redisPort),
    db: parseDb(options.db ?? env[ENV_VARS.REDIS_DB], DEFAULTS.redisDb),
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
  };
}

export function setGlobalConfig(config: CliConfig): void {
  globalConfig = config;
}

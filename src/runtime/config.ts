/**
 * @fileoverview Runtime configuration management
 * @module runtime/config
 *
 * Parses and validates environment variables into a typed RuntimeConfig.
 * Any violation is a StartupError: the runtime never starts polling with a
 * configuration it could not fully resolve.
 */

import { z } from 'zod';
import { ErrorCodes, StartupError } from './errors.js';
import type { BackoffStrategy, ChangePolicy, LogLevel } from './types.js';

// =============================================================================
// Environment Variable Names
// =============================================================================

/**
 * Environment variable names used by the runtime
 */
export const ENV_VARS = {
  /** Store host */
  REDIS_HOST: 'REDIS_HOST',
  /** Store port */
  REDIS_PORT: 'REDIS_PORT',
  /** Logical database index */
  REDIS_DB: 'REDIS_DB',
  /** Key polled for input */
  REDIS_INPUT_KEY: 'REDIS_INPUT_KEY',
  /** Key the handler result is written to (required) */
  REDIS_OUTPUT_KEY: 'REDIS_OUTPUT_KEY',
  /** Handler module location */
  HANDLER_PATH: 'HANDLER_PATH',
  /** Pause between poll cycles */
  POLL_INTERVAL_MS: 'POLL_INTERVAL_MS',
  /** Change marker policy */
  CHANGE_POLICY: 'CHANGE_POLICY',
  /** Consecutive failed reads before giving up (unset: never) */
  STORE_RETRY_MAX_ATTEMPTS: 'STORE_RETRY_MAX_ATTEMPTS',
  /** Delay curve for failed reads */
  STORE_RETRY_BACKOFF: 'STORE_RETRY_BACKOFF',
  /** Upper bound for exponential delays */
  STORE_RETRY_MAX_DELAY_MS: 'STORE_RETRY_MAX_DELAY_MS',
  /** Log level */
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

// =============================================================================
// Default Values
// =============================================================================

/**
 * Default configuration values
 */
export const DEFAULTS = {
  redisHost: 'localhost',
  redisPort: 6379,
  redisDb: 0,
  inputKey: 'metrics',
  handlerPath: '/opt/usermodule.js',
  pollIntervalMs: 5000,
  changePolicy: 'advance-on-read' as ChangePolicy,
  retryBackoff: 'fixed' as BackoffStrategy,
  retryMaxDelayMs: 60000,
  logLevel: 'info' as LogLevel,
} as const;

// =============================================================================
// Configuration Types
// =============================================================================

export interface StoreConfig {
  readonly host: string;
  readonly port: number;
  readonly db: number;
  readonly inputKey: string;
  readonly outputKey: string;
}

export interface RetryConfig {
  /** `Infinity` when unbounded */
  readonly maxAttempts: number;
  readonly backoff: BackoffStrategy;
  readonly maxDelayMs: number;
}

export interface RuntimeConfig {
  readonly store: StoreConfig;
  readonly handlerPath: string;
  readonly pollIntervalMs: number;
  readonly changePolicy: ChangePolicy;
  readonly retry: RetryConfig;
  readonly logLevel: LogLevel;
}

// =============================================================================
// Schema
// =============================================================================

/**
 * Integer given as a decimal string, bounded to [min, max]
 */
function integerString(name: string, min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, `${name} must be an integer`)
    .transform((value) => Number.parseInt(value, 10))
    .pipe(
      z
        .number()
        .int()
        .min(min, `${name} must be at least ${min}`)
        .max(max, `${name} must be at most ${max}`)
    );
}

const envSchema = z.object({
  [ENV_VARS.REDIS_HOST]: z.string().default(DEFAULTS.redisHost),
  [ENV_VARS.REDIS_PORT]: integerString('REDIS_PORT', 1, 65535).default(String(DEFAULTS.redisPort)),
  [ENV_VARS.REDIS_DB]: integerString('REDIS_DB', 0).default(String(DEFAULTS.redisDb)),
  [ENV_VARS.REDIS_INPUT_KEY]: z.string().default(DEFAULTS.inputKey),
  // Only an unset output key is fatal; an empty one is a valid key name
  [ENV_VARS.REDIS_OUTPUT_KEY]: z.string({ required_error: 'REDIS_OUTPUT_KEY is required but not set' }),
  [ENV_VARS.HANDLER_PATH]: z.string().min(1, 'HANDLER_PATH must not be empty').default(DEFAULTS.handlerPath),
  [ENV_VARS.POLL_INTERVAL_MS]: integerString('POLL_INTERVAL_MS', 1).default(String(DEFAULTS.pollIntervalMs)),
  [ENV_VARS.CHANGE_POLICY]: z.enum(['advance-on-read', 'retry-on-failure']).default(DEFAULTS.changePolicy),
  [ENV_VARS.STORE_RETRY_MAX_ATTEMPTS]: integerString('STORE_RETRY_MAX_ATTEMPTS', 0).optional(),
  [ENV_VARS.STORE_RETRY_BACKOFF]: z.enum(['fixed', 'exponential']).default(DEFAULTS.retryBackoff),
  [ENV_VARS.STORE_RETRY_MAX_DELAY_MS]: integerString('STORE_RETRY_MAX_DELAY_MS', 1).default(
    String(DEFAULTS.retryMaxDelayMs)
  ),
  [ENV_VARS.LOG_LEVEL]: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default(DEFAULTS.logLevel),
});

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Resolves the runtime configuration from environment variables
 *
 * @param env - Variable source, `process.env` by default
 * @throws StartupError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = envSchema.safeParse({
    [ENV_VARS.REDIS_HOST]: env[ENV_VARS.REDIS_HOST],
    [ENV_VARS.REDIS_PORT]: env[ENV_VARS.REDIS_PORT],
    [ENV_VARS.REDIS_DB]: env[ENV_VARS.REDIS_DB],
    [ENV_VARS.REDIS_INPUT_KEY]: env[ENV_VARS.REDIS_INPUT_KEY],
    [ENV_VARS.REDIS_OUTPUT_KEY]: env[ENV_VARS.REDIS_OUTPUT_KEY],
    [ENV_VARS.HANDLER_PATH]: env[ENV_VARS.HANDLER_PATH],
    [ENV_VARS.POLL_INTERVAL_MS]: env[ENV_VARS.POLL_INTERVAL_MS],
    [ENV_VARS.CHANGE_POLICY]: env[ENV_VARS.CHANGE_POLICY],
    [ENV_VARS.STORE_RETRY_MAX_ATTEMPTS]: env[ENV_VARS.STORE_RETRY_MAX_ATTEMPTS],
    [ENV_VARS.STORE_RETRY_BACKOFF]: env[ENV_VARS.STORE_RETRY_BACKOFF],
    [ENV_VARS.STORE_RETRY_MAX_DELAY_MS]: env[ENV_VARS.STORE_RETRY_MAX_DELAY_MS],
    [ENV_VARS.LOG_LEVEL]: env[ENV_VARS.LOG_LEVEL],
  });

  if (!result.success) {
    const details = result.error.issues.map((issue) => {
      const variable = issue.path.join('.');
      return issue.message.startsWith(variable) ? issue.message : `${variable}: ${issue.message}`;
    });
    throw new StartupError(ErrorCodes.CONFIG_INVALID, 'Invalid configuration', details);
  }

  const vars = result.data;
  return {
    store: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
      db: vars.REDIS_DB,
      inputKey: vars.REDIS_INPUT_KEY,
      outputKey: vars.REDIS_OUTPUT_KEY,
    },
    handlerPath: vars.HANDLER_PATH,
    pollIntervalMs: vars.POLL_INTERVAL_MS,
    changePolicy: vars.CHANGE_POLICY,
    retry: {
      maxAttempts: vars.STORE_RETRY_MAX_ATTEMPTS ?? Number.POSITIVE_INFINITY,
      backoff: vars.STORE_RETRY_BACKOFF,
      maxDelayMs: vars.STORE_RETRY_MAX_DELAY_MS,
    },
    logLevel: vars.LOG_LEVEL,
  };
}

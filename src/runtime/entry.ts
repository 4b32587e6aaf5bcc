/**
 * @fileoverview Main entry point for the function runtime
 * @module runtime/entry
 *
 * Resolves configuration, loads the handler, builds the runtime context,
 * opens the store connection and hands everything to the poll loop.
 * Startup failures end the process with exit code 1.
 */

import { loadConfig, type RuntimeConfig } from './config.js';
import { RuntimeContext } from './context.js';
import { RuntimeError, StartupError, serializeError } from './errors.js';
import { loadHandler } from './handler-loader.js';
import { createLogger, type Logger } from './logger.js';
import { PollLoop } from './poll-loop.js';
import { RetryPolicy } from './retry-policy.js';
import { createRedisStore } from './store.js';
import type { KeyValueStore, LoadedHandler } from './types.js';

// =============================================================================
// Runtime Assembly
// =============================================================================

/**
 * Collaborators that can be swapped out, mainly for tests
 */
export interface RuntimeDependencies {
  logger?: Logger;
  store?: KeyValueStore;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * A fully wired runtime, not yet connected or polling
 */
export interface Runtime {
  readonly config: RuntimeConfig;
  readonly handler: LoadedHandler;
  readonly context: RuntimeContext;
  readonly store: KeyValueStore;
  readonly loop: PollLoop;
  readonly logger: Logger;
}

/**
 * Loads the handler and wires context, store and loop from a resolved config
 *
 * @throws StartupError when the handler cannot be loaded
 */
export async function createRuntime(
  config: RuntimeConfig,
  deps: RuntimeDependencies = {}
): Promise<Runtime> {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });

  const handler = await loadHandler(config.handlerPath, logger);

  const context = new RuntimeContext({
    storeHost: config.store.host,
    storePort: config.store.port,
    inputKey: config.store.inputKey,
    outputKey: config.store.outputKey,
    handlerSourceModifiedAt: handler.modifiedAt,
  });

  const store =
    deps.store ??
    createRedisStore({ host: config.store.host, port: config.store.port, db: config.store.db }, logger);

  const retryPolicy = new RetryPolicy({
    baseDelayMs: config.pollIntervalMs,
    maxAttempts: config.retry.maxAttempts,
    backoff: config.retry.backoff,
    maxDelayMs: config.retry.maxDelayMs,
  });

  const loop = new PollLoop({
    store,
    handler: handler.handler,
    context,
    logger,
    pollIntervalMs: config.pollIntervalMs,
    changePolicy: config.changePolicy,
    retryPolicy,
    sleep: deps.sleep,
    now: deps.now,
  });

  return { config, handler, context, store, loop, logger };
}

/**
 * Connects to the store and polls until the process is terminated
 *
 * A failed initial connection is not fatal: the loop's reads surface it as a
 * transient store error and retry on the configured schedule.
 */
export async function startRuntime(config: RuntimeConfig, deps: RuntimeDependencies = {}): Promise<void> {
  const runtime = await createRuntime(config, deps);
  const { logger, store, loop } = runtime;

  try {
    await store.connect();
  } catch (error) {
    logger.error({ error: serializeError(error) }, 'initial store connection failed; polling will retry');
  }

  logger.info(
    {
      host: config.store.host,
      port: config.store.port,
      db: config.store.db,
      inputKey: config.store.inputKey,
      outputKey: config.store.outputKey,
      handlerPath: runtime.handler.path,
      pollIntervalMs: config.pollIntervalMs,
      changePolicy: config.changePolicy,
      retry: {
        maxAttempts: Number.isFinite(config.retry.maxAttempts) ? config.retry.maxAttempts : 'unbounded',
        backoff: config.retry.backoff,
      },
    },
    'runtime started'
  );

  try {
    await loop.run();
  } finally {
    await store.close();
  }
}

// =============================================================================
// Process Entry
// =============================================================================

/**
 * Process-level entry: resolves config from the environment and runs.
 * Exits with code 1 on any unrecoverable error.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<void> {
  const bootLogger = createLogger({ level: 'info' });
  let config: RuntimeConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    exitWithError(bootLogger, error);
  }

  try {
    await startRuntime(config, { logger: createLogger({ level: config.logLevel }) });
  } catch (error) {
    exitWithError(bootLogger, error);
  }
}

function exitWithError(logger: Logger, error: unknown): never {
  const details = error instanceof StartupError ? error.details : [];
  const code = error instanceof RuntimeError ? error.code : 'UNEXPECTED';
  logger.fatal({ code, details, error: serializeError(error) }, 'runtime stopped');
  process.exit(1);
}

/**
 * @fileoverview Function runtime for Redis-fed handlers
 * @module runtime
 *
 * Polls an input key in a Redis-compatible store, runs a user-supplied
 * handler whenever the raw value changes, and publishes the handler's
 * JSON result under an output key.
 *
 * @example
 * ```typescript
 * // /opt/usermodule.js
 * export function handler(payload, context) {
 *   return {
 *     received: Object.keys(payload).length,
 *     previousRun: context.lastExecutionAt?.toISOString() ?? null,
 *   };
 * }
 * ```
 *
 * ```typescript
 * import { loadConfig, startRuntime } from 'kv-function-runtime';
 *
 * await startRuntime(loadConfig());
 * ```
 */

// =============================================================================
// Type Exports
// =============================================================================

export type {
  Payload,
  HandlerFunction,
  LoadedHandler,
  KeyValueStore,
  ChangePolicy,
  BackoffStrategy,
  LogLevel,
  CycleStatus,
  CycleOutcome,
} from './types.js';

// =============================================================================
// Config Exports
// =============================================================================

export {
  ENV_VARS,
  DEFAULTS,
  loadConfig,
  type RuntimeConfig,
  type StoreConfig,
  type RetryConfig,
} from './config.js';

// =============================================================================
// Error Exports
// =============================================================================

export {
  ErrorCodes,
  RuntimeError,
  StartupError,
  StoreUnavailableError,
  TransientStoreError,
  DecodeError,
  HandlerError,
  ResultShapeError,
  PublishError,
  serializeError,
  type ErrorCode,
  type SerializedError,
} from './errors.js';

// =============================================================================
// Component Exports
// =============================================================================

export { createLogger, type Logger, type LoggerOptions } from './logger.js';
export { RuntimeContext, type RuntimeContextInit, type RuntimeContextSnapshot } from './context.js';
export { loadHandler, resolveHandlerExport } from './handler-loader.js';
export { RedisStore, createRedisStore, type RedisStoreOptions } from './store.js';
export { RetryPolicy, type RetryPolicyOptions } from './retry-policy.js';
export {
  PollLoop,
  decodePayload,
  isPlainObject,
  DEFAULT_POLL_INTERVAL_MS,
  type PollLoopOptions,
} from './poll-loop.js';

// =============================================================================
// Entry Point Exports
// =============================================================================

export {
  createRuntime,
  startRuntime,
  main,
  type Runtime,
  type RuntimeDependencies,
} from './entry.js';

/**
 * @fileoverview Type definitions for the function runtime
 * @module runtime/types
 *
 * Core types shared by the config layer, the handler loader, the store
 * adapter and the poll loop.
 */

import type { RuntimeContext } from './context.js';

// =============================================================================
// Handler Types
// =============================================================================

/**
 * Decoded input value: a JSON object
 */
export type Payload = Record<string, unknown>;

/**
 * User-supplied handler. May return the result directly or a promise of it;
 * the result is validated by the poll loop before it is published.
 */
export type HandlerFunction = (payload: Payload, context: RuntimeContext) => unknown;

/**
 * A handler module after loading and validation
 */
export interface LoadedHandler {
  /** Absolute path the module was loaded from */
  readonly path: string;
  /** Source file modification time, captured once at load */
  readonly modifiedAt: Date;
  /** The exported `handler` callable */
  readonly handler: HandlerFunction;
}

// =============================================================================
// Store Types
// =============================================================================

/**
 * Narrow key-value contract the runtime needs from its store
 */
export interface KeyValueStore {
  /** Opens the connection; called once at startup */
  connect(): Promise<void>;
  /** Reads the raw bytes of a key, `null` when the key is missing */
  get(key: string): Promise<Buffer | null>;
  /** Writes a raw value under a key */
  set(key: string, value: string): Promise<void>;
  /** Round-trips a PING to the server */
  ping(): Promise<void>;
  /** Releases the connection */
  close(): Promise<void>;
}

// =============================================================================
// Policy Types
// =============================================================================

/**
 * When the change marker advances to a newly read raw value.
 *
 * - `advance-on-read`: as soon as it is read, before decode/execute/publish
 * - `retry-on-failure`: only once the cycle publishes (or finds the key empty)
 */
export type ChangePolicy = 'advance-on-read' | 'retry-on-failure';

/**
 * Delay curve between consecutive failed store reads
 */
export type BackoffStrategy = 'fixed' | 'exponential';

/**
 * Pino log levels accepted by LOG_LEVEL
 */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

// =============================================================================
// Cycle Types
// =============================================================================

/**
 * How a single poll cycle concluded
 */
export type CycleStatus =
  | 'read_failed'
  | 'unchanged'
  | 'empty'
  | 'decode_failed'
  | 'handler_failed'
  | 'invalid_result'
  | 'publish_failed'
  | 'published';

/**
 * Result of one poll cycle
 */
export interface CycleOutcome {
  readonly status: CycleStatus;
  /** Milliseconds the loop should sleep before the next cycle */
  readonly delayMs: number;
  /** Cycle wall time in milliseconds */
  readonly durationMs: number;
}

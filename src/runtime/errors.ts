/**
 * @fileoverview Error taxonomy for the function runtime
 * @module runtime/errors
 *
 * Startup errors are fatal and end the process with a non-zero exit code.
 * Everything raised inside a poll cycle is recoverable: it is logged and the
 * loop moves on to the next cycle.
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Stable error codes, carried on every RuntimeError and in log lines
 */
export const ErrorCodes = {
  /** Environment configuration is missing or malformed */
  CONFIG_INVALID: 'CONFIG_INVALID',
  /** Handler file does not exist */
  HANDLER_NOT_FOUND: 'HANDLER_NOT_FOUND',
  /** Handler module threw while being imported */
  HANDLER_LOAD_FAILED: 'HANDLER_LOAD_FAILED',
  /** Handler module exposes no callable `handler` */
  HANDLER_MISSING: 'HANDLER_MISSING',
  /** Store command failed at the transport level */
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  /** Bounded retry policy gave up on the store */
  STORE_RETRIES_EXHAUSTED: 'STORE_RETRIES_EXHAUSTED',
  /** Input value is not a JSON object */
  DECODE_FAILED: 'DECODE_FAILED',
  /** User handler threw or rejected */
  HANDLER_FAILED: 'HANDLER_FAILED',
  /** User handler returned something other than an object */
  RESULT_SHAPE_INVALID: 'RESULT_SHAPE_INVALID',
  /** Result could not be encoded or written */
  PUBLISH_FAILED: 'PUBLISH_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error the runtime raises
 */
export class RuntimeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly recoverable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RuntimeError';
  }
}

// =============================================================================
// Fatal Errors
// =============================================================================

/**
 * Unrecoverable configuration or handler loading failure
 */
export class StartupError extends RuntimeError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly details: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(code, message, false, options);
    this.name = 'StartupError';
  }
}

/**
 * Raised by the poll loop when a bounded retry policy runs out of attempts
 */
export class StoreUnavailableError extends RuntimeError {
  constructor(public readonly attempts: number, options?: { cause?: unknown }) {
    super(
      ErrorCodes.STORE_RETRIES_EXHAUSTED,
      `Store still unreachable after ${attempts} consecutive failed reads`,
      false,
      options
    );
    this.name = 'StoreUnavailableError';
  }
}

// =============================================================================
// Cycle Errors
// =============================================================================

export class TransientStoreError extends RuntimeError {
  constructor(
    public readonly operation: 'connect' | 'get' | 'set' | 'ping',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(ErrorCodes.STORE_UNAVAILABLE, message, true, options);
    this.name = 'TransientStoreError';
  }
}

export class DecodeError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.DECODE_FAILED, message, true, options);
    this.name = 'DecodeError';
  }
}

export class HandlerError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.HANDLER_FAILED, message, true, options);
    this.name = 'HandlerError';
  }
}

export class ResultShapeError extends RuntimeError {
  constructor(public readonly receivedType: string) {
    super(
      ErrorCodes.RESULT_SHAPE_INVALID,
      `Handler must return an object, got ${receivedType}`,
      true
    );
    this.name = 'ResultShapeError';
  }
}

export class PublishError extends RuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCodes.PUBLISH_FAILED, message, true, options);
    this.name = 'PublishError';
  }
}

// =============================================================================
// Serialization
// =============================================================================

export interface SerializedError {
  name?: string;
  message: string;
  code?: string;
  stack?: string;
  cause?: SerializedError;
}

/** Deepest `cause` chain followed before it is cut off */
const MAX_CAUSE_DEPTH = 8;

/**
 * Flattens any thrown value into a log-friendly object, following `cause`.
 * A chain that loops back on itself stops at the repeated error.
 */
export function serializeError(error: unknown): SerializedError {
  return serializeWithin(error, new Set<Error>(), 0);
}

function serializeWithin(error: unknown, seen: Set<Error>, depth: number): SerializedError {
  if (error instanceof Error) {
    if (seen.has(error)) {
      return { name: error.name, message: '[circular cause]' };
    }
    seen.add(error);
    const serialized: SerializedError = { name: error.name, message: error.message };
    if (error instanceof RuntimeError) {
      serialized.code = error.code;
    }
    if (error.stack) {
      serialized.stack = error.stack;
    }
    if (error.cause !== undefined && depth < MAX_CAUSE_DEPTH) {
      serialized.cause = serializeWithin(error.cause, seen, depth + 1);
    }
    return serialized;
  }

  if (error && typeof error === 'object') {
    try {
      return { message: JSON.stringify(error) };
    } catch {
      return { message: '[object]' };
    }
  }

  return { message: String(error) };
}

/**
 * Short human-readable description of a value's type, used in warnings
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const name = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === 'string' && name !== 'Object' ? name : 'object';
  }
  return typeof value;
}

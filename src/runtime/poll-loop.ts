/**
 * @fileoverview The poll / detect / decode / execute / publish loop
 * @module runtime/poll-loop
 *
 * One cycle reads the input key, skips when the raw value has not changed,
 * decodes it as a JSON object, hands it to the user handler together with
 * the runtime context, and writes the JSON-encoded result to the output key.
 * Every failure inside a cycle is logged and ends that cycle only; the loop
 * itself never stops on its own unless a bounded retry policy gives up on
 * the store.
 *
 * Cycles never overlap: the next read starts only after the previous cycle
 * and its sleep have completed.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { RuntimeContext } from './context.js';
import {
  DecodeError,
  HandlerError,
  PublishError,
  ResultShapeError,
  StoreUnavailableError,
  describeType,
  serializeError,
} from './errors.js';
import type { Logger } from './logger.js';
import { RetryPolicy } from './retry-policy.js';
import type {
  ChangePolicy,
  CycleOutcome,
  CycleStatus,
  HandlerFunction,
  KeyValueStore,
  Payload,
} from './types.js';

/** Fixed pause between cycles */
export const DEFAULT_POLL_INTERVAL_MS = 5000;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * A plain object as `JSON.parse` builds it; arrays, null, scalars and class
 * instances such as `Map` or `Date` are rejected. The value itself is passed
 * on, so own keys like `__proto__` survive.
 */
export function isPlainObject(value: unknown): value is Payload {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

// =============================================================================
// Options
// =============================================================================

export interface PollLoopOptions {
  readonly store: KeyValueStore;
  readonly handler: HandlerFunction;
  readonly context: RuntimeContext;
  readonly logger: Logger;
  readonly pollIntervalMs?: number;
  readonly changePolicy?: ChangePolicy;
  /** Pacing after failed reads; unbounded fixed interval by default */
  readonly retryPolicy?: RetryPolicy;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => Date;
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Parses a raw input value into a JSON object. Bytes must be valid UTF-8.
 *
 * @throws DecodeError when the value is not UTF-8, not valid JSON or not an object
 */
export function decodePayload(raw: string | Uint8Array): Payload {
  let text: string;
  if (typeof raw === 'string') {
    text = raw;
  } else {
    try {
      text = utf8.decode(raw);
    } catch (error) {
      throw new DecodeError('Input value is not valid UTF-8', { cause: error });
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecodeError('Input value is not valid JSON', { cause: error });
  }
  if (!isPlainObject(parsed)) {
    throw new DecodeError(`Input value must be a JSON object, got ${describeType(parsed)}`);
  }
  return parsed;
}

function sameBytes(a: Buffer | null, b: Buffer | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.equals(b);
}

// =============================================================================
// Poll Loop
// =============================================================================

export class PollLoop {
  private readonly store: KeyValueStore;
  private readonly handler: HandlerFunction;
  private readonly context: RuntimeContext;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly changePolicy: ChangePolicy;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  /** Last raw input bytes observed; starts as "key missing" */
  private lastObserved: Buffer | null = null;
  private consecutiveReadFailures = 0;

  constructor(options: PollLoopOptions) {
    this.store = options.store;
    this.handler = options.handler;
    this.context = options.context;
    this.logger = options.logger;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.changePolicy = options.changePolicy ?? 'advance-on-read';
    this.retryPolicy = options.retryPolicy ?? RetryPolicy.fixed(this.pollIntervalMs);
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
    this.now = options.now ?? (() => new Date());
  }

  /** The change marker, `null` while the key has only been seen missing */
  get observedValue(): Buffer | null {
    return this.lastObserved;
  }

  /**
   * Runs cycles back to back, sleeping after each one
   *
   * @param maxCycles - Stop after this many cycles; unbounded by default
   * @throws StoreUnavailableError when a bounded retry policy gives up
   */
  async run(maxCycles: number = Number.POSITIVE_INFINITY): Promise<void> {
    for (let cycle = 0; cycle < maxCycles; cycle++) {
      const outcome = await this.runCycle();
      await this.sleep(outcome.delayMs);
    }
  }

  /**
   * Performs one read / detect / decode / execute / publish pass
   *
   * @throws StoreUnavailableError when a bounded retry policy gives up
   */
  async runCycle(): Promise<CycleOutcome> {
    const startedAt = this.now().getTime();
    const { inputKey, outputKey } = this.context;

    let raw: Buffer | null;
    try {
      raw = await this.store.get(inputKey);
    } catch (error) {
      this.consecutiveReadFailures++;
      const attempt = this.consecutiveReadFailures;
      if (this.retryPolicy.isExhausted(attempt)) {
        this.logger.fatal(
          { error: serializeError(error), attempt, key: inputKey },
          'giving up on the store after repeated read failures'
        );
        throw new StoreUnavailableError(attempt, { cause: error });
      }
      const retryDelayMs = this.retryPolicy.delayFor(attempt);
      this.logger.error(
        { error: serializeError(error), attempt, key: inputKey, retryDelayMs },
        'failed to read input; retrying after delay'
      );
      return this.finish('read_failed', startedAt, retryDelayMs);
    }
    this.consecutiveReadFailures = 0;

    if (sameBytes(raw, this.lastObserved)) {
      return this.finish('unchanged', startedAt);
    }

    if (raw === null) {
      this.lastObserved = null;
      this.logger.debug({ key: inputKey }, 'input key is empty');
      return this.finish('empty', startedAt);
    }

    if (this.changePolicy === 'advance-on-read') {
      this.lastObserved = raw;
    }

    let payload: Payload;
    try {
      payload = decodePayload(raw);
    } catch (error) {
      this.logger.warn({ error: serializeError(error), key: inputKey }, 'failed to decode input');
      return this.finish('decode_failed', startedAt);
    }

    let result: unknown;
    try {
      result = await this.handler(payload, this.context);
    } catch (error) {
      const failure = new HandlerError('Exception inside user handler', { cause: error });
      this.logger.error({ error: serializeError(failure) }, 'exception inside user handler');
      return this.finish('handler_failed', startedAt);
    }

    if (!isPlainObject(result)) {
      const failure = new ResultShapeError(describeType(result));
      this.logger.warn({ error: serializeError(failure) }, 'handler return is not an object; skipping write');
      return this.finish('invalid_result', startedAt);
    }

    try {
      await this.publish(outputKey, result);
    } catch (error) {
      this.logger.error({ error: serializeError(error), key: outputKey }, 'failed to write handler output');
      return this.finish('publish_failed', startedAt);
    }

    const executedAt = this.now();
    this.context.recordExecution(executedAt);
    if (this.changePolicy === 'retry-on-failure') {
      this.lastObserved = raw;
    }

    this.logger.info(
      { key: outputKey, lastExecutionAt: executedAt.toISOString() },
      `processed input and wrote output to key '${outputKey}'`
    );
    return this.finish('published', startedAt);
  }

  private async publish(key: string, result: Payload): Promise<void> {
    let encoded: string;
    try {
      encoded = JSON.stringify(result);
    } catch (error) {
      throw new PublishError('Handler result is not JSON-serializable', { cause: error });
    }
    try {
      await this.store.set(key, encoded);
    } catch (error) {
      throw new PublishError(`Failed to write output to key '${key}'`, { cause: error });
    }
  }

  private finish(
    status: CycleStatus,
    startedAt: number,
    delayMs: number = this.pollIntervalMs
  ): CycleOutcome {
    const durationMs = this.now().getTime() - startedAt;
    this.logger.trace({ status, durationMs }, 'cycle finished');
    return { status, delayMs, durationMs };
  }
}

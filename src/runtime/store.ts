/**
 * @fileoverview Redis-backed key-value store adapter
 * @module runtime/store
 *
 * Wraps an ioredis client behind the KeyValueStore contract. The offline
 * queue is disabled so that a command issued while the transport is down
 * fails right away with a TransientStoreError instead of waiting for the
 * reconnect; the client keeps reconnecting on its own in the background.
 * Values are read as raw bytes so that change detection compares them
 * exactly.
 */

import { Redis } from 'ioredis';
import { TransientStoreError, serializeError } from './errors.js';
import type { Logger } from './logger.js';
import type { KeyValueStore } from './types.js';

export interface RedisStoreOptions {
  readonly host: string;
  readonly port: number;
  readonly db?: number;
}

export class RedisStore implements KeyValueStore {
  private readonly redis: Redis;

  constructor(
    private readonly options: RedisStoreOptions,
    private readonly logger: Logger
  ) {
    this.redis = new Redis({
      host: options.host,
      port: options.port,
      db: options.db ?? 0,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
    });
    this.redis.on('error', (error: unknown) => {
      this.logger.debug({ error: serializeError(error) }, 'redis client error');
    });
    this.redis.on('ready', () => {
      this.logger.debug({ host: options.host, port: options.port }, 'redis client ready');
    });
  }

  async connect(): Promise<void> {
    try {
      await this.redis.connect();
    } catch (error) {
      throw new TransientStoreError(
        'connect',
        `Failed to connect to ${this.options.host}:${this.options.port}`,
        { cause: error }
      );
    }
  }

  async get(key: string): Promise<Buffer | null> {
    await this.ensureConnected();
    try {
      return await this.redis.getBuffer(key);
    } catch (error) {
      throw new TransientStoreError('get', `GET ${key} failed`, { cause: error });
    }
  }

  async set(key: string, value: string): Promise<void> {
    await this.ensureConnected();
    try {
      await this.redis.set(key, value);
    } catch (error) {
      throw new TransientStoreError('set', `SET ${key} failed`, { cause: error });
    }
  }

  async ping(): Promise<void> {
    await this.ensureConnected();
    try {
      await this.redis.ping();
    } catch (error) {
      throw new TransientStoreError('ping', 'PING failed', { cause: error });
    }
  }

  /**
   * Quits gracefully when the connection is up; otherwise drops it, since
   * QUIT cannot be sent while the client is still connecting or reconnecting
   */
  async close(): Promise<void> {
    if (this.redis.status !== 'ready') {
      this.redis.disconnect();
      return;
    }
    await this.redis.quit();
  }

  /**
   * Reopens a client that never connected or gave up reconnecting
   */
  private async ensureConnected(): Promise<void> {
    if (this.redis.status === 'wait' || this.redis.status === 'end') {
      await this.connect();
    }
  }
}

/**
 * Creates the store adapter the runtime and CLI commands use
 */
export function createRedisStore(options: RedisStoreOptions, logger: Logger): KeyValueStore {
  return new RedisStore(options, logger);
}

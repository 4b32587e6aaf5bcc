/**
 * Redis store adapter tests, against an in-process ioredis stand-in
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TransientStoreError } from '../src/runtime/errors.js';
import { createLogger } from '../src/runtime/logger.js';
import { RedisStore } from '../src/runtime/store.js';
import { redisState, resetRedisState } from './support/in-memory-redis.mock.js';

vi.mock('ioredis', () => import('./support/in-memory-redis.mock.js'));

const logger = createLogger({ level: 'silent' });

async function captureStoreError(action: () => Promise<unknown>): Promise<TransientStoreError> {
  try {
    await action();
  } catch (error) {
    if (error instanceof TransientStoreError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a store error');
}

describe('RedisStore', () => {
  beforeEach(() => {
    resetRedisState();
  });

  it('should configure the client to fail fast while disconnected', () => {
    new RedisStore({ host: 'redis.internal', port: 6380, db: 3 }, logger);

    expect(redisState.instances).toHaveLength(1);
    expect(redisState.instances[0]?.options).toMatchObject({
      host: 'redis.internal',
      port: 6380,
      db: 3,
      lazyConnect: true,
      enableOfflineQueue: false,
    });
  });

  it('should read raw bytes and write values', async () => {
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);
    await store.connect();

    await store.set('metrics-out', '{"y":2}');

    expect(await store.get('metrics-out')).toEqual(Buffer.from('{"y":2}'));
    expect(await store.get('absent')).toBeNull();
  });

  it('should hand back bytes that are not valid UTF-8 untouched', async () => {
    const raw = Buffer.from([0x7b, 0x22, 0x61, 0x22, 0x3a, 0x22, 0xff, 0x22, 0x7d]);
    redisState.data.set('metrics', raw);
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);

    const value = await store.get('metrics');

    expect(value?.equals(raw)).toBe(true);
  });

  it('should connect on first use', async () => {
    redisState.data.set('metrics', '{"x":1}');
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);

    expect(await store.get('metrics')).toEqual(Buffer.from('{"x":1}'));
  });

  it('should wrap a failed connection', async () => {
    redisState.unavailable = true;
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);

    const error = await captureStoreError(() => store.connect());

    expect(error.operation).toBe('connect');
    expect(error.recoverable).toBe(true);
    expect(error.message).toBe('Failed to connect to localhost:6379');
  });

  it('should wrap failed commands and recover once the server is back', async () => {
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);
    await store.connect();
    redisState.unavailable = true;

    const getError = await captureStoreError(() => store.get('metrics'));
    const setError = await captureStoreError(() => store.set('metrics-out', '{}'));
    redisState.unavailable = false;

    expect(getError.operation).toBe('get');
    expect(setError.operation).toBe('set');
    expect(await store.get('metrics')).toBeNull();
  });

  it('should reconnect after a failed initial connection', async () => {
    redisState.unavailable = true;
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);
    await captureStoreError(() => store.connect());
    redisState.unavailable = false;
    redisState.data.set('metrics', '{"x":1}');

    expect(await store.get('metrics')).toEqual(Buffer.from('{"x":1}'));
  });

  it('should quit on close', async () => {
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);
    await store.connect();

    await store.close();

    expect(redisState.instances[0]?.status).toBe('end');
  });

  it('should close a client that never connected without throwing', async () => {
    redisState.unavailable = true;
    const store = new RedisStore({ host: '127.0.0.1', port: 1 }, logger);
    await captureStoreError(() => store.connect());
    expect(redisState.instances[0]?.status).toBe('reconnecting');

    await expect(store.close()).resolves.toBeUndefined();

    expect(redisState.instances[0]?.status).toBe('end');
  });

  it('should close a client that lost its connection without throwing', async () => {
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);
    await store.connect();
    redisState.unavailable = true;
    await captureStoreError(() => store.get('metrics'));

    await expect(store.close()).resolves.toBeUndefined();

    expect(redisState.instances[0]?.status).toBe('end');
  });

  it('should ping the server and wrap a failed ping', async () => {
    const store = new RedisStore({ host: 'localhost', port: 6379 }, logger);
    await store.connect();

    await expect(store.ping()).resolves.toBeUndefined();

    redisState.unavailable = true;
    const error = await captureStoreError(() => store.ping());
    expect(error.operation).toBe('ping');
    expect(error.message).toBe('PING failed');
  });
});

/**
 * Runtime assembly and process entry tests
 */

import { stat } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { loadConfig } from '../src/runtime/config.js';
import { createRuntime, main, startRuntime } from '../src/runtime/entry.js';
import { ErrorCodes, StartupError, StoreUnavailableError } from '../src/runtime/errors.js';
import { createLogger } from '../src/runtime/logger.js';
import { redisState, resetRedisState } from './support/in-memory-redis.mock.js';
import { InMemoryStore } from './support/in-memory-store.js';

vi.mock('ioredis', () => import('./support/in-memory-redis.mock.js'));

const fixture = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/handlers/${name}`, import.meta.url));

const logger = createLogger({ level: 'silent' });

const configFor = (handler: string) =>
  loadConfig({
    REDIS_OUTPUT_KEY: 'metrics-out',
    HANDLER_PATH: fixture(handler),
    LOG_LEVEL: 'silent',
  });

describe('createRuntime', () => {
  beforeEach(() => {
    resetRedisState();
  });

  it('should build the context from config and the handler file', async () => {
    const runtime = await createRuntime(configFor('doubler.mjs'), { logger });
    const stats = await stat(fixture('doubler.mjs'));

    expect(runtime.context.storeHost).toBe('localhost');
    expect(runtime.context.storePort).toBe(6379);
    expect(runtime.context.inputKey).toBe('metrics');
    expect(runtime.context.outputKey).toBe('metrics-out');
    expect(runtime.context.handlerSourceModifiedAt.getTime()).toBe(stats.mtime.getTime());
    expect(runtime.context.lastExecutionAt).toBeUndefined();
  });

  it('should process input end to end through the store', async () => {
    const runtime = await createRuntime(configFor('doubler.mjs'), { logger });
    await runtime.store.connect();

    redisState.data.set('metrics', '{"x": 1}');
    const first = await runtime.loop.runCycle();
    const firstOutput = redisState.data.get('metrics-out');

    redisState.data.set('metrics', '{"x": 5}');
    const second = await runtime.loop.runCycle();

    expect(first.status).toBe('published');
    expect(firstOutput).toBe('{"y":2,"runs":1}');
    expect(second.status).toBe('published');
    expect(redisState.data.get('metrics-out')).toBe('{"y":10,"runs":2}');
    expect(runtime.context.lastExecutionAt).toBeInstanceOf(Date);
  });

  it('should reject a missing handler with a startup error', async () => {
    await expect(createRuntime(configFor('missing.mjs'), { logger })).rejects.toMatchObject({
      code: ErrorCodes.HANDLER_NOT_FOUND,
    });
    await expect(createRuntime(configFor('missing.mjs'), { logger })).rejects.toBeInstanceOf(StartupError);
  });
});

describe('startRuntime', () => {
  it('should connect, poll, and close the store when the loop stops', async () => {
    const store = new InMemoryStore();
    store.values.set('metrics', '{"x": 3}');
    const sleep = vi.fn(async () => {
      throw new Error('stop polling');
    });

    await expect(startRuntime(configFor('doubler.mjs'), { logger, store, sleep })).rejects.toThrow('stop polling');

    expect(store.values.get('metrics-out')).toBe('{"y":6,"runs":1}');
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(store.connected).toBe(false);
  });

  it('should surface exhausted store retries rather than a failure to close', async () => {
    resetRedisState();
    redisState.unavailable = true;
    const config = loadConfig({
      REDIS_OUTPUT_KEY: 'metrics-out',
      HANDLER_PATH: fixture('doubler.mjs'),
      STORE_RETRY_MAX_ATTEMPTS: '0',
      LOG_LEVEL: 'silent',
    });

    const run = startRuntime(config, { logger });

    await expect(run).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(run).rejects.toMatchObject({ code: ErrorCodes.STORE_RETRIES_EXHAUSTED });
    expect(redisState.instances[0]?.status).toBe('end');
  });
});

describe('main', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`process.exit(${String(code)})`);
    });
  });

  it('should exit with 1 when REDIS_OUTPUT_KEY is unset', async () => {
    await expect(main({ LOG_LEVEL: 'silent' })).rejects.toThrow('process.exit(1)');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should exit with 1 when the handler file is absent', async () => {
    await expect(
      main({ REDIS_OUTPUT_KEY: 'metrics-out', HANDLER_PATH: fixture('missing.mjs'), LOG_LEVEL: 'silent' })
    ).rejects.toThrow('process.exit(1)');
    expect(process.exit).toHaveBeenCalledWith(1);
  });

  it('should exit with 1 when the handler module defines no handler', async () => {
    await expect(
      main({ REDIS_OUTPUT_KEY: 'metrics-out', HANDLER_PATH: fixture('no-handler.mjs'), LOG_LEVEL: 'silent' })
    ).rejects.toThrow('process.exit(1)');
  });

  it('should exit with 1 when REDIS_PORT is invalid', async () => {
    await expect(main({ REDIS_OUTPUT_KEY: 'metrics-out', REDIS_PORT: 'abc' })).rejects.toThrow('process.exit(1)');
  });
});

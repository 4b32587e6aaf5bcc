import { TransientStoreError } from '../../src/runtime/errors.js';
import type { KeyValueStore } from '../../src/runtime/types.js';

/**
 * KeyValueStore fake with failure injection. Values may be seeded as text or
 * as raw bytes; reads always hand back bytes, as the Redis adapter does.
 */
export class InMemoryStore implements KeyValueStore {
  readonly values = new Map<string, string | Buffer>();
  readonly writes: Array<{ key: string; value: string }> = [];
  failNextGets = 0;
  failNextSets = 0;
  reachable = true;
  connected = false;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async get(key: string): Promise<Buffer | null> {
    if (this.failNextGets > 0) {
      this.failNextGets--;
      throw new TransientStoreError('get', `GET ${key} failed`, { cause: new Error('connect ECONNREFUSED') });
    }
    const value = this.values.get(key);
    if (value === undefined) {
      return null;
    }
    return typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);
  }

  async set(key: string, value: string): Promise<void> {
    if (this.failNextSets > 0) {
      this.failNextSets--;
      throw new TransientStoreError('set', `SET ${key} failed`, { cause: new Error('connect ECONNREFUSED') });
    }
    this.values.set(key, value);
    this.writes.push({ key, value });
  }

  async ping(): Promise<void> {
    if (!this.reachable) {
      throw new TransientStoreError('ping', 'PING failed', { cause: new Error('connect ECONNREFUSED') });
    }
  }

  async close(): Promise<void> {
    this.connected = false;
  }
}

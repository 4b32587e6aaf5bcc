import { EventEmitter } from 'node:events';

/**
 * Connection states as ioredis reports them. A failed connect leaves the
 * client `reconnecting`; it comes back `ready` on its own once the server is
 * reachable again.
 */
type Status = 'wait' | 'connecting' | 'ready' | 'reconnecting' | 'end';

export const redisState: {
  data: Map<string, string | Buffer>;
  unavailable: boolean;
  instances: InMemoryRedis[];
} = {
  data: new Map(),
  unavailable: false,
  instances: [],
};

export function resetRedisState(): void {
  redisState.data.clear();
  redisState.unavailable = false;
  redisState.instances.length = 0;
}

const NOT_WRITABLE = "Stream isn't writeable and enableOfflineQueue options is false";

class InMemoryRedis extends EventEmitter {
  status: Status = 'wait';

  constructor(readonly options: Record<string, unknown> = {}) {
    super();
    redisState.instances.push(this);
  }

  async connect(): Promise<void> {
    if (this.status !== 'wait' && this.status !== 'end') {
      throw new Error('Redis is already connecting/connected');
    }
    if (redisState.unavailable) {
      this.status = 'reconnecting';
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
    this.status = 'ready';
    queueMicrotask(() => this.emit('ready'));
  }

  async getBuffer(key: string): Promise<Buffer | null> {
    this.assertWritable();
    const value = redisState.data.get(key);
    if (value === undefined) {
      return null;
    }
    return typeof value === 'string' ? Buffer.from(value, 'utf-8') : Buffer.from(value);
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.assertWritable();
    redisState.data.set(key, value);
    return 'OK';
  }

  async ping(): Promise<'PONG'> {
    this.assertWritable();
    return 'PONG';
  }

  async quit(): Promise<'OK'> {
    this.assertWritable();
    this.status = 'end';
    return 'OK';
  }

  disconnect(): void {
    this.status = 'end';
  }

  private assertWritable(): void {
    if (this.status === 'reconnecting' && !redisState.unavailable) {
      this.status = 'ready';
    }
    if (this.status === 'ready' && redisState.unavailable) {
      this.status = 'reconnecting';
    }
    if (this.status !== 'ready') {
      throw new Error(NOT_WRITABLE);
    }
  }
}

export { InMemoryRedis as Redis };
export default InMemoryRedis;

/**
 * Runtime context tests
 */

import { describe, it, expect } from 'vitest';
import { RuntimeContext } from '../src/runtime/context.js';

const createContext = (): RuntimeContext =>
  new RuntimeContext({
    storeHost: 'localhost',
    storePort: 6379,
    inputKey: 'metrics',
    outputKey: 'metrics-out',
    handlerSourceModifiedAt: new Date('2024-03-01T10:00:00.000Z'),
  });

describe('RuntimeContext', () => {
  it('should start without a last execution', () => {
    const context = createContext();

    expect(context.lastExecutionAt).toBeUndefined();
    expect(context.environment).toEqual({});
  });

  it('should record the last execution time', () => {
    const context = createContext();
    const at = new Date('2024-03-01T10:05:00.000Z');

    context.recordExecution(at);

    expect(context.lastExecutionAt).toBe(at);
  });

  it('should serialize to a plain snapshot', () => {
    const context = createContext();
    context.recordExecution(new Date('2024-03-01T10:05:00.000Z'));

    expect(JSON.parse(JSON.stringify(context))).toEqual({
      storeHost: 'localhost',
      storePort: 6379,
      inputKey: 'metrics',
      outputKey: 'metrics-out',
      handlerSourceModifiedAt: '2024-03-01T10:00:00.000Z',
      lastExecutionAt: '2024-03-01T10:05:00.000Z',
    });
  });
});

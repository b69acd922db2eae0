import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TeardownStack } from './teardown.js';
import { configureLogging, resetLogging, type LogEntry } from './logger.js';

describe('TeardownStack', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    configureLogging({ level: 'debug', sink: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    resetLogging();
  });

  it('runs actions newest first', async () => {
    const order: string[] = [];
    const stack = new TeardownStack();
    stack.push('close engine', () => {
      order.push('engine');
    });
    stack.push('remove container', async () => {
      order.push('container');
    });
    stack.push('close attach', () => {
      order.push('attach');
    });

    await stack.run();

    expect(order).toEqual(['attach', 'container', 'engine']);
    expect(stack.size).toBe(0);
  });

  it('keeps going after a failing action and logs it at debug', async () => {
    const order: string[] = [];
    const stack = new TeardownStack();
    stack.push('first', () => {
      order.push('first');
    });
    stack.push('broken', async () => {
      throw new Error('remove failed');
    });

    await expect(stack.run()).resolves.toBeUndefined();

    expect(order).toEqual(['first']);
    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe('debug');
    expect(entries[0].meta?.step).toBe('broken');
  });

  it('runs each action at most once', async () => {
    let calls = 0;
    const stack = new TeardownStack();
    stack.push('count', () => {
      calls += 1;
    });

    await stack.run();
    await stack.run();

    expect(calls).toBe(1);
  });

  it('drops actions on release', async () => {
    let calls = 0;
    const stack = new TeardownStack();
    stack.push('count', () => {
      calls += 1;
    });

    stack.release();
    await stack.run();

    expect(calls).toBe(0);
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  isLogLevel,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';

// ---------------------------------------------------------------------------
// Test sink that captures log entries
// ---------------------------------------------------------------------------

function createTestSink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const sink: LogSink = (entry: LogEntry) => {
    entries.push(entry);
  };
  return { sink, entries };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Logger', () => {
  let sink: LogSink;
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    sink = test.sink;
    entries = test.entries;
    configureLogging({ level: 'debug', sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // Log entry structure
  // -----------------------------------------------------------------------

  describe('log entry structure', () => {
    it('writes level, ts, component and msg', () => {
      const logger = createLogger('command');
      logger.info('container created');

      expect(entries).toHaveLength(1);
      const entry = entries[0];
      expect(entry.level).toBe('info');
      expect(entry.component).toBe('command');
      expect(entry.msg).toBe('container created');
      expect(new Date(entry.ts).toISOString()).toBe(entry.ts);
    });

    it('includes metadata when provided', () => {
      const logger = createLogger('networks');
      logger.debug('network created', { driver: 'bridge', internal: false });

      expect(entries[0].meta).toEqual({ driver: 'bridge', internal: false });
    });

    it('omits meta field when no metadata is provided', () => {
      const logger = createLogger('command');
      logger.info('simple message');

      expect(entries[0].meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('filters out debug and info when level is warn', () => {
      configureLogging({ level: 'warn', sink });
      const logger = createLogger('command');

      logger.debug('filtered');
      logger.info('filtered');
      logger.warn('visible');
      logger.error('visible');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('shows all levels when level is debug', () => {
      const logger = createLogger('command');

      logger.debug('d');
      logger.info('i');
      logger.warn('w');
      logger.error('e');

      expect(entries).toHaveLength(4);
    });
  });

  describe('resetLogging', () => {
    it('restores the default warn level', () => {
      resetLogging();
      configureLogging({ sink });
      const logger = createLogger('command');

      logger.info('filtered at default level');
      logger.warn('visible');

      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe('warn');
    });
  });

  describe('isLogLevel', () => {
    it('accepts known levels and rejects others', () => {
      expect(isLogLevel('debug')).toBe(true);
      expect(isLogLevel('error')).toBe(true);
      expect(isLogLevel('trace')).toBe(false);
      expect(isLogLevel(3)).toBe(false);
    });
  });

  // -----------------------------------------------------------------------
  // Context
  // -----------------------------------------------------------------------

  describe('context', () => {
    it('promotes bound identity fields to the entry', () => {
      const logger = createLogger('command').withContext({ project: 'shop', service: 'web' });
      logger.info('starting');

      expect(entries[0].project).toBe('shop');
      expect(entries[0].service).toBe('web');
      expect(entries[0].container).toBeUndefined();
    });

    it('child keeps bound context and extends the component', () => {
      const logger = createLogger('command').withContext({ container: 'abc123' });
      logger.child('forwarder').debug('copy finished');

      expect(entries[0].component).toBe('command:forwarder');
      expect(entries[0].container).toBe('abc123');
    });

    it('promotes well-known metadata fields and removes them from meta', () => {
      const logger = createLogger('command');
      logger.info('removed', { container: 'abc123', duration_ms: 12, ok: true, attempt: 1 });

      expect(entries[0].container).toBe('abc123');
      expect(entries[0].duration_ms).toBe(12);
      expect(entries[0].ok).toBe(true);
      expect(entries[0].meta).toEqual({ attempt: 1 });
    });

    it('ignores promoted keys with the wrong type', () => {
      const logger = createLogger('command');
      logger.info('odd', { duration_ms: 'slow' });

      expect(entries[0].duration_ms).toBeUndefined();
      expect(entries[0].meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Sanitization
  // -----------------------------------------------------------------------

  describe('sanitization', () => {
    it('serializes Error objects in metadata', () => {
      const logger = createLogger('command');
      logger.error('remove failed', { error: new Error('no such container') });

      expect(entries[0].meta?.error).toEqual({
        name: 'Error',
        message: 'no such container',
        stack: expect.any(String),
      });
    });

    it('strips deny-listed fields', () => {
      const logger = createLogger('command');
      logger.info('create', {
        env: ['DB_PASSWORD=test-secret'],
        password: 'test-secret',
        image: 'alpine:3.20',
      });

      expect(entries[0].meta).toEqual({ image: 'alpine:3.20' });
    });

    it('truncates long strings', () => {
      const logger = createLogger('command');
      logger.info('data', { payload: 'x'.repeat(2000) });

      expect(entries[0].meta?.payload).toBe('x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]');
    });

    it('keeps strings at the limit', () => {
      const logger = createLogger('command');
      const okString = 'y'.repeat(META_STRING_MAX_LENGTH);
      logger.info('data', { payload: okString });

      expect(entries[0].meta?.payload).toBe(okString);
    });
  });
});

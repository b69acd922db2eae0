import { describe, it, expect } from 'vitest';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  DEFAULT_TIMEOUTS,
  parseConfig,
  parseEngineHost,
} from './config.js';

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

describe('parseConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('maps engine keys', () => {
    const config = parseConfig({ engine: { host: 'engine.local', port: 2376, protocol: 'https' } });
    expect(config.engine).toEqual({ host: 'engine.local', port: 2376, protocol: 'https' });
  });

  it('maps snake_case timeout keys and keeps the other defaults', () => {
    const config = parseConfig({ timeouts: { stdin_drain_ms: 250, state_capture_ms: 0 } });
    expect(config.timeouts).toEqual({ ...DEFAULT_TIMEOUTS, stdinDrainMs: 250, stateCaptureMs: 0 });
  });

  it('keeps unknown sections alongside the known ones', () => {
    const config = parseConfig({ custom: { a: 1 }, logging: { level: 'info' } });
    expect(config['custom']).toEqual({ a: 1 });
    expect(config.logging.level).toBe('info');
  });

  it('does not share the default timeouts object', () => {
    const config = parseConfig({});
    config.timeouts.stopGraceMs = 1;
    expect(DEFAULT_TIMEOUTS.stopGraceMs).toBe(2000);
  });

  it.each([
    [{ engine: 'x' }, 'compose: [engine] must be a table'],
    [{ engine: { socket_path: '' } }, 'compose: engine.socket_path must be a non-empty string'],
    [{ engine: { port: 0 } }, 'compose: engine.port must be an integer between 1 and 65535'],
    [{ engine: { protocol: 'ftp' } }, 'compose: engine.protocol must be "http" or "https"'],
    [{ timeouts: { stop_grace_ms: 1.5 } }, 'compose: timeouts.stop_grace_ms must be a non-negative integer'],
    [{ timeouts: { health_poll_ms: 0 } }, 'compose: timeouts.health_poll_ms must be greater than zero'],
    [{ logging: { level: 'trace' } }, 'compose: logging.level must be one of: debug, info, warn, error'],
  ])('rejects %j', (raw, message) => {
    expect(() => parseConfig(raw)).toThrow(message);
  });
});

// ---------------------------------------------------------------------------
// parseEngineHost()
// ---------------------------------------------------------------------------

describe('parseEngineHost', () => {
  it('reads a unix socket path', () => {
    expect(parseEngineHost('unix:///var/run/engine.sock')).toEqual({
      socketPath: '/var/run/engine.sock',
    });
  });

  it('reads tcp as http with a port', () => {
    expect(parseEngineHost('tcp://10.0.0.5:2375')).toEqual({
      host: '10.0.0.5',
      protocol: 'http',
      port: 2375,
    });
  });

  it('reads https without a port', () => {
    expect(parseEngineHost('https://engine.example')).toEqual({
      host: 'engine.example',
      protocol: 'https',
    });
  });

  it('rejects an empty socket path', () => {
    expect(() => parseEngineHost('unix://')).toThrow('empty socket path');
  });

  it('rejects other schemes', () => {
    expect(() => parseEngineHost('ssh://user@host')).toThrow(
      'compose: DOCKER_HOST must use unix:// or tcp://, got "ssh://user@host"',
    );
  });
});

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

describe('applyEnvOverrides', () => {
  it('leaves the config alone when nothing is set', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });

  it('ignores empty variables', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, { DOCKER_HOST: ' ', COMPOSE_EXEC_LOG_LEVEL: '' })).toEqual(
      DEFAULT_CONFIG,
    );
  });

  it('replaces the engine section from DOCKER_HOST', () => {
    const base = parseConfig({ engine: { host: 'a', port: 1 } });
    const result = applyEnvOverrides(base, { DOCKER_HOST: 'unix:///run/e.sock' });
    expect(result.engine).toEqual({ socketPath: '/run/e.sock' });
    expect(base.engine).toEqual({ host: 'a', port: 1 });
  });

  it('normalizes the log level', () => {
    const result = applyEnvOverrides(DEFAULT_CONFIG, { COMPOSE_EXEC_LOG_LEVEL: ' Debug ' });
    expect(result.logging.level).toBe('debug');
    expect(DEFAULT_CONFIG.logging.level).toBe('warn');
  });

  it('rejects an unknown log level', () => {
    expect(() => applyEnvOverrides(DEFAULT_CONFIG, { COMPOSE_EXEC_LOG_LEVEL: 'loud' })).toThrow(
      'COMPOSE_EXEC_LOG_LEVEL must be one of',
    );
  });
});

/**
 * compose-exec configuration schema.
 *
 * Defines the TypeScript types for `compose-exec.toml` sections, their
 * defaults, validation of a raw parsed document, and the environment
 * overrides (`DOCKER_HOST`, `COMPOSE_EXEC_LOG_LEVEL`) applied on top.
 */

import { ErrorCode } from './errors.js';
import { ComposeError } from '../core/compose-error.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/**
 * `[engine]` section: where the container engine listens.
 *
 * `socketPath` wins over `host`; with neither set the engine client's own
 * platform default applies.
 */
export interface EngineConfig {
  socketPath?: string;
  host?: string;
  port?: number;
  protocol?: 'http' | 'https';
}

/** `[timeouts]` section, all in milliseconds. */
export interface TimeoutsConfig {
  /** Grace period a stop request gives the container before the engine kills it. */
  stopGraceMs: number;
  killTimeoutMs: number;
  removeTimeoutMs: number;
  /** How long to wait for stdin forwarding to finish after exit. */
  stdinDrainMs: number;
  /** Budget for the diagnostic inspect after an abnormal exit. */
  stateCaptureMs: number;
  healthPollMs: number;
}

/** `[logging]` section. */
export interface LoggingConfig {
  level: LogLevel;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full compose-exec configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are preserved
 * as-is so newer files still load.
 */
export interface ExecConfig {
  engine: EngineConfig;
  timeouts: TimeoutsConfig;
  logging: LoggingConfig;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_TIMEOUTS: Readonly<TimeoutsConfig> = {
  stopGraceMs: 2000,
  killTimeoutMs: 2000,
  removeTimeoutMs: 5000,
  stdinDrainMs: 1000,
  stateCaptureMs: 2000,
  healthPollMs: 500,
};

/** Default configuration applied when compose-exec.toml is absent or partial. */
export const DEFAULT_CONFIG: ExecConfig = {
  engine: {},
  timeouts: { ...DEFAULT_TIMEOUTS },
  logging: { level: 'warn' },
};

/** TOML key for each timeout field. */
const TIMEOUT_KEYS: Record<keyof TimeoutsConfig, string> = {
  stopGraceMs: 'stop_grace_ms',
  killTimeoutMs: 'kill_timeout_ms',
  removeTimeoutMs: 'remove_timeout_ms',
  stdinDrainMs: 'stdin_drain_ms',
  stateCaptureMs: 'state_capture_ms',
  healthPollMs: 'health_poll_ms',
};

const TIMEOUT_FIELDS: readonly (keyof TimeoutsConfig)[] = [
  'stopGraceMs',
  'killTimeoutMs',
  'removeTimeoutMs',
  'stdinDrainMs',
  'stateCaptureMs',
  'healthPollMs',
];

const KNOWN_SECTIONS = ['engine', 'timeouts', 'logging'];

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function invalid(message: string): ComposeError {
  return new ComposeError({ code: ErrorCode.CONFIG_INVALID, message });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw invalid(`[${name}] must be a table`);
  }
  return value;
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `ExecConfig`. Applies defaults for missing sections and keys.
 *
 * @throws ComposeError `CONFIG_INVALID` on a malformed value.
 */
export function parseConfig(raw: Record<string, unknown>): ExecConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      extra[key] = raw[key];
    }
  }

  // --- engine ---
  const rawEngine = section(raw, 'engine');
  const engine: EngineConfig = {};
  const socketPath = rawEngine['socket_path'];
  if (socketPath !== undefined) {
    if (typeof socketPath !== 'string' || socketPath.trim() === '') {
      throw invalid('engine.socket_path must be a non-empty string');
    }
    engine.socketPath = socketPath;
  }
  const host = rawEngine['host'];
  if (host !== undefined) {
    if (typeof host !== 'string' || host.trim() === '') {
      throw invalid('engine.host must be a non-empty string');
    }
    engine.host = host;
  }
  const port = rawEngine['port'];
  if (port !== undefined) {
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
      throw invalid('engine.port must be an integer between 1 and 65535');
    }
    engine.port = port;
  }
  const protocol = rawEngine['protocol'];
  if (protocol !== undefined) {
    if (protocol !== 'http' && protocol !== 'https') {
      throw invalid('engine.protocol must be "http" or "https"');
    }
    engine.protocol = protocol;
  }

  // --- timeouts ---
  const rawTimeouts = section(raw, 'timeouts');
  const timeouts: TimeoutsConfig = { ...DEFAULT_TIMEOUTS };
  for (const field of TIMEOUT_FIELDS) {
    const key = TIMEOUT_KEYS[field];
    const value = rawTimeouts[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw invalid(`timeouts.${key} must be a non-negative integer`);
    }
    timeouts[field] = value;
  }
  if (timeouts.healthPollMs === 0) {
    throw invalid('timeouts.health_poll_ms must be greater than zero');
  }

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw invalid(`logging.level must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return { ...extra, engine, timeouts, logging: { level } };
}

// ---------------------------------------------------------------------------
// Environment overrides
// ---------------------------------------------------------------------------

/**
 * Parse a `DOCKER_HOST` value: `unix:///path` or `tcp://host:port`.
 *
 * @throws ComposeError `CONFIG_INVALID` for any other scheme.
 */
export function parseEngineHost(value: string): EngineConfig {
  const trimmed = value.trim();
  if (trimmed.startsWith('unix://')) {
    const socketPath = trimmed.slice('unix://'.length);
    if (socketPath === '') {
      throw invalid(`DOCKER_HOST has an empty socket path: "${value}"`);
    }
    return { socketPath };
  }
  if (trimmed.startsWith('tcp://') || trimmed.startsWith('http://') || trimmed.startsWith('https://')) {
    let url: URL;
    try {
      url = new URL(trimmed.replace(/^tcp:/, 'http:'));
    } catch (err) {
      throw new ComposeError({
        code: ErrorCode.CONFIG_INVALID,
        message: `DOCKER_HOST is not a valid address: "${value}"`,
        cause: err,
      });
    }
    const protocol = url.protocol === 'https:' ? 'https' : 'http';
    const config: EngineConfig = { host: url.hostname, protocol };
    if (url.port !== '') {
      config.port = Number(url.port);
    }
    return config;
  }
  throw invalid(`DOCKER_HOST must use unix:// or tcp://, got "${value}"`);
}

/**
 * Apply `DOCKER_HOST` and `COMPOSE_EXEC_LOG_LEVEL` from `env` on top of a
 * parsed config. Empty variables are ignored.
 */
export function applyEnvOverrides(
  config: ExecConfig,
  env: NodeJS.ProcessEnv = process.env,
): ExecConfig {
  const result: ExecConfig = {
    ...config,
    engine: { ...config.engine },
    timeouts: { ...config.timeouts },
    logging: { ...config.logging },
  };

  const dockerHost = env['DOCKER_HOST'];
  if (dockerHost !== undefined && dockerHost.trim() !== '') {
    result.engine = parseEngineHost(dockerHost);
  }

  const level = env['COMPOSE_EXEC_LOG_LEVEL'];
  if (level !== undefined && level.trim() !== '') {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw invalid(`COMPOSE_EXEC_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    result.logging.level = normalized;
  }

  return result;
}

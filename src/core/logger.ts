/**
 * Structured JSON logging for compose-exec.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. Every entry is a JSON object with level, ts,
 * component and msg fields; project, service and container identity are
 * promoted to top-level fields so a run can be followed across entries.
 *
 * @example
 * ```ts
 * const logger = createLogger('command');
 * logger.info('container started', { container: 'compose-exec-web-0a1b2c3d4e5f' });
 * // → {"level":"info","ts":"...","component":"command","msg":"container started","container":"compose-exec-web-0a1b2c3d4e5f"}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  project?: string;
  service?: string;
  container?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Identity fields automatically promoted to every log entry. */
export interface LogContext {
  project?: string;
  service?: string;
  container?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'warn';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: warn, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = 'warn';
  globalSink = defaultSink;
}

// ---------------------------------------------------------------------------
// Default sink (stderr JSON)
// ---------------------------------------------------------------------------

// stdout belongs to the host program; library diagnostics go to stderr.
function defaultSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'env',
  'environment',
  'stdinData',
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
  'registryAuth',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_KEYS = new Set([
  'duration_ms',
  'ok',
  'error_code',
  'project',
  'service',
  'container',
]);

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/**
 * Strip denied keys, truncate long strings, and serialize Errors in metadata.
 */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function applyContext(entry: LogEntry, ctx: LogContext | Record<string, unknown>): void {
  if (typeof ctx.project === 'string' && ctx.project) entry.project = ctx.project;
  if (typeof ctx.service === 'string' && ctx.service) entry.service = ctx.service;
  if (typeof ctx.container === 'string' && ctx.container) entry.container = ctx.container;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'command'`, `'engine:docker'`).
 * @param boundContext - Optional identity fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      applyContext(entry, boundContext);
    }

    // Promote well-known fields from meta to top-level
    if (meta) {
      applyContext(entry, meta);
      if (typeof meta.duration_ms === 'number') entry.duration_ms = meta.duration_ms;
      if (typeof meta.ok === 'boolean') entry.ok = meta.ok;
      if (typeof meta.error_code === 'string') entry.error_code = meta.error_code;
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      const remaining: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(sanitized)) {
        if (!PROMOTED_KEYS.has(key)) {
          remaining[key] = value;
        }
      }
      if (Object.keys(remaining).length > 0) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => {
      const merged: LogContext = { ...boundContext, ...ctx };
      return createLogger(component, merged);
    },
  };
}

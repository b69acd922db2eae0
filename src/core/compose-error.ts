/**
 * ComposeError and ExitError: the two error classes callers branch on.
 *
 * ComposeError covers usage mistakes and orchestration failures (engine,
 * transport, health). ExitError means the containerized program ran and
 * returned a non-zero status; it is not a ComposeError.
 */

import { ErrorCode, USAGE_ERROR_CODES, type ErrorCodeValue } from '../types/errors.js';
import type { ContainerStateSnapshot } from './engine/engine.js';

// ---------------------------------------------------------------------------
// Brand symbols
// ---------------------------------------------------------------------------

const COMPOSE_ERROR_BRAND = Symbol.for('compose-exec.ComposeError');
const EXIT_ERROR_BRAND = Symbol.for('compose-exec.ExitError');

/** Longest stderr tail rendered into an ExitError message. */
export const STDERR_SNIPPET_MAX_BYTES = 512;

// ---------------------------------------------------------------------------
// ComposeError
// ---------------------------------------------------------------------------

export interface ComposeErrorOptions {
  code: ErrorCodeValue;
  message: string;
  cause?: unknown;
}

export class ComposeError extends Error {
  readonly code: ErrorCodeValue;
  /** True for precondition violations raised before any engine call. */
  readonly usage: boolean;

  /** @internal */
  readonly [COMPOSE_ERROR_BRAND] = true as const;

  constructor(options: ComposeErrorOptions) {
    super(
      `compose: ${options.message}`,
      options.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = 'ComposeError';
    this.code = options.code;
    this.usage = USAGE_ERROR_CODES.has(options.code);
  }
}

/** Shorthand for a usage error with the given code. */
export function usageError(code: ErrorCodeValue, message: string): ComposeError {
  return new ComposeError({ code, message });
}

/** Wrap an engine failure, keeping it as the cause. */
export function engineError(action: string, cause: unknown): ComposeError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new ComposeError({ code: ErrorCode.ENGINE_ERROR, message: `${action}: ${detail}`, cause });
}

export function isComposeError(value: unknown): value is ComposeError {
  if (value instanceof ComposeError) return true;
  return (
    typeof value === 'object' &&
    value !== null &&
    COMPOSE_ERROR_BRAND in value &&
    (value as Record<symbol, unknown>)[COMPOSE_ERROR_BRAND] === true
  );
}

// ---------------------------------------------------------------------------
// ExitError
// ---------------------------------------------------------------------------

export interface ExitErrorOptions {
  code: number;
  stderr?: Buffer;
  stdout?: Buffer;
  containerState?: ContainerStateSnapshot;
}

/**
 * A container whose main process exited with a non-zero status.
 *
 * `stderr` is only populated when output capture was requested
 * (`output()` / `combinedOutput()`). `containerState` is a best-effort
 * inspect taken after exit, useful for OOM-kill and signal diagnostics.
 */
export class ExitError extends Error {
  readonly code: number;
  stderr: Buffer;
  stdout: Buffer;
  readonly containerState?: ContainerStateSnapshot;

  /** @internal */
  readonly [EXIT_ERROR_BRAND] = true as const;

  constructor(options: ExitErrorOptions) {
    super(formatExitMessage(options.code, options.stderr));
    this.name = 'ExitError';
    this.code = options.code;
    this.stderr = options.stderr ?? Buffer.alloc(0);
    this.stdout = options.stdout ?? Buffer.alloc(0);
    if (options.containerState !== undefined) {
      this.containerState = options.containerState;
    }
  }

  exitCode(): number {
    return this.code;
  }

  /** PID recorded in the final container state, or 0 when unknown. */
  pid(): number {
    return this.containerState?.pid ?? 0;
  }

  /** Whether the engine reported the container as killed for exceeding memory. */
  oomKilled(): boolean {
    return this.containerState?.oomKilled ?? false;
  }
}

function formatExitMessage(code: number, stderr: Buffer | undefined): string {
  const base = `compose: exit status ${code}`;
  if (stderr === undefined || stderr.length === 0) {
    return base;
  }
  let snippet = stderr;
  let prefix = '';
  if (snippet.length > STDERR_SNIPPET_MAX_BYTES) {
    snippet = snippet.subarray(snippet.length - STDERR_SNIPPET_MAX_BYTES);
    prefix = '... ';
  }
  return `${base}: stderr=${prefix}${JSON.stringify(snippet.toString('utf-8'))}`;
}

export function isExitError(value: unknown): value is ExitError {
  if (value instanceof ExitError) return true;
  return (
    typeof value === 'object' &&
    value !== null &&
    EXIT_ERROR_BRAND in value &&
    (value as Record<symbol, unknown>)[EXIT_ERROR_BRAND] === true
  );
}

/**
 * Error codes for compose-exec.
 *
 * Every failure surfaced by the library carries one of these codes.
 * Usage codes are raised synchronously before any engine call and are
 * never worth retrying; the rest describe the engine or the container.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  ALREADY_STARTED: 'ALREADY_STARTED',
  NOT_STARTED: 'NOT_STARTED',
  ALREADY_WAITED: 'ALREADY_WAITED',
  STATE_INCOMPLETE: 'STATE_INCOMPLETE',
  CONTEXT_REQUIRED: 'CONTEXT_REQUIRED',
  IMAGE_REQUIRED: 'IMAGE_REQUIRED',
  BUILD_UNSUPPORTED: 'BUILD_UNSUPPORTED',
  UNSUPPORTED_VOLUME_TYPE: 'UNSUPPORTED_VOLUME_TYPE',
  BIND_SOURCE_REQUIRED: 'BIND_SOURCE_REQUIRED',
  PIPE_CONFLICT: 'PIPE_CONFLICT',
  HEALTHCHECK_UNDEFINED: 'HEALTHCHECK_UNDEFINED',
  SERVICE_NOT_FOUND: 'SERVICE_NOT_FOUND',
  PROJECT_INVALID: 'PROJECT_INVALID',
  PROJECT_NAME_REQUIRED: 'PROJECT_NAME_REQUIRED',
  SECURITY_OPT_INVALID: 'SECURITY_OPT_INVALID',
  CONFIG_INVALID: 'CONFIG_INVALID',
  ENGINE_ERROR: 'ENGINE_ERROR',
  CONTAINER_STOPPED: 'CONTAINER_STOPPED',
  CONTAINER_UNHEALTHY: 'CONTAINER_UNHEALTHY',
  SHUTDOWN: 'SHUTDOWN',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Usage codes
// ---------------------------------------------------------------------------

/** Precondition violations: reported before the engine is contacted. */
export const USAGE_ERROR_CODES: ReadonlySet<ErrorCodeValue> = new Set<ErrorCodeValue>([
  ErrorCode.ALREADY_STARTED,
  ErrorCode.NOT_STARTED,
  ErrorCode.ALREADY_WAITED,
  ErrorCode.STATE_INCOMPLETE,
  ErrorCode.CONTEXT_REQUIRED,
  ErrorCode.IMAGE_REQUIRED,
  ErrorCode.BUILD_UNSUPPORTED,
  ErrorCode.UNSUPPORTED_VOLUME_TYPE,
  ErrorCode.BIND_SOURCE_REQUIRED,
  ErrorCode.PIPE_CONFLICT,
  ErrorCode.HEALTHCHECK_UNDEFINED,
  ErrorCode.SERVICE_NOT_FOUND,
  ErrorCode.PROJECT_NAME_REQUIRED,
]);

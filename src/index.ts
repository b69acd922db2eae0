// Public API of compose-exec.

export const VERSION = '0.1.0';

// Factories
export {
  Project,
  Service,
  command,
  commandContext,
  projectFromWorkingDir,
} from './core/project.js';
export type { FactoryOptions } from './core/project.js';
export { loadProject, defaultComposeFiles } from './core/project-loader.js';
export type { ComposeProject, LoadProjectOptions } from './core/project-loader.js';

// Command lifecycle
export { Command } from './core/command.js';
export type { CommandInit, CommandOptions, CommandOutcome, CommandPhase } from './core/command.js';
export { MemorySink } from './core/stream-forwarder.js';
export { mergeEnv } from './core/env.js';
export { resolveResourceName } from './core/resource-names.js';

// Teardown
export { down } from './core/down.js';
export type { DownOptions } from './core/down.js';

// Cancellation
export {
  manualShutdownTrigger,
  noShutdownTrigger,
  processSignalTrigger,
  shutdownError,
} from './core/signal-scope.js';
export type { ManualShutdown, ShutdownTrigger } from './core/signal-scope.js';

// Errors
export { ComposeError, ExitError, isComposeError, isExitError } from './core/compose-error.js';
export type { ComposeErrorOptions, ExitErrorOptions } from './core/compose-error.js';
export { ErrorCode, USAGE_ERROR_CODES } from './types/errors.js';
export type { ErrorCodeValue } from './types/errors.js';

// Engine
export { createEngineClient, DockerEngine } from './core/engine/docker-engine.js';
export { EngineError } from './core/engine/engine.js';
export type { ContainerStateSnapshot, EngineClient, HealthStatus } from './core/engine/engine.js';

// Configuration and logging
export { loadConfig, CONFIG_FILE_NAME } from './core/config-loader.js';
export type { ExecConfig, EngineConfig, TimeoutsConfig } from './types/config.js';
export { configureLogging, resetLogging, createLogger } from './core/logger.js';
export type { LogEntry, LogLevel, LogSink, Logger } from './core/logger.js';

// Service model
export type {
  HealthcheckDefinition,
  ProjectContext,
  ServiceDescriptor,
  VolumeMount,
  PortMapping,
} from './types/service.js';

/**
 * Command factories: from a loaded project, a single service, or the
 * Compose project in the current directory.
 */

import { resolve } from 'node:path';
import type { ProjectContext, ServiceDescriptor } from '../types/service.js';
import { ErrorCode } from '../types/errors.js';
import { usageError } from './compose-error.js';
import { Command, type CommandOptions } from './command.js';
import { loadProject, type ComposeProject } from './project-loader.js';
import { loadConfig } from './config-loader.js';
import { createEngineClient } from './engine/docker-engine.js';
import { warnIfComposeFileMissing, type DiagnosticsFs } from './diagnostics.js';
import { configureLogging } from './logger.js';

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

/** A service definition bound to the project it resolves names against. */
export class Service {
  readonly descriptor: ServiceDescriptor;
  readonly project: ProjectContext;
  private readonly options: CommandOptions;

  constructor(descriptor: ServiceDescriptor, project: ProjectContext, options: CommandOptions = {}) {
    this.descriptor = descriptor;
    this.project = project;
    this.options = options;
  }

  /**
   * Bind a descriptor without a project: no project name (so no networks
   * are created and volume names stay unqualified) and relative paths
   * resolve against the current directory.
   */
  static fromDescriptor(descriptor: ServiceDescriptor, options: CommandOptions = {}): Service {
    return new Service(descriptor, { name: '', workingDir: resolve(process.cwd()) }, options);
  }

  get name(): string {
    return this.descriptor.name;
  }

  /** A command running `name` with `args`, replacing the service command. */
  command(name: string, ...args: string[]): Command {
    return new Command({
      service: this.descriptor,
      project: this.project,
      args: [name, ...args],
      signal: new AbortController().signal,
      options: this.options,
    });
  }

  /** Like `command`, bound to `signal` for cancellation. */
  commandContext(signal: AbortSignal | null, ...args: string[]): Command {
    return new Command({
      service: this.descriptor,
      project: this.project,
      args,
      signal,
      options: this.options,
    });
  }
}

// ---------------------------------------------------------------------------
// Project
// ---------------------------------------------------------------------------

/** A loaded Compose project. */
export class Project {
  readonly context: ComposeProject;
  private readonly options: CommandOptions;

  constructor(context: ComposeProject, options: CommandOptions = {}) {
    this.context = context;
    this.options = options;
  }

  /**
   * Load the project in `dir`; see `loadProject` for file selection.
   *
   * @throws ComposeError `PROJECT_INVALID`.
   */
  static load(dir: string, files: readonly string[] = [], options: CommandOptions = {}): Project {
    return new Project(loadProject(dir, files), options);
  }

  get name(): string {
    return this.context.name;
  }

  /** Names of the declared services. */
  serviceNames(): string[] {
    return Object.keys(this.context.services);
  }

  /** @throws ComposeError `SERVICE_NOT_FOUND`. */
  service(name: string): Service {
    const descriptor = Object.hasOwn(this.context.services, name)
      ? this.context.services[name]
      : undefined;
    if (descriptor === undefined) {
      throw usageError(ErrorCode.SERVICE_NOT_FOUND, `service "${name}" not found`);
    }
    return new Service(descriptor, this.context, this.options);
  }

  /** A command running `args` in `service`; empty `args` keeps the service command. */
  command(service: string, ...args: string[]): Command {
    return this.commandContext(new AbortController().signal, service, ...args);
  }

  commandContext(signal: AbortSignal | null, service: string, ...args: string[]): Command {
    return this.service(service).commandContext(signal, ...args);
  }
}

// ---------------------------------------------------------------------------
// Current-directory factories
// ---------------------------------------------------------------------------

export interface FactoryOptions extends CommandOptions {
  /** Project directory; defaults to `process.cwd()`. */
  dir?: string;
  files?: readonly string[];
  /** Filesystem for the mirror-mount diagnostic. */
  diagnosticsFs?: DiagnosticsFs;
}

/**
 * Load the project in the current directory, applying its
 * `compose-exec.toml`: the log level, timeouts, and (when no engine is
 * injected) the engine connection.
 */
export function projectFromWorkingDir(options: FactoryOptions = {}): Project {
  const { dir: dirOption, files, diagnosticsFs, ...commandOptions } = options;
  const dir = resolve(dirOption ?? process.cwd());
  warnIfComposeFileMissing(dir, diagnosticsFs ? { fs: diagnosticsFs } : {});

  const config = loadConfig(dir);
  configureLogging({ level: config.logging.level });
  const resolved: CommandOptions = {
    ...commandOptions,
    timeouts: { ...config.timeouts, ...commandOptions.timeouts },
  };
  if (resolved.engine === undefined && resolved.engineFactory === undefined) {
    resolved.engineFactory = () => createEngineClient(config.engine);
  }
  return Project.load(dir, files, resolved);
}

/**
 * A command for `service` in the Compose project of the current
 * directory. Each call loads the project again; load a Project once to
 * run many commands.
 *
 * @throws ComposeError `PROJECT_INVALID`, `CONFIG_INVALID` or `SERVICE_NOT_FOUND`.
 */
export function command(service: string, ...args: string[]): Command {
  return projectFromWorkingDir().command(service, ...args);
}

/** Like `command`, bound to `signal` for cancellation. */
export function commandContext(signal: AbortSignal | null, service: string, ...args: string[]): Command {
  return projectFromWorkingDir().commandContext(signal, service, ...args);
}

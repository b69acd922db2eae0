/**
 * Command: one containerized invocation of a service, shaped like a
 * subprocess handle.
 *
 * A Command is configured (args, env, working dir, I/O endpoints), then
 * started once and waited on once. Start creates and attaches the
 * container before starting it so no early output is lost; wait blocks
 * until the container exits, drains its streams and removes it. Every
 * container created here is removed exactly once, on every exit path.
 *
 * The bound AbortSignal and the shutdown trigger (SIGINT/SIGTERM by
 * default) cancel setup calls and, once running, turn into a graceful
 * stop followed by a kill.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { PassThrough, type Readable, type Writable } from 'node:stream';
import type {
  AttachHandle,
  ContainerStateSnapshot,
  EngineClient,
  WaitResult,
} from './engine/engine.js';
import { createEngineClient } from './engine/docker-engine.js';
import type { ProjectContext, ServiceDescriptor } from '../types/service.js';
import { DEFAULT_TIMEOUTS, type TimeoutsConfig } from '../types/config.js';
import { ErrorCode } from '../types/errors.js';
import {
  ComposeError,
  ExitError,
  engineError,
  isComposeError,
  isExitError,
  usageError,
} from './compose-error.js';
import { buildContainerConfig } from './container-config.js';
import { mergeEnv, serviceEnv } from './env.js';
import { translateMounts } from './mounts.js';
import { ensureNetworks, resolveNetworking } from './networks.js';
import { ensureVolumes } from './volumes.js';
import { containerNameFor } from './resource-names.js';
import {
  deriveScope,
  processSignalTrigger,
  type DerivedScope,
  type ShutdownTrigger,
} from './signal-scope.js';
import { MemorySink, StreamForwarder } from './stream-forwarder.js';
import { TeardownStack } from './teardown.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CommandPhase = 'unstarted' | 'starting' | 'running' | 'stopping' | 'terminal';

export type CommandOutcome = 'success' | 'exit-error' | 'engine-error' | 'cancelled';

export interface CommandOptions {
  /** Engine to use; never closed by the command. */
  engine?: EngineClient;
  /** Creates an engine when none is injected; the command owns and closes it. */
  engineFactory?: () => EngineClient;
  /** Source of shutdown requests; defaults to SIGINT/SIGTERM. */
  shutdownTrigger?: ShutdownTrigger;
  timeouts?: Partial<TimeoutsConfig>;
  logger?: Logger;
  /** Reads seccomp profiles referenced by `security_opt`. */
  readFile?: (path: string) => string;
}

export interface CommandInit {
  service: ServiceDescriptor;
  project: ProjectContext;
  args?: readonly string[];
  /** Cancellation for the whole run; `null` marks a missing signal and fails start. */
  signal: AbortSignal | null;
  options?: CommandOptions;
}

type ExitOutcome = { ok: true; result: WaitResult } | { ok: false; error: unknown };

/** Everything start() establishes, set together once setup succeeds. */
interface RunningState {
  containerId: string;
  containerName: string;
  engine: EngineClient;
  exit: Promise<ExitOutcome>;
  attach: AttachHandle;
  forwarder: StreamForwarder;
  scope: DerivedScope;
  logger: Logger;
  startedAt: number;
}

interface Pipes {
  stdin?: PassThrough;
  stdout?: PassThrough;
  stderr?: PassThrough;
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export class Command {
  readonly service: ServiceDescriptor;
  readonly project: ProjectContext;

  /** Arguments replacing the service command; empty keeps it. */
  args: string[];
  /** `KEY=VALUE` or `KEY` entries layered over the service environment. */
  env: string[] = [];
  /** Working directory inside the container, overriding the service's. */
  workingDir?: string;

  stdin?: Readable;
  stdout?: Writable;
  stderr?: Writable;

  private readonly signal: AbortSignal | null;
  private readonly options: CommandOptions;
  private readonly timeouts: TimeoutsConfig;
  private readonly baseLogger: Logger;

  private currentPhase: CommandPhase = 'unstarted';
  private currentOutcome: CommandOutcome | undefined;
  private running: RunningState | undefined;
  private ownedEngine: EngineClient | undefined;
  private waited = false;
  private captureStderr = false;
  private readonly removed = new Set<string>();
  private readonly pipes: Pipes = {};

  constructor(init: CommandInit) {
    this.service = init.service;
    this.project = init.project;
    this.args = [...(init.args ?? [])];
    this.signal = init.signal;
    this.options = init.options ?? {};
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...this.options.timeouts };
    this.baseLogger = (this.options.logger ?? createLogger('command')).withContext({
      project: init.project.name,
      service: init.service.name,
    });
  }

  get phase(): CommandPhase {
    return this.currentPhase;
  }

  /** Set once the command reaches the terminal phase through wait or a failed start. */
  get outcome(): CommandOutcome | undefined {
    return this.currentOutcome;
  }

  /** Environment the container will see: service environment, then `env`. */
  environ(): string[] {
    return mergeEnv(serviceEnv(this.service), this.env);
  }

  toString(): string {
    if (this.args.length === 0) return '<default>';
    return this.args
      .map((arg) => (arg === '' || /[\s"\\]/.test(arg) ? JSON.stringify(arg) : arg))
      .join(' ');
  }

  // -----------------------------------------------------------------------
  // Pipes
  // -----------------------------------------------------------------------

  /** A stream of the container's stdout; ends when the output stream does. */
  stdoutPipe(): Readable {
    this.assertConfigurable();
    if (this.stdout !== undefined) {
      throw usageError(ErrorCode.PIPE_CONFLICT, 'stdout already set');
    }
    const pipe = new PassThrough();
    this.pipes.stdout = pipe;
    this.stdout = pipe;
    return pipe;
  }

  /** A stream of the container's stderr; ends when the output stream does. */
  stderrPipe(): Readable {
    this.assertConfigurable();
    if (this.stderr !== undefined) {
      throw usageError(ErrorCode.PIPE_CONFLICT, 'stderr already set');
    }
    const pipe = new PassThrough();
    this.pipes.stderr = pipe;
    this.stderr = pipe;
    return pipe;
  }

  /** A stream into the container's stdin; end it to send EOF. */
  stdinPipe(): Writable {
    this.assertConfigurable();
    if (this.stdin !== undefined) {
      throw usageError(ErrorCode.PIPE_CONFLICT, 'stdin already set');
    }
    const pipe = new PassThrough();
    this.pipes.stdin = pipe;
    this.stdin = pipe;
    return pipe;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Create, attach and start the container.
   *
   * @throws ComposeError usage codes before any engine call, `ENGINE_ERROR`
   *   for engine failures, or the abort reason when cancelled during setup.
   */
  async start(): Promise<void> {
    if (this.currentPhase !== 'unstarted') {
      throw usageError(ErrorCode.ALREADY_STARTED, 'already started');
    }
    this.currentPhase = 'starting';

    try {
      this.running = await this.launch();
      this.currentPhase = 'running';
    } catch (err) {
      this.currentPhase = 'terminal';
      this.closePipes(err);
      throw err;
    }
  }

  /**
   * Wait for the container to exit, then drain its output and remove it.
   *
   * @throws ExitError on a non-zero exit status.
   * @throws ComposeError `ENGINE_ERROR` when the engine fails to report
   *   the exit; the abort reason when cancelled.
   */
  async wait(): Promise<void> {
    const state = this.snapshotRunning();
    if (this.waited) {
      throw usageError(ErrorCode.ALREADY_WAITED, 'wait already called');
    }
    this.waited = true;

    try {
      await this.supervise(state);
    } finally {
      this.currentPhase = 'terminal';
      state.scope.release();
      await this.closeOwnedEngine(state.logger);
    }
  }

  /** start() then wait(). */
  async run(): Promise<void> {
    await this.start();
    await this.wait();
  }

  /**
   * Run and collect stdout. Stderr is captured for the error message and,
   * when no stderr sink is set, collected too.
   *
   * @throws ExitError carrying `stdout` and `stderr` on a non-zero exit.
   */
  async output(): Promise<Buffer> {
    this.assertConfigurable();
    if (this.stdout !== undefined) {
      throw usageError(ErrorCode.PIPE_CONFLICT, 'stdout already set');
    }
    const stdout = new MemorySink();
    this.stdout = stdout;
    if (this.stderr === undefined) {
      this.stderr = new MemorySink();
    }
    this.captureStderr = true;

    try {
      await this.run();
    } catch (err) {
      if (isExitError(err)) {
        err.stdout = stdout.contents();
      }
      throw err;
    }
    return stdout.contents();
  }

  /**
   * Run and collect stdout and stderr interleaved as they arrive.
   *
   * @throws ExitError carrying the combined bytes in `stdout` on a non-zero exit.
   */
  async combinedOutput(): Promise<Buffer> {
    this.assertConfigurable();
    if (this.stdout !== undefined || this.stderr !== undefined) {
      throw usageError(ErrorCode.PIPE_CONFLICT, 'stdout or stderr already set');
    }
    const combined = new MemorySink();
    this.stdout = combined;
    this.stderr = combined;
    this.captureStderr = true;

    try {
      await this.run();
    } catch (err) {
      if (isExitError(err)) {
        err.stdout = combined.contents();
      }
      throw err;
    }
    return combined.contents();
  }

  /**
   * Poll the started container until its healthcheck reports healthy.
   * May run alongside wait().
   *
   * @throws ComposeError `HEALTHCHECK_UNDEFINED`, `CONTAINER_STOPPED` or
   *   `CONTAINER_UNHEALTHY`; the abort reason when the bound signal fires.
   */
  async waitUntilHealthy(): Promise<void> {
    const healthcheck = this.service.healthcheck;
    if (healthcheck === undefined || healthcheck.disable) {
      throw usageError(
        ErrorCode.HEALTHCHECK_UNDEFINED,
        'healthcheck is not defined for this service',
      );
    }
    const state = this.snapshotRunning();
    const signal = this.signal ?? state.scope.signal;

    for (;;) {
      let health: ContainerStateSnapshot;
      try {
        health = (await state.engine.inspectContainer(state.containerId, { signal })).state;
      } catch (err) {
        if (signal.aborted) throw signal.reason;
        throw engineError('inspect container', err);
      }

      if (!health.running) {
        throw new ComposeError({
          code: ErrorCode.CONTAINER_STOPPED,
          message: `container stopped (status=${health.status})`,
        });
      }
      const status = health.health?.status ?? 'none';
      if (status === 'none') {
        throw usageError(ErrorCode.HEALTHCHECK_UNDEFINED, 'container has no healthcheck');
      }
      if (status === 'unhealthy') {
        throw new ComposeError({
          code: ErrorCode.CONTAINER_UNHEALTHY,
          message: 'container became unhealthy',
        });
      }
      if (status === 'healthy') {
        state.logger.debug('container healthy');
        return;
      }

      try {
        await sleep(this.timeouts.healthPollMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) throw signal.reason;
        throw err;
      }
    }
  }

  // -----------------------------------------------------------------------
  // Start
  // -----------------------------------------------------------------------

  private async launch(): Promise<RunningState> {
    const signal = this.signal;
    if (signal === null) {
      throw usageError(ErrorCode.CONTEXT_REQUIRED, 'an AbortSignal is required');
    }
    const { service, project } = this;
    if (service.build !== undefined) {
      throw usageError(
        ErrorCode.BUILD_UNSUPPORTED,
        `service "${service.name}" declares a build; only prebuilt images are supported`,
      );
    }
    const image = service.image?.trim() ?? '';
    if (image === '') {
      throw usageError(ErrorCode.IMAGE_REQUIRED, `service "${service.name}" has no image`);
    }

    const mounts = translateMounts(service, project);
    const { config, hostConfig } = buildContainerConfig({
      service,
      project,
      args: this.args,
      env: this.env,
      ...(this.workingDir !== undefined ? { workingDir: this.workingDir } : {}),
      stdin: this.stdin !== undefined,
      mounts,
      ...(this.options.readFile ? { readFile: this.options.readFile } : {}),
    });
    const networking = resolveNetworking(service, project);
    const containerName = containerNameFor(service.name);
    const logger = this.baseLogger.withContext({ container: containerName });

    const scope = deriveScope(signal, this.options.shutdownTrigger ?? processSignalTrigger);
    const teardown = new TeardownStack(logger);
    teardown.push('release scope', () => scope.release());

    // Failures while the scope is aborted surface as its reason.
    const step = async <T>(action: string, fn: () => Promise<T>): Promise<T> => {
      try {
        return await fn();
      } catch (err) {
        if (scope.signal.aborted) throw scope.signal.reason;
        if (isComposeError(err)) throw err;
        throw engineError(action, err);
      }
    };
    const call = { signal: scope.signal };
    const startedAt = Date.now();

    try {
      const engine = this.acquireEngine();
      if (this.ownedEngine === engine) {
        teardown.push('close engine', () => this.closeOwnedEngine(logger));
      }

      await step(`pull image "${image}"`, async () => {
        if (!(await engine.imageExists(image, call))) {
          logger.info('pulling image', { image });
          await engine.pullImage(image, call);
        }
      });

      if (networking) {
        const targets = networking.targets;
        await step('ensure networks', () =>
          ensureNetworks(engine, project.name, targets, { ...call, logger }),
        );
      }
      await step('ensure volumes', () => ensureVolumes(engine, service, project, { ...call, logger }));

      const containerId = await step(`create container "${containerName}"`, () =>
        engine.createContainer(
          {
            name: containerName,
            config,
            hostConfig,
            ...(networking ? { networkingConfig: networking.config } : {}),
          },
          call,
        ),
      );
      teardown.push('remove container', () => this.removeContainer(engine, containerId, logger));
      logger.debug('container created', { id: containerId });

      const attach = await step('attach container', () =>
        engine.attachContainer(containerId, {
          ...call,
          stdin: this.stdin !== undefined,
          stdout: true,
          stderr: true,
        }),
      );
      teardown.push('close attach', () => attach.close());

      const forwarder = new StreamForwarder({
        attach,
        ...(this.stdin ? { stdin: this.stdin } : {}),
        ...(this.stdout ? { stdout: this.stdout } : {}),
        ...(this.stderr ? { stderr: this.stderr } : {}),
        captureStderr: this.captureStderr,
        onOutputClosed: (err) => this.closeOutputPipes(err),
        onInputClosed: () => this.closeInputPipe(),
        logger: logger.child('io'),
      });
      await forwarder.ready;

      await step('start container', () => engine.startContainer(containerId, call));

      // The exit subscription must outlive cancellation so a stop can be observed.
      const exit = engine.waitContainer(containerId).then(
        (result): ExitOutcome => ({ ok: true, result }),
        (error: unknown): ExitOutcome => ({ ok: false, error }),
      );

      teardown.release();
      logger.info('container started', { id: containerId, duration_ms: Date.now() - startedAt });
      return {
        containerId,
        containerName,
        engine,
        exit,
        attach,
        forwarder,
        scope,
        logger,
        startedAt,
      };
    } catch (err) {
      this.currentOutcome = scope.signal.aborted ? 'cancelled' : 'engine-error';
      logger.debug('start failed', { error: err });
      await teardown.run();
      throw err;
    }
  }

  private acquireEngine(): EngineClient {
    if (this.options.engine) return this.options.engine;
    try {
      const engine = (this.options.engineFactory ?? createEngineClient)();
      this.ownedEngine = engine;
      return engine;
    } catch (err) {
      throw engineError('connect to engine', err);
    }
  }

  // -----------------------------------------------------------------------
  // Wait
  // -----------------------------------------------------------------------

  private snapshotRunning(): RunningState {
    if (this.currentPhase === 'unstarted') {
      throw usageError(ErrorCode.NOT_STARTED, 'not started');
    }
    if (this.running === undefined) {
      throw usageError(ErrorCode.STATE_INCOMPLETE, 'internal state incomplete');
    }
    return this.running;
  }

  private async supervise(state: RunningState): Promise<void> {
    const bound = this.signal ?? state.scope.signal;
    const { engine, containerId, logger } = state;

    let result: WaitResult;
    try {
      result = await this.waitForExit(state);
    } catch (err) {
      state.attach.close();
      this.currentOutcome = 'engine-error';
      throw err;
    }
    this.currentPhase = 'stopping';

    try {
      await this.waitForIO(state, bound);
    } catch (err) {
      this.currentOutcome = 'cancelled';
      throw err;
    }
    state.attach.close();

    let containerState: ContainerStateSnapshot | undefined;
    if (result.error === undefined && result.statusCode !== 0) {
      containerState = await this.captureState(state);
    }
    await this.removeContainer(engine, containerId, logger);

    logger.info('container exited', {
      exit_code: result.statusCode,
      duration_ms: Date.now() - state.startedAt,
    });

    if (result.error !== undefined) {
      this.currentOutcome = 'engine-error';
      throw new ComposeError({ code: ErrorCode.ENGINE_ERROR, message: result.error });
    }
    if (bound.aborted) {
      this.currentOutcome = 'cancelled';
      throw bound.reason;
    }
    if (state.scope.shutdownRequested) {
      this.currentOutcome = 'cancelled';
      throw state.scope.signal.reason;
    }
    if (result.statusCode !== 0) {
      this.currentOutcome = 'exit-error';
      throw new ExitError({
        code: result.statusCode,
        ...(this.captureStderr ? { stderr: state.forwarder.capturedStderr() } : {}),
        ...(containerState ? { containerState } : {}),
      });
    }
    this.currentOutcome = 'success';
  }

  /**
   * Wait for the exit notification. The first cancellation requests one
   * stop (then kill); waiting continues until the container really exits.
   */
  private async waitForExit(state: RunningState): Promise<WaitResult> {
    const { scope, logger } = state;
    let stopping: Promise<void> | undefined;
    const onCancel = (): void => {
      if (stopping) return;
      this.currentPhase = 'stopping';
      logger.info('stopping container', { reason: describeReason(scope.signal.reason) });
      stopping = this.stopAndKill(state);
    };

    if (scope.signal.aborted) {
      onCancel();
    } else {
      scope.signal.addEventListener('abort', onCancel, { once: true });
    }

    try {
      const outcome = await state.exit;
      if (!outcome.ok) {
        await this.removeContainer(state.engine, state.containerId, logger);
        throw engineError('wait for container', outcome.error);
      }
      return outcome.result;
    } finally {
      scope.signal.removeEventListener('abort', onCancel);
      if (stopping) await stopping;
    }
  }

  private async stopAndKill(state: RunningState): Promise<void> {
    const { engine, containerId, logger } = state;
    const { stopGraceMs, killTimeoutMs } = this.timeouts;
    try {
      await engine.stopContainer(containerId, {
        timeoutSeconds: Math.ceil(stopGraceMs / 1000),
        signal: AbortSignal.timeout(stopGraceMs + 1000),
      });
    } catch (err) {
      logger.debug('stop failed, killing', { error: err });
      try {
        await engine.killContainer(containerId, {
          killSignal: 'SIGKILL',
          signal: AbortSignal.timeout(killTimeoutMs),
        });
      } catch (killErr) {
        logger.debug('kill failed', { error: killErr });
      }
    }
  }

  /** Let stdin finish briefly, then wait for output to drain unless cancelled. */
  private async waitForIO(state: RunningState, bound: AbortSignal): Promise<void> {
    const { forwarder } = state;
    await settleWithin(forwarder.inputDone, this.timeouts.stdinDrainMs);
    forwarder.stopInput();

    const drained = await untilAborted(forwarder.outputDone, bound);
    if (!drained) {
      state.attach.close();
      await this.removeContainer(state.engine, state.containerId, state.logger);
      throw bound.reason;
    }
  }

  private async captureState(state: RunningState): Promise<ContainerStateSnapshot | undefined> {
    try {
      const info = await state.engine.inspectContainer(state.containerId, {
        signal: AbortSignal.timeout(this.timeouts.stateCaptureMs),
      });
      return info.state;
    } catch (err) {
      state.logger.debug('state capture failed', { error: err });
      return undefined;
    }
  }

  // -----------------------------------------------------------------------
  // Cleanup
  // -----------------------------------------------------------------------

  /** Force-remove once per container; failures are logged. */
  private async removeContainer(
    engine: EngineClient,
    containerId: string,
    logger: Logger,
  ): Promise<void> {
    if (this.removed.has(containerId)) return;
    this.removed.add(containerId);
    try {
      await engine.removeContainer(containerId, {
        force: true,
        signal: AbortSignal.timeout(this.timeouts.removeTimeoutMs),
      });
      logger.debug('container removed', { id: containerId });
    } catch (err) {
      logger.debug('container removal failed', { id: containerId, error: err });
    }
  }

  private async closeOwnedEngine(logger: Logger): Promise<void> {
    const engine = this.ownedEngine;
    if (engine === undefined) return;
    this.ownedEngine = undefined;
    try {
      await engine.close();
    } catch (err) {
      logger.debug('engine close failed', { error: err });
    }
  }

  private closeOutputPipes(err?: Error): void {
    for (const pipe of [this.pipes.stdout, this.pipes.stderr]) {
      if (!pipe || pipe.destroyed || pipe.writableEnded) continue;
      if (err) {
        pipe.destroy(err);
      } else {
        pipe.end();
      }
    }
  }

  private closeInputPipe(): void {
    const pipe = this.pipes.stdin;
    if (pipe && !pipe.destroyed) pipe.destroy();
  }

  private closePipes(reason: unknown): void {
    const err = reason instanceof Error ? reason : new Error(String(reason));
    for (const pipe of [this.pipes.stdin, this.pipes.stdout, this.pipes.stderr]) {
      if (pipe && !pipe.destroyed) pipe.destroy(err);
    }
  }

  private assertConfigurable(): void {
    if (this.currentPhase !== 'unstarted') {
      throw usageError(ErrorCode.ALREADY_STARTED, 'already started');
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Resolve when `promise` settles or after `ms`, whichever comes first. */
async function settleWithin(promise: Promise<void>, ms: number): Promise<void> {
  const timer = new AbortController();
  try {
    await Promise.race([promise, sleep(ms, undefined, { signal: timer.signal }).catch(() => undefined)]);
  } finally {
    timer.abort();
  }
}

/** True when `promise` resolved first, false when `signal` aborted first. */
function untilAborted(promise: Promise<void>, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => resolve(false);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    });
  });
}

function describeReason(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

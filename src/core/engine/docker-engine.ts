/**
 * EngineClient over the Docker Engine API, via dockerode.
 */

import Docker from 'dockerode';
import { Duplex } from 'node:stream';
import type {
  AttachHandle,
  AttachOptions,
  ContainerInspect,
  ContainerStateSnapshot,
  ContainerSummary,
  CreateContainerRequest,
  CreateNetworkRequest,
  CreateVolumeRequest,
  EngineCallOptions,
  EngineClient,
  HealthStatus,
  KillOptions,
  ListContainersOptions,
  ListNetworksOptions,
  NetworkSummary,
  RemoveOptions,
  StopOptions,
  WaitResult,
} from './engine.js';
import { isNotFoundError } from './engine.js';
import type { EngineConfig } from '../../types/config.js';
import { applyEnvOverrides, DEFAULT_CONFIG } from '../../types/config.js';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

/** dockerode connection options for an `[engine]` config; empty means dockerode's defaults. */
export function dockerOptions(config: EngineConfig): Docker.DockerOptions {
  if (config.socketPath) {
    return { socketPath: config.socketPath };
  }
  if (config.host) {
    return {
      host: config.host,
      ...(config.port !== undefined ? { port: config.port } : {}),
      ...(config.protocol ? { protocol: config.protocol } : {}),
    };
  }
  return {};
}

/**
 * Create a Docker engine client from configuration; without one, from
 * `DOCKER_HOST` and then the platform default socket.
 */
export function createEngineClient(config?: EngineConfig): EngineClient {
  const resolved = config ?? applyEnvOverrides(DEFAULT_CONFIG).engine;
  return new DockerEngine(new Docker(dockerOptions(resolved)));
}

// ---------------------------------------------------------------------------
// Response mapping
// ---------------------------------------------------------------------------

const HEALTH_STATUSES: readonly HealthStatus[] = ['starting', 'healthy', 'unhealthy', 'none'];

function isHealthStatus(value: unknown): value is HealthStatus {
  return typeof value === 'string' && (HEALTH_STATUSES as readonly string[]).includes(value);
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function num(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/** Normalize the `State` object of an inspect response. */
export function toContainerState(state: unknown): ContainerStateSnapshot {
  const snapshot: ContainerStateSnapshot = {
    status: text(field(state, 'Status')),
    running: field(state, 'Running') === true,
    exitCode: num(field(state, 'ExitCode')),
    pid: num(field(state, 'Pid')),
    oomKilled: field(state, 'OOMKilled') === true,
    error: text(field(state, 'Error')),
  };
  const startedAt = text(field(state, 'StartedAt'));
  if (startedAt !== '') snapshot.startedAt = startedAt;
  const finishedAt = text(field(state, 'FinishedAt'));
  if (finishedAt !== '') snapshot.finishedAt = finishedAt;

  const health = field(state, 'Health');
  const status = field(health, 'Status');
  if (isHealthStatus(status)) {
    snapshot.health = { status, failingStreak: num(field(health, 'FailingStreak')) };
  }
  return snapshot;
}

/** Normalize a container wait response. */
export function toWaitResult(response: unknown): WaitResult {
  const result: WaitResult = { statusCode: num(field(response, 'StatusCode')) };
  const message = text(field(field(response, 'Error'), 'Message'));
  if (message !== '') result.error = message;
  return result;
}

/** `key=value` label filters in the engine's filter format. */
export function labelFilters(labels: readonly string[] | undefined): Record<string, string[]> {
  return labels && labels.length > 0 ? { label: [...labels] } : {};
}

// ---------------------------------------------------------------------------
// DockerEngine
// ---------------------------------------------------------------------------

export class DockerEngine implements EngineClient {
  readonly name = 'docker';

  private readonly docker: Docker;
  private readonly logger: Logger;
  private closed = false;

  constructor(docker: Docker, logger?: Logger) {
    this.docker = docker;
    this.logger = logger ?? createLogger('engine:docker');
  }

  // -----------------------------------------------------------------------
  // Images
  // -----------------------------------------------------------------------

  async imageExists(ref: string, options?: EngineCallOptions): Promise<boolean> {
    try {
      await this.call(options, () => this.docker.getImage(ref).inspect());
      return true;
    } catch (err) {
      if (isNotFoundError(err)) return false;
      throw err;
    }
  }

  async pullImage(ref: string, options?: EngineCallOptions): Promise<void> {
    await this.call(options, async () => {
      const progress = await this.docker.pull(ref);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(progress, (error: unknown) =>
          error ? reject(error) : resolve(),
        );
      });
    });
    this.logger.debug('image pulled', { image: ref });
  }

  // -----------------------------------------------------------------------
  // Containers
  // -----------------------------------------------------------------------

  async createContainer(
    request: CreateContainerRequest,
    options?: EngineCallOptions,
  ): Promise<string> {
    const container = await this.call(
      options,
      () =>
        this.docker.createContainer({
          name: request.name,
          ...request.config,
          HostConfig: request.hostConfig,
          ...(request.networkingConfig ? { NetworkingConfig: request.networkingConfig } : {}),
        }),
      async (late) => {
        await late.remove({ force: true });
      },
    );
    return container.id;
  }

  async attachContainer(id: string, options: AttachOptions): Promise<AttachHandle> {
    const stream = await this.call(
      options,
      () =>
        this.docker.getContainer(id).attach({
          stream: true,
          hijack: true,
          stdin: options.stdin,
          stdout: options.stdout,
          stderr: options.stderr,
        }),
      (late) => {
        if (late instanceof Duplex && !late.destroyed) late.destroy();
      },
    );
    if (!(stream instanceof Duplex)) {
      throw new Error('attach did not return a bidirectional stream');
    }
    return {
      output: stream,
      ...(options.stdin ? { input: stream } : {}),
      closeWrite: () => {
        if (!stream.writableEnded) stream.end();
      },
      close: () => {
        if (!stream.destroyed) stream.destroy();
      },
    };
  }

  async startContainer(id: string, options?: EngineCallOptions): Promise<void> {
    await this.call(options, () => this.docker.getContainer(id).start());
  }

  async waitContainer(id: string, options?: EngineCallOptions): Promise<WaitResult> {
    const response: unknown = await this.call(options, () =>
      this.docker.getContainer(id).wait({ condition: 'not-running' }),
    );
    return toWaitResult(response);
  }

  async inspectContainer(id: string, options?: EngineCallOptions): Promise<ContainerInspect> {
    const info = await this.call(options, () => this.docker.getContainer(id).inspect());
    return { id: info.Id, name: info.Name.replace(/^\//, ''), state: toContainerState(info.State) };
  }

  async stopContainer(id: string, options?: StopOptions): Promise<void> {
    await this.call(options, () =>
      this.docker
        .getContainer(id)
        .stop(options?.timeoutSeconds !== undefined ? { t: options.timeoutSeconds } : {}),
    );
  }

  async killContainer(id: string, options?: KillOptions): Promise<void> {
    await this.call(options, () =>
      this.docker.getContainer(id).kill({ signal: options?.killSignal ?? 'SIGKILL' }),
    );
  }

  async removeContainer(id: string, options?: RemoveOptions): Promise<void> {
    await this.call(options, () =>
      this.docker
        .getContainer(id)
        .remove({ force: options?.force ?? false, v: options?.removeVolumes ?? false }),
    );
  }

  async listContainers(options?: ListContainersOptions): Promise<ContainerSummary[]> {
    const containers = await this.call(options, () =>
      this.docker.listContainers({
        all: options?.all ?? false,
        filters: labelFilters(options?.labels),
      }),
    );
    return containers.map((c) => ({
      id: c.Id,
      names: c.Names,
      labels: { ...c.Labels },
      state: c.State,
    }));
  }

  // -----------------------------------------------------------------------
  // Networks and volumes
  // -----------------------------------------------------------------------

  async listNetworks(options?: ListNetworksOptions): Promise<NetworkSummary[]> {
    const filters = labelFilters(options?.labels);
    if (options?.name !== undefined) filters['name'] = [options.name];
    const networks = await this.call(options, () => this.docker.listNetworks({ filters }));
    return networks.map((n) => ({ id: n.Id, name: n.Name, labels: { ...n.Labels } }));
  }

  async createNetwork(request: CreateNetworkRequest, options?: EngineCallOptions): Promise<string> {
    const network = await this.call(options, () =>
      this.docker.createNetwork({
        Name: request.name,
        CheckDuplicate: true,
        ...(request.driver ? { Driver: request.driver } : {}),
        ...(request.options ? { Options: request.options } : {}),
        ...(request.labels ? { Labels: request.labels } : {}),
      }),
    );
    return network.id;
  }

  async removeNetwork(idOrName: string, options?: EngineCallOptions): Promise<void> {
    await this.call(options, () => this.docker.getNetwork(idOrName).remove());
  }

  async createVolume(request: CreateVolumeRequest, options?: EngineCallOptions): Promise<void> {
    await this.call(options, () =>
      this.docker.createVolume({
        Name: request.name,
        ...(request.driver ? { Driver: request.driver } : {}),
        ...(request.driverOpts ? { DriverOpts: request.driverOpts } : {}),
        ...(request.labels ? { Labels: request.labels } : {}),
      }),
    );
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /**
   * Run one API call, rejecting with the signal's reason if it aborts first.
   * The request itself still completes; a result that arrives after the
   * abort is handed to `discard` so nothing it created outlives the call.
   */
  private call<T>(
    options: EngineCallOptions | undefined,
    fn: () => Promise<T>,
    discard?: (late: T) => Promise<void> | void,
  ): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error('engine client is closed'));
    }
    const signal = options?.signal;
    if (!signal) return fn();
    if (signal.aborted) return Promise.reject(signal.reason);

    return new Promise<T>((resolve, reject) => {
      let abandoned = false;
      const onAbort = (): void => {
        abandoned = true;
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      void fn().then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          if (abandoned) {
            this.discardLate(value, discard);
            return;
          }
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  private discardLate<T>(value: T, discard: ((late: T) => Promise<void> | void) | undefined): void {
    if (!discard) return;
    void (async () => {
      try {
        await discard(value);
        this.logger.debug('discarded result of abandoned call');
      } catch (err) {
        this.logger.debug('cleanup of abandoned call failed', { error: err });
      }
    })();
  }
}

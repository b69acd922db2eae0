/**
 * Container engine contract.
 *
 * The lifecycle controller, the resource ensure steps and `down` talk to
 * the engine only through {@link EngineClient}. Request shapes use the
 * engine's wire field names (PascalCase) so an implementation can pass
 * them through untouched; responses are normalized to camelCase.
 *
 * Implementations:
 * - {@link DockerEngine} (Docker Engine API via dockerode)
 * - {@link MockEngine} (in-memory, for tests)
 */

import type { Readable, Writable } from 'node:stream';

// ---------------------------------------------------------------------------
// Call options
// ---------------------------------------------------------------------------

/** Every engine call takes an optional abort signal bounding it. */
export interface EngineCallOptions {
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Container configuration (engine wire shapes)
// ---------------------------------------------------------------------------

export interface HealthConfig {
  Test: string[];
  /** Nanoseconds. */
  Interval?: number;
  Timeout?: number;
  StartPeriod?: number;
  StartInterval?: number;
  Retries?: number;
}

export interface ContainerConfig {
  Image: string;
  Cmd?: string[];
  Entrypoint?: string[];
  Env?: string[];
  WorkingDir?: string;
  User?: string;
  Labels?: Record<string, string>;
  Tty: boolean;
  OpenStdin: boolean;
  StdinOnce: boolean;
  AttachStdin: boolean;
  AttachStdout: boolean;
  AttachStderr: boolean;
  ExposedPorts?: Record<string, Record<string, never>>;
  Healthcheck?: HealthConfig;
}

export interface MountConfig {
  Type: 'bind' | 'volume';
  Source: string;
  Target: string;
  ReadOnly: boolean;
}

export interface PortBinding {
  HostIp: string;
  HostPort: string;
}

export interface DeviceConfig {
  PathOnHost: string;
  PathInContainer: string;
  CgroupPermissions: string;
}

export interface HostConfig {
  Init: boolean;
  Mounts?: MountConfig[];
  PortBindings?: Record<string, PortBinding[]>;
  Memory?: number;
  MemoryReservation?: number;
  MemorySwap?: number;
  NanoCpus?: number;
  CpuShares?: number;
  CpuQuota?: number;
  CpusetCpus?: string;
  ShmSize?: number;
  Privileged?: boolean;
  CapAdd?: string[];
  CapDrop?: string[];
  SecurityOpt?: string[];
  ExtraHosts?: string[];
  Devices?: DeviceConfig[];
  NetworkMode?: string;
}

export interface EndpointConfig {
  Aliases?: string[];
  IPAMConfig?: {
    IPv4Address?: string;
    IPv6Address?: string;
  };
  DriverOpts?: Record<string, string>;
}

export interface NetworkingConfig {
  EndpointsConfig: Record<string, EndpointConfig>;
}

export interface CreateContainerRequest {
  name: string;
  config: ContainerConfig;
  hostConfig: HostConfig;
  networkingConfig?: NetworkingConfig;
}

// ---------------------------------------------------------------------------
// Container state (normalized)
// ---------------------------------------------------------------------------

export type HealthStatus = 'starting' | 'healthy' | 'unhealthy' | 'none';

export interface ContainerStateSnapshot {
  /** Engine status string: created, running, exited, dead, ... */
  status: string;
  running: boolean;
  exitCode: number;
  pid: number;
  oomKilled: boolean;
  /** Engine-reported error, empty when none. */
  error: string;
  startedAt?: string;
  finishedAt?: string;
  /** Absent when the container has no healthcheck. */
  health?: {
    status: HealthStatus;
    failingStreak: number;
  };
}

export interface ContainerInspect {
  id: string;
  name: string;
  state: ContainerStateSnapshot;
}

export interface ContainerSummary {
  id: string;
  names: string[];
  labels: Record<string, string>;
  state: string;
}

export interface NetworkSummary {
  id: string;
  name: string;
  labels: Record<string, string>;
}

/** Result of waiting for a container to stop running. */
export interface WaitResult {
  statusCode: number;
  /** Engine-side wait failure message, when the engine reported one. */
  error?: string;
}

// ---------------------------------------------------------------------------
// Attach
// ---------------------------------------------------------------------------

export interface AttachOptions extends EngineCallOptions {
  stdin: boolean;
  stdout: boolean;
  stderr: boolean;
}

/**
 * A hijacked attach connection.
 *
 * `output` yields the engine's multiplexed stdout/stderr frames.
 * `input` is present only when stdin was requested.
 */
export interface AttachHandle {
  readonly output: Readable;
  readonly input?: Writable;
  /** Half-close: signal EOF on the container's stdin. */
  closeWrite(): void;
  /** Tear down the whole connection. Idempotent. */
  close(): void;
}

// ---------------------------------------------------------------------------
// Resource requests
// ---------------------------------------------------------------------------

export interface ListContainersOptions extends EngineCallOptions {
  /** `key=value` label filters; all must match. */
  labels?: string[];
  all?: boolean;
}

export interface ListNetworksOptions extends EngineCallOptions {
  name?: string;
  labels?: string[];
}

export interface CreateNetworkRequest {
  name: string;
  driver?: string;
  options?: Record<string, string>;
  labels?: Record<string, string>;
}

export interface CreateVolumeRequest {
  name: string;
  driver?: string;
  driverOpts?: Record<string, string>;
  labels?: Record<string, string>;
}

export interface StopOptions extends EngineCallOptions {
  /** Seconds the engine waits before killing. */
  timeoutSeconds?: number;
}

export interface KillOptions extends EngineCallOptions {
  killSignal?: string;
}

export interface RemoveOptions extends EngineCallOptions {
  force?: boolean;
  removeVolumes?: boolean;
}

// ---------------------------------------------------------------------------
// EngineClient
// ---------------------------------------------------------------------------

export interface EngineClient {
  /** Engine name for logs (e.g. `'docker'`, `'mock'`). */
  readonly name: string;

  imageExists(ref: string, options?: EngineCallOptions): Promise<boolean>;
  /** Pull an image, draining the progress stream to completion. */
  pullImage(ref: string, options?: EngineCallOptions): Promise<void>;

  createContainer(request: CreateContainerRequest, options?: EngineCallOptions): Promise<string>;
  attachContainer(id: string, options: AttachOptions): Promise<AttachHandle>;
  startContainer(id: string, options?: EngineCallOptions): Promise<void>;
  /** Resolve when the container is no longer running. */
  waitContainer(id: string, options?: EngineCallOptions): Promise<WaitResult>;
  inspectContainer(id: string, options?: EngineCallOptions): Promise<ContainerInspect>;
  stopContainer(id: string, options?: StopOptions): Promise<void>;
  killContainer(id: string, options?: KillOptions): Promise<void>;
  removeContainer(id: string, options?: RemoveOptions): Promise<void>;
  listContainers(options?: ListContainersOptions): Promise<ContainerSummary[]>;

  listNetworks(options?: ListNetworksOptions): Promise<NetworkSummary[]>;
  createNetwork(request: CreateNetworkRequest, options?: EngineCallOptions): Promise<string>;
  removeNetwork(idOrName: string, options?: EngineCallOptions): Promise<void>;

  createVolume(request: CreateVolumeRequest, options?: EngineCallOptions): Promise<void>;

  /** Release the connection. Calls after close reject. */
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Engine errors
// ---------------------------------------------------------------------------

/** An engine API failure carrying the HTTP status the engine answered with. */
export class EngineError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'EngineError';
    this.statusCode = statusCode;
  }
}

function errorFields(error: unknown): { statusCode?: unknown; message: string } {
  if (typeof error !== 'object' || error === null) {
    return { message: typeof error === 'string' ? error : '' };
  }
  const statusCode = 'statusCode' in error ? error.statusCode : undefined;
  const reason = 'reason' in error && typeof error.reason === 'string' ? error.reason : '';
  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return { statusCode, message: `${reason} ${message}`.toLowerCase() };
}

export function isNotFoundError(error: unknown): boolean {
  const { statusCode, message } = errorFields(error);
  if (statusCode === 404) return true;
  return message.includes('no such') || message.includes('not found');
}

export function isAlreadyExistsError(error: unknown): boolean {
  const { statusCode, message } = errorFields(error);
  if (statusCode === 409) return true;
  return message.includes('already exists');
}

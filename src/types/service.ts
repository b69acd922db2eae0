/**
 * Resolved service and project shapes consumed by the command lifecycle.
 *
 * These are the normalized forms produced by the project loader: all
 * durations are milliseconds, all sizes are bytes, and every list-or-map
 * field of the document has been flattened into one representation.
 */

// ---------------------------------------------------------------------------
// Service fields
// ---------------------------------------------------------------------------

export interface PortMapping {
  /** Container-side port. */
  target: number;
  /** Host port (or range) to publish on; unset means expose only. */
  published?: string;
  /** `tcp` when unset. */
  protocol?: string;
  hostIp?: string;
}

/** `bind`, `volume`, or any other type (rejected at start). */
export type VolumeType = 'bind' | 'volume' | (string & {});

export interface VolumeMount {
  type: VolumeType;
  source?: string;
  target: string;
  readOnly?: boolean;
}

export interface ServiceNetworkAttachment {
  aliases?: string[];
  ipv4Address?: string;
  ipv6Address?: string;
  driverOpts?: Record<string, string>;
}

export interface HealthcheckDefinition {
  test?: string[];
  intervalMs?: number;
  timeoutMs?: number;
  startPeriodMs?: number;
  startIntervalMs?: number;
  retries?: number;
  disable?: boolean;
}

export interface DeviceMapping {
  source: string;
  target?: string;
  permissions?: string;
}

export interface BuildDefinition {
  context?: string;
  dockerfile?: string;
}

// ---------------------------------------------------------------------------
// ServiceDescriptor
// ---------------------------------------------------------------------------

export interface ServiceDescriptor {
  name: string;
  image?: string;
  /** Present when the document asks for a build; builds are not supported. */
  build?: BuildDefinition;
  command?: string[];
  entrypoint?: string[];
  /** `null` declares the key without a value (`KEY` form). */
  environment?: Record<string, string | null>;
  ports?: PortMapping[];
  volumes?: VolumeMount[];
  /** Network key → attachment options, `null` for a bare listing. */
  networks?: Record<string, ServiceNetworkAttachment | null>;
  healthcheck?: HealthcheckDefinition;

  memLimit?: number;
  memReservation?: number;
  memSwapLimit?: number;
  /** Fractional CPUs, e.g. `1.5`. */
  cpus?: number;
  cpuShares?: number;
  cpuQuota?: number;
  cpuset?: string;
  shmSize?: number;

  privileged?: boolean;
  capAdd?: string[];
  capDrop?: string[];
  securityOpt?: string[];
  /** `host:ip` entries. */
  extraHosts?: string[];
  devices?: DeviceMapping[];

  workingDir?: string;
  user?: string;
  /** Run an init process as PID 1; defaults to true. */
  init?: boolean;
  labels?: Record<string, string>;
  networkMode?: string;
}

// ---------------------------------------------------------------------------
// ProjectContext
// ---------------------------------------------------------------------------

/** A top-level `volumes:` or `networks:` entry. */
export interface ResourceDeclaration {
  name?: string;
  external?: boolean;
  driver?: string;
  driverOpts?: Record<string, string>;
  labels?: Record<string, string>;
}

export interface ProjectContext {
  /** Sanitized project name; empty disables networking and name qualification. */
  name: string;
  /** Directory relative bind sources and security profiles resolve against. */
  workingDir: string;
  volumes?: Record<string, ResourceDeclaration>;
  networks?: Record<string, ResourceDeclaration>;
}

// ---------------------------------------------------------------------------
// Labels
// ---------------------------------------------------------------------------

export const LABEL_PROJECT = 'com.docker.compose.project';
export const LABEL_SERVICE = 'com.docker.compose.service';
export const LABEL_NETWORK = 'com.docker.compose.network';
export const LABEL_VOLUME = 'com.docker.compose.volume';

/**
 * Container configuration builder.
 *
 * Turns a resolved service plus per-invocation overrides into the
 * engine's container and host configuration.
 */

import { readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import type {
  ContainerConfig,
  DeviceConfig,
  HealthConfig,
  HostConfig,
  MountConfig,
  PortBinding,
} from './engine/engine.js';
import type {
  DeviceMapping,
  HealthcheckDefinition,
  PortMapping,
  ProjectContext,
  ServiceDescriptor,
} from '../types/service.js';
import { LABEL_PROJECT, LABEL_SERVICE } from '../types/service.js';
import { ErrorCode } from '../types/errors.js';
import { ComposeError } from './compose-error.js';
import { mergeEnv, serviceEnv } from './env.js';

const NS_PER_MS = 1_000_000;

export interface ContainerConfigInput {
  service: ServiceDescriptor;
  project: ProjectContext;
  /** Explicit command arguments; empty falls back to the service command. */
  args: readonly string[];
  /** Per-invocation environment overrides. */
  env: readonly string[];
  workingDir?: string;
  /** Whether caller stdin will be attached. */
  stdin: boolean;
  mounts: MountConfig[];
  /** Reads security profiles; defaults to the filesystem. */
  readFile?: (path: string) => string;
}

export interface ContainerConfigs {
  config: ContainerConfig;
  hostConfig: HostConfig;
}

// ---------------------------------------------------------------------------
// buildContainerConfig
// ---------------------------------------------------------------------------

export function buildContainerConfig(input: ContainerConfigInput): ContainerConfigs {
  const { service, project } = input;

  const config: ContainerConfig = {
    Image: service.image ?? '',
    Tty: false,
    OpenStdin: input.stdin,
    StdinOnce: input.stdin,
    AttachStdin: input.stdin,
    AttachStdout: true,
    AttachStderr: true,
  };

  const workingDir = input.workingDir || service.workingDir;
  if (workingDir) config.WorkingDir = workingDir;

  const env = mergeEnv(serviceEnv(service), input.env);
  if (env.length > 0) config.Env = env;

  const labels = serviceLabels(service, project);
  if (labels) config.Labels = labels;

  const cmd = resolveCommand(input.args, service);
  if (cmd.length > 0) config.Cmd = cmd;
  if (service.entrypoint && service.entrypoint.length > 0) {
    config.Entrypoint = [...service.entrypoint];
  }

  const user = service.user?.trim();
  if (user) config.User = user;

  if (service.healthcheck) config.Healthcheck = healthConfig(service.healthcheck);

  const { exposed, bindings } = portConfig(service.ports ?? []);
  if (exposed) config.ExposedPorts = exposed;

  const hostConfig: HostConfig = { Init: service.init ?? true };
  if (input.mounts.length > 0) hostConfig.Mounts = input.mounts;
  if (bindings) hostConfig.PortBindings = bindings;

  applyResources(hostConfig, service);
  applySecurity(hostConfig, service, project.workingDir, input.readFile ?? readProfile);

  const networkMode = service.networkMode?.trim();
  if (networkMode) hostConfig.NetworkMode = networkMode;

  return { config, hostConfig };
}

/** Explicit args, else the service's command, else nothing (image default). */
export function resolveCommand(
  args: readonly string[],
  service: Pick<ServiceDescriptor, 'command'>,
): string[] {
  if (args.length > 0) return [...args];
  return [...(service.command ?? [])];
}

// ---------------------------------------------------------------------------
// Pieces
// ---------------------------------------------------------------------------

function serviceLabels(
  service: ServiceDescriptor,
  project: ProjectContext,
): Record<string, string> | undefined {
  const labels: Record<string, string> = { ...service.labels };
  const projectName = project.name.trim();
  if (projectName) labels[LABEL_PROJECT] = projectName;
  const serviceName = service.name.trim();
  if (serviceName) labels[LABEL_SERVICE] = serviceName;
  return Object.keys(labels).length > 0 ? labels : undefined;
}

export function healthConfig(hc: HealthcheckDefinition): HealthConfig {
  if (hc.disable) {
    return { Test: ['NONE'] };
  }
  const out: HealthConfig = { Test: [...(hc.test ?? [])] };
  if (hc.intervalMs !== undefined) out.Interval = hc.intervalMs * NS_PER_MS;
  if (hc.timeoutMs !== undefined) out.Timeout = hc.timeoutMs * NS_PER_MS;
  if (hc.startPeriodMs !== undefined) out.StartPeriod = hc.startPeriodMs * NS_PER_MS;
  if (hc.startIntervalMs !== undefined) out.StartInterval = hc.startIntervalMs * NS_PER_MS;
  if (hc.retries !== undefined) out.Retries = Math.min(hc.retries, Number.MAX_SAFE_INTEGER);
  return out;
}

function portConfig(ports: readonly PortMapping[]): {
  exposed?: Record<string, Record<string, never>>;
  bindings?: Record<string, PortBinding[]>;
} {
  if (ports.length === 0) return {};
  const exposed: Record<string, Record<string, never>> = {};
  const bindings: Record<string, PortBinding[]> = {};

  for (const port of ports) {
    const key = `${port.target}/${port.protocol || 'tcp'}`;
    exposed[key] = {};
    if (port.published) {
      const list = bindings[key] ?? [];
      list.push({ HostIp: port.hostIp ?? '', HostPort: port.published });
      bindings[key] = list;
    }
  }
  return Object.keys(bindings).length > 0 ? { exposed, bindings } : { exposed };
}

function applyResources(host: HostConfig, service: ServiceDescriptor): void {
  if (service.memLimit && service.memLimit > 0) host.Memory = service.memLimit;
  if (service.memReservation && service.memReservation > 0) {
    host.MemoryReservation = service.memReservation;
  }
  if (service.memSwapLimit && service.memSwapLimit > 0) host.MemorySwap = service.memSwapLimit;
  if (service.cpus && service.cpus > 0) host.NanoCpus = Math.round(service.cpus * 1e9);
  if (service.cpuShares && service.cpuShares > 0) host.CpuShares = service.cpuShares;
  if (service.cpuQuota && service.cpuQuota > 0) host.CpuQuota = service.cpuQuota;
  const cpuset = service.cpuset?.trim();
  if (cpuset) host.CpusetCpus = cpuset;
  if (service.shmSize && service.shmSize > 0) host.ShmSize = service.shmSize;
  if (service.extraHosts && service.extraHosts.length > 0) host.ExtraHosts = [...service.extraHosts];
  if (service.devices && service.devices.length > 0) host.Devices = service.devices.map(deviceConfig);
}

function deviceConfig(device: DeviceMapping): DeviceConfig {
  return {
    PathOnHost: device.source,
    PathInContainer: device.target || device.source,
    CgroupPermissions: device.permissions || 'rwm',
  };
}

function applySecurity(
  host: HostConfig,
  service: ServiceDescriptor,
  baseDir: string,
  readFile: (path: string) => string,
): void {
  if (service.privileged) host.Privileged = true;
  if (service.capAdd && service.capAdd.length > 0) host.CapAdd = [...service.capAdd];
  if (service.capDrop && service.capDrop.length > 0) host.CapDrop = [...service.capDrop];
  if (service.securityOpt && service.securityOpt.length > 0) {
    host.SecurityOpt = service.securityOpt.map((opt) => resolveSecurityOpt(opt, baseDir, readFile));
  }
}

// ---------------------------------------------------------------------------
// Security options
// ---------------------------------------------------------------------------

function readProfile(path: string): string {
  return readFileSync(path, 'utf-8');
}

/**
 * Inline seccomp profiles given as file paths. `unconfined` and inline
 * JSON pass through; every other option is returned unchanged.
 */
export function resolveSecurityOpt(
  opt: string,
  baseDir: string,
  readFile: (path: string) => string = readProfile,
): string {
  const trimmed = opt.trim();
  let prefix: string;
  if (trimmed.startsWith('seccomp:')) {
    prefix = 'seccomp:';
  } else if (trimmed.startsWith('seccomp=')) {
    prefix = 'seccomp=';
  } else {
    return opt;
  }

  const value = trimmed.slice(prefix.length).trim();
  if (value === '') return trimmed;
  if (value.toLowerCase() === 'unconfined' || value.startsWith('{')) {
    return `seccomp=${value}`;
  }

  const profilePath = baseDir && !isAbsolute(value) ? resolve(baseDir, value) : value;
  try {
    return `seccomp=${readFile(profilePath)}`;
  } catch (err) {
    throw new ComposeError({
      code: ErrorCode.SECURITY_OPT_INVALID,
      message: `read seccomp profile "${profilePath}": ${err instanceof Error ? err.message : String(err)}`,
      cause: err,
    });
  }
}

/**
 * Compose project loading.
 *
 * Reads the project's Compose files with `yaml`, interpolates variables
 * from `.env` and the process environment, merges later files into
 * earlier ones, validates the result against COMPOSE_JSON_SCHEMA with
 * ajv, and normalizes it into ServiceDescriptors and a ProjectContext.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { parse as parseYaml } from 'yaml';
import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, isAbsolute, join, resolve } from 'node:path';
import { COMPOSE_JSON_SCHEMA } from '../types/compose-schema.js';
import type {
  RawComposeFile,
  RawDevice,
  RawHealthcheck,
  RawListOrDict,
  RawPort,
  RawResource,
  RawService,
  RawVolume,
} from '../types/compose-schema.js';
import type {
  DeviceMapping,
  HealthcheckDefinition,
  PortMapping,
  ProjectContext,
  ResourceDeclaration,
  ServiceDescriptor,
  ServiceNetworkAttachment,
  VolumeMount,
} from '../types/service.js';
import { ErrorCode } from '../types/errors.js';
import { ComposeError } from './compose-error.js';
import { splitEnvEntry } from './env.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A loaded project: the context commands resolve names against, plus its services. */
export interface ComposeProject extends ProjectContext {
  services: Record<string, ServiceDescriptor>;
  /** Absolute paths of the files that were read, in merge order. */
  composeFiles: string[];
}

export interface LoadProjectOptions {
  /** Variables for interpolation; `.env` entries fill in what this lacks. */
  env?: NodeJS.ProcessEnv;
}

const BASE_FILE_NAMES = ['docker-compose.yml', 'docker-compose.yaml', 'compose.yml', 'compose.yaml'];
const OVERRIDE_FILE_NAMES = [
  'docker-compose.override.yml',
  'docker-compose.override.yaml',
  'compose.override.yml',
  'compose.override.yaml',
];

function invalid(message: string, cause?: unknown): ComposeError {
  return new ComposeError({
    code: ErrorCode.PROJECT_INVALID,
    message,
    ...(cause !== undefined ? { cause } : {}),
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// loadProject()
// ---------------------------------------------------------------------------

/**
 * Load a Compose project from `dir`.
 *
 * With no `files`, the first of `docker-compose.yml`, `docker-compose.yaml`,
 * `compose.yml`, `compose.yaml` is read, followed by a matching override
 * file when one exists. Relative `files` resolve against `dir`.
 *
 * @throws ComposeError `PROJECT_INVALID` for a missing, unreadable,
 *   malformed or out-of-schema document.
 */
export function loadProject(
  dir: string,
  files: readonly string[] = [],
  options: LoadProjectOptions = {},
): ComposeProject {
  if (dir.trim() === '') {
    throw invalid('project directory is required');
  }
  const workingDir = resolve(dir);
  const composeFiles = defaultComposeFiles(workingDir, files);
  if (composeFiles.length === 0) {
    throw invalid(`no compose file found in ${workingDir}`);
  }

  const vars = interpolationVars(workingDir, options.env ?? process.env);
  let merged: Record<string, unknown> = {};
  for (const file of composeFiles) {
    merged = mergeDocuments(merged, interpolate(readDocument(file), vars, file));
  }
  if (merged['services'] === null || merged['services'] === undefined) {
    merged['services'] = {};
  }

  const validate = composeValidator();
  if (!validate(merged)) {
    const errors =
      validate.errors
        ?.map((e: ErrorObject) => `${e.instancePath || '/'} ${e.message ?? ''}`)
        .join('; ') ?? '';
    throw invalid(`invalid compose file: ${errors}`);
  }

  return normalizeProject(merged, workingDir, composeFiles);
}

/** Compose files to read from `dir`, in merge order. */
export function defaultComposeFiles(dir: string, files: readonly string[] = []): string[] {
  if (files.length > 0) {
    return files.map((f) => (isAbsolute(f) ? f : join(dir, f)));
  }
  const base = BASE_FILE_NAMES.map((name) => join(dir, name)).find((path) => existsSync(path));
  if (base === undefined) {
    return [];
  }
  const override = OVERRIDE_FILE_NAMES.map((name) => join(dir, name)).find((path) =>
    existsSync(path),
  );
  return override === undefined ? [base] : [base, override];
}

let validator: ValidateFunction<RawComposeFile> | undefined;

function composeValidator(): ValidateFunction<RawComposeFile> {
  if (validator === undefined) {
    const ajv = new Ajv({ allErrors: true, strict: false });
    validator = ajv.compile<RawComposeFile>(COMPOSE_JSON_SCHEMA);
  }
  return validator;
}

function readDocument(file: string): Record<string, unknown> {
  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (err) {
    throw invalid(`cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  let doc: unknown;
  try {
    doc = parseYaml(content);
  } catch (err) {
    throw invalid(`${file}: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  if (doc === null || doc === undefined) {
    return {};
  }
  if (!isRecord(doc)) {
    throw invalid(`${file}: top level must be a mapping`);
  }
  return doc;
}

// ---------------------------------------------------------------------------
// Merging
// ---------------------------------------------------------------------------

/**
 * Merge `next` over `base`. Services, volumes and networks merge per key;
 * inside a service, mapping fields merge and any other field is replaced.
 */
export function mergeDocuments(
  base: Record<string, unknown>,
  next: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const current = out[key];
    if (key === 'services' && isRecord(current) && isRecord(value)) {
      const services: Record<string, unknown> = { ...current };
      for (const [name, service] of Object.entries(value)) {
        const existing = services[name];
        services[name] =
          isRecord(existing) && isRecord(service) ? mergeService(existing, service) : service;
      }
      out[key] = services;
    } else if ((key === 'volumes' || key === 'networks') && isRecord(current) && isRecord(value)) {
      out[key] = { ...current, ...value };
    } else {
      out[key] = value;
    }
  }
  return out;
}

function mergeService(
  base: Record<string, unknown>,
  next: Record<string, unknown>,
): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? { ...current, ...value } : value;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Interpolation
// ---------------------------------------------------------------------------

/** Parse a `.env` file body: `KEY=VALUE` lines, `#` comments, optional quotes and `export`. */
export function parseDotEnv(content: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of content.split(/\r?\n/)) {
    let line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;
    if (line.startsWith('export ')) line = line.slice('export '.length).trim();

    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();

    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
      value = value.slice(1, -1);
      if (quote === '"') value = value.replace(/\\n/g, '\n').replace(/\\(["\\])/g, '$1');
    } else {
      const comment = value.search(/\s#/);
      if (comment >= 0) value = value.slice(0, comment).trimEnd();
    }
    out[key] = value;
  }
  return out;
}

function interpolationVars(dir: string, env: NodeJS.ProcessEnv): Record<string, string> {
  const vars: Record<string, string> = {};
  const dotEnvPath = join(dir, '.env');
  if (existsSync(dotEnvPath)) {
    Object.assign(vars, parseDotEnv(readFileSync(dotEnvPath, 'utf-8')));
  }
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) vars[key] = value;
  }
  return vars;
}

const VARIABLE_PATTERN =
  /\$(?:(\$)|\{([A-Za-z_][A-Za-z0-9_]*)(?:(:?[-?+])([^}]*))?\}|([A-Za-z_][A-Za-z0-9_]*)|(\{))/g;

/**
 * Substitute `$VAR`, `${VAR}`, `${VAR:-default}`, `${VAR-default}`,
 * `${VAR:?message}`, `${VAR?message}`, `${VAR:+alt}`, `${VAR+alt}` and
 * `$$` in one string. Unset variables become empty.
 */
export function interpolateString(
  value: string,
  vars: Readonly<Record<string, string>>,
  where = 'compose file',
): string {
  return value.replace(
    VARIABLE_PATTERN,
    (
      match: string,
      dollar: string | undefined,
      braced: string | undefined,
      op: string | undefined,
      arg: string | undefined,
      bare: string | undefined,
      badBrace: string | undefined,
    ) => {
      if (dollar !== undefined) return '$';
      if (badBrace !== undefined) {
        throw invalid(`${where}: invalid interpolation format in "${value}"`);
      }
      const name = braced ?? bare ?? '';
      const current = vars[name];
      const set = current !== undefined;
      const nonEmpty = set && current !== '';
      switch (op) {
        case undefined:
          return current ?? '';
        case ':-':
          return nonEmpty ? (current ?? '') : (arg ?? '');
        case '-':
          return set ? (current ?? '') : (arg ?? '');
        case ':?':
        case '?':
          if (op === ':?' ? nonEmpty : set) return current ?? '';
          throw invalid(
            `${where}: required variable ${name} is missing a value${arg ? `: ${arg}` : ''}`,
          );
        case ':+':
          return nonEmpty ? (arg ?? '') : '';
        case '+':
          return set ? (arg ?? '') : '';
        default:
          return match;
      }
    },
  );
}

function interpolate(
  value: unknown,
  vars: Readonly<Record<string, string>>,
  where: string,
): Record<string, unknown> {
  const out = interpolateValue(value, vars, where);
  return isRecord(out) ? out : {};
}

function interpolateValue(
  value: unknown,
  vars: Readonly<Record<string, string>>,
  where: string,
): unknown {
  if (typeof value === 'string') return interpolateString(value, vars, where);
  if (Array.isArray(value)) return value.map((item: unknown) => interpolateValue(item, vars, where));
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = interpolateValue(item, vars, where);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/** Compose project name rules: lowercase, `[a-z0-9_-]`, starting with a letter or digit. */
export function normalizeProjectName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, '')
    .replace(/^[^a-z0-9]+/, '');
}

function normalizeProject(
  doc: RawComposeFile,
  workingDir: string,
  composeFiles: string[],
): ComposeProject {
  const declaredName = doc.name?.trim() ?? '';
  const name = normalizeProjectName(declaredName !== '' ? declaredName : basename(workingDir));
  if (name === '') {
    throw invalid(`project name derived from "${declaredName || basename(workingDir)}" is empty`);
  }

  const services: Record<string, ServiceDescriptor> = {};
  for (const [serviceName, raw] of Object.entries(doc.services)) {
    services[serviceName] = normalizeService(serviceName, raw);
  }

  const project: ComposeProject = { name, workingDir, services, composeFiles };
  if (doc.volumes) project.volumes = normalizeResources(doc.volumes);
  if (doc.networks) project.networks = normalizeResources(doc.networks);
  return project;
}

function normalizeResources(
  raw: Record<string, RawResource | null>,
): Record<string, ResourceDeclaration> {
  const out: Record<string, ResourceDeclaration> = {};
  for (const [key, value] of Object.entries(raw)) {
    const decl: ResourceDeclaration = {};
    if (value?.name !== undefined) decl.name = value.name;
    if (value?.external !== undefined) decl.external = value.external;
    if (value?.driver !== undefined) decl.driver = value.driver;
    if (value?.driver_opts !== undefined) decl.driverOpts = stringValues(value.driver_opts);
    if (value?.labels !== undefined) decl.labels = labelMap(value.labels);
    out[key] = decl;
  }
  return out;
}

/**
 * Normalize one service entry.
 *
 * @throws ComposeError `PROJECT_INVALID` for an unparsable duration, size,
 *   port or command string.
 */
export function normalizeService(name: string, raw: RawService): ServiceDescriptor {
  const where = `service "${name}"`;
  const service: ServiceDescriptor = { name };

  if (raw.image !== undefined) service.image = raw.image;
  if (raw.build !== undefined) {
    service.build =
      typeof raw.build === 'string'
        ? { context: raw.build }
        : {
            ...(raw.build.context !== undefined ? { context: raw.build.context } : {}),
            ...(raw.build.dockerfile !== undefined ? { dockerfile: raw.build.dockerfile } : {}),
          };
  }
  if (raw.command !== undefined && raw.command !== null) {
    service.command = commandList(raw.command, `${where} command`);
  }
  if (raw.entrypoint !== undefined && raw.entrypoint !== null) {
    service.entrypoint = commandList(raw.entrypoint, `${where} entrypoint`);
  }
  if (raw.environment !== undefined) service.environment = environmentMap(raw.environment);
  if (raw.ports !== undefined) service.ports = raw.ports.flatMap((p) => normalizePort(p, where));
  if (raw.volumes !== undefined) service.volumes = raw.volumes.map((v) => normalizeVolume(v, where));
  if (raw.networks !== undefined) service.networks = normalizeServiceNetworks(raw.networks);
  if (raw.healthcheck !== undefined) {
    service.healthcheck = normalizeHealthcheck(raw.healthcheck, `${where} healthcheck`);
  }

  if (raw.mem_limit !== undefined) service.memLimit = parseByteSize(raw.mem_limit, `${where} mem_limit`);
  if (raw.mem_reservation !== undefined) {
    service.memReservation = parseByteSize(raw.mem_reservation, `${where} mem_reservation`);
  }
  if (raw.memswap_limit !== undefined) {
    service.memSwapLimit = parseByteSize(raw.memswap_limit, `${where} memswap_limit`);
  }
  if (raw.cpus !== undefined) service.cpus = parseCpus(raw.cpus, `${where} cpus`);
  if (raw.cpu_shares !== undefined) service.cpuShares = raw.cpu_shares;
  if (raw.cpu_quota !== undefined) service.cpuQuota = raw.cpu_quota;
  if (raw.cpuset !== undefined) service.cpuset = raw.cpuset;
  if (raw.shm_size !== undefined) service.shmSize = parseByteSize(raw.shm_size, `${where} shm_size`);

  if (raw.privileged !== undefined) service.privileged = raw.privileged;
  if (raw.cap_add !== undefined) service.capAdd = [...raw.cap_add];
  if (raw.cap_drop !== undefined) service.capDrop = [...raw.cap_drop];
  if (raw.security_opt !== undefined) service.securityOpt = [...raw.security_opt];
  if (raw.extra_hosts !== undefined) service.extraHosts = extraHostList(raw.extra_hosts);
  if (raw.devices !== undefined) service.devices = raw.devices.map(normalizeDevice);

  if (raw.working_dir !== undefined) service.workingDir = raw.working_dir;
  if (raw.user !== undefined) service.user = raw.user;
  if (raw.init !== undefined) service.init = raw.init;
  if (raw.labels !== undefined) service.labels = labelMap(raw.labels);
  if (raw.network_mode !== undefined) service.networkMode = raw.network_mode;

  return service;
}

function stringValues(raw: Record<string, string | number | boolean>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) out[key] = String(value);
  return out;
}

/** `KEY=VALUE` / `KEY` list or map → map, `null` for key-only entries. */
export function environmentMap(raw: RawListOrDict): Record<string, string | null> {
  const out: Record<string, string | null> = {};
  if (Array.isArray(raw)) {
    for (const entry of raw) {
      const { key, value } = splitEnvEntry(entry);
      if (key !== '') out[key] = value ?? null;
    }
    return out;
  }
  for (const [key, value] of Object.entries(raw)) {
    out[key] = value === null ? null : String(value);
  }
  return out;
}

function labelMap(raw: RawListOrDict): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(environmentMap(raw))) out[key] = value ?? '';
  return out;
}

/** `host:ip` / `host=ip` list or `{ host: ip }` map → `host:ip` list. */
export function extraHostList(raw: RawListOrDict): string[] {
  if (Array.isArray(raw)) {
    return raw.map((entry) => {
      const eq = entry.indexOf('=');
      return eq > 0 ? `${entry.slice(0, eq)}:${entry.slice(eq + 1)}` : entry;
    });
  }
  return Object.entries(raw).map(([host, ip]) => `${host}:${ip === null ? '' : String(ip)}`);
}

function commandList(raw: string | string[], where: string): string[] {
  return typeof raw === 'string' ? splitShellWords(raw, where) : [...raw];
}

/**
 * Split a command string into words the way a POSIX shell would, without
 * expansion: whitespace separates, quotes group, backslash escapes.
 */
export function splitShellWords(input: string, where = 'command'): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | undefined;

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i);
    if (quote === "'") {
      if (ch === "'") quote = undefined;
      else current += ch;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') {
        quote = undefined;
      } else if (ch === '\\' && i + 1 < input.length && '"\\$`'.includes(input.charAt(i + 1))) {
        current += input.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\') {
      if (i + 1 < input.length) current += input.charAt(++i);
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) words.push(current);
      current = '';
      inWord = false;
    } else {
      current += ch;
      inWord = true;
    }
  }
  if (quote !== undefined) {
    throw invalid(`${where}: unterminated quote in "${input}"`);
  }
  if (inWord) words.push(current);
  return words;
}

// ---------------------------------------------------------------------------
// Ports
// ---------------------------------------------------------------------------

function parsePortNumber(value: string, where: string): number {
  const port = Number(value);
  if (value === '' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw invalid(`${where}: invalid port "${value}"`);
  }
  return port;
}

function parseRange(value: string, where: string): [number, number] {
  const [start, end] = value.split('-');
  const first = parsePortNumber(start ?? '', where);
  const last = end === undefined ? first : parsePortNumber(end, where);
  if (last < first) {
    throw invalid(`${where}: invalid port range "${value}"`);
  }
  return [first, last];
}

/**
 * Normalize one port entry. Short syntax is
 * `[[host_ip:]published:]target[/protocol]`; a target range expands to
 * one mapping per port.
 */
export function normalizePort(raw: RawPort, where = 'port'): PortMapping[] {
  if (typeof raw === 'number') {
    return [{ target: parsePortNumber(String(raw), where) }];
  }
  if (typeof raw !== 'string') {
    const mapping: PortMapping = { target: parsePortNumber(String(raw.target), where) };
    if (raw.published !== undefined && String(raw.published) !== '') {
      mapping.published = String(raw.published);
    }
    if (raw.protocol !== undefined) mapping.protocol = raw.protocol;
    if (raw.host_ip !== undefined) mapping.hostIp = raw.host_ip;
    return [mapping];
  }

  let spec = raw.trim();
  let protocol: string | undefined;
  const slash = spec.lastIndexOf('/');
  if (slash >= 0) {
    protocol = spec.slice(slash + 1);
    spec = spec.slice(0, slash);
  }

  let hostIp: string | undefined;
  let published: string | undefined;
  let target: string;
  const lastColon = spec.lastIndexOf(':');
  if (lastColon < 0) {
    target = spec;
  } else {
    target = spec.slice(lastColon + 1);
    const head = spec.slice(0, lastColon);
    const ipEnd = head.lastIndexOf(':');
    if (ipEnd < 0) {
      published = head;
    } else {
      hostIp = head.slice(0, ipEnd).replace(/^\[|\]$/g, '');
      published = head.slice(ipEnd + 1);
    }
  }

  const [first, last] = parseRange(target, `${where} "${raw}"`);
  let publishedRange: [number, number] | undefined;
  if (published !== undefined && published !== '' && first !== last) {
    publishedRange = parseRange(published, `${where} "${raw}"`);
    if (publishedRange[1] - publishedRange[0] !== last - first) {
      throw invalid(`${where}: port ranges don't match in "${raw}"`);
    }
  }

  const mappings: PortMapping[] = [];
  for (let port = first; port <= last; port++) {
    const mapping: PortMapping = { target: port };
    if (publishedRange !== undefined) {
      mapping.published = String(publishedRange[0] + (port - first));
    } else if (published !== undefined && published !== '') {
      mapping.published = published;
    }
    if (protocol !== undefined && protocol !== '') mapping.protocol = protocol;
    if (hostIp !== undefined && hostIp !== '') mapping.hostIp = hostIp;
    mappings.push(mapping);
  }
  return mappings;
}

// ---------------------------------------------------------------------------
// Volumes, devices, networks
// ---------------------------------------------------------------------------

function expandHome(path: string): string {
  if (path === '~') return homedir();
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;
}

/**
 * Normalize one volume entry. Short syntax is `[source:]target[:mode]`;
 * sources starting with `/`, `.` or `~` are bind mounts, anything else
 * names a volume, and a lone target is an anonymous volume.
 */
export function normalizeVolume(raw: RawVolume, where = 'volume'): VolumeMount {
  if (typeof raw !== 'string') {
    const mount: VolumeMount = { type: raw.type ?? 'volume', target: raw.target };
    if (raw.source !== undefined) {
      mount.source = mount.type === 'bind' ? expandHome(raw.source) : raw.source;
    }
    if (raw.read_only !== undefined) mount.readOnly = raw.read_only;
    return mount;
  }

  const parts = raw.split(':');
  if (parts.length === 1) {
    return { type: 'volume', target: raw };
  }
  if (parts.length > 3) {
    throw invalid(`${where}: invalid volume "${raw}"`);
  }
  const [source = '', target = '', mode = ''] = parts;
  if (target === '') {
    throw invalid(`${where}: invalid volume "${raw}"`);
  }
  const isPath = source.startsWith('/') || source.startsWith('.') || source.startsWith('~');
  const mount: VolumeMount = {
    type: isPath ? 'bind' : 'volume',
    source: isPath ? expandHome(source) : source,
    target,
  };
  if (mode.split(',').includes('ro')) mount.readOnly = true;
  return mount;
}

/** `source[:target[:permissions]]` or the long form. */
export function normalizeDevice(raw: RawDevice): DeviceMapping {
  if (typeof raw !== 'string') {
    return { ...raw };
  }
  const [source = '', target, permissions] = raw.split(':');
  const device: DeviceMapping = { source };
  if (target !== undefined && target !== '') device.target = target;
  if (permissions !== undefined && permissions !== '') device.permissions = permissions;
  return device;
}

function normalizeServiceNetworks(
  raw: NonNullable<RawService['networks']>,
): Record<string, ServiceNetworkAttachment | null> {
  const out: Record<string, ServiceNetworkAttachment | null> = {};
  if (Array.isArray(raw)) {
    for (const key of raw) out[key] = null;
    return out;
  }
  for (const [key, value] of Object.entries(raw)) {
    if (value === null) {
      out[key] = null;
      continue;
    }
    const attachment: ServiceNetworkAttachment = {};
    if (value.aliases !== undefined) attachment.aliases = [...value.aliases];
    if (value.ipv4_address !== undefined) attachment.ipv4Address = value.ipv4_address;
    if (value.ipv6_address !== undefined) attachment.ipv6Address = value.ipv6_address;
    if (value.driver_opts !== undefined) attachment.driverOpts = stringValues(value.driver_opts);
    out[key] = attachment;
  }
  return out;
}

function normalizeHealthcheck(raw: RawHealthcheck, where: string): HealthcheckDefinition {
  const hc: HealthcheckDefinition = {};
  if (raw.test !== undefined) {
    hc.test = typeof raw.test === 'string' ? ['CMD-SHELL', raw.test] : [...raw.test];
  }
  if (raw.interval !== undefined) hc.intervalMs = parseDuration(raw.interval, `${where} interval`);
  if (raw.timeout !== undefined) hc.timeoutMs = parseDuration(raw.timeout, `${where} timeout`);
  if (raw.start_period !== undefined) {
    hc.startPeriodMs = parseDuration(raw.start_period, `${where} start_period`);
  }
  if (raw.start_interval !== undefined) {
    hc.startIntervalMs = parseDuration(raw.start_interval, `${where} start_interval`);
  }
  if (raw.retries !== undefined) hc.retries = raw.retries;
  if (raw.disable !== undefined) hc.disable = raw.disable;
  return hc;
}

// ---------------------------------------------------------------------------
// Durations, sizes, CPUs
// ---------------------------------------------------------------------------

const DURATION_UNITS_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** `1m30s`, `500ms`, `2h` → milliseconds. A bare number counts seconds. */
export function parseDuration(raw: string | number, where = 'duration'): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw < 0) throw invalid(`${where}: invalid duration ${raw}`);
    return Math.round(raw * 1000);
  }
  const text = raw.trim();
  if (/^\d+(\.\d+)?$/.test(text)) {
    return Math.round(Number(text) * 1000);
  }
  const part = /(\d+(?:\.\d+)?)(ns|us|µs|ms|s|m|h)/gy;
  let total = 0;
  let consumed = 0;
  for (let match = part.exec(text); match !== null; match = part.exec(text)) {
    total += Number(match[1]) * (DURATION_UNITS_MS[match[2] ?? ''] ?? 0);
    consumed = part.lastIndex;
  }
  if (text === '' || consumed !== text.length) {
    throw invalid(`${where}: invalid duration "${raw}"`);
  }
  return Math.round(total);
}

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
  t: 1024 ** 4,
  p: 1024 ** 5,
};

/** `512m`, `1.5g`, `64kb`, `1024` → bytes (binary multiples). */
export function parseByteSize(raw: string | number, where = 'size'): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw < 0) throw invalid(`${where}: invalid size ${raw}`);
    return Math.round(raw);
  }
  const match = /^(\d+(?:\.\d+)?)\s*([kmgtp]?)(?:i?b)?$/i.exec(raw.trim());
  if (match === null) {
    throw invalid(`${where}: invalid size "${raw}"`);
  }
  const unit = (match[2] ?? '').toLowerCase();
  return Math.round(Number(match[1]) * (SIZE_UNITS[unit] ?? 1));
}

function parseCpus(raw: number | string, where: string): number {
  const cpus = typeof raw === 'number' ? raw : Number(raw.trim());
  if (!Number.isFinite(cpus) || cpus < 0) {
    throw invalid(`${where}: invalid value "${raw}"`);
  }
  return cpus;
}

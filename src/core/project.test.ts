import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Project, Service, command, projectFromWorkingDir } from './project.js';
import { isComposeError } from './compose-error.js';
import { MIRROR_MOUNT_WARNING, type DiagnosticsFs } from './diagnostics.js';
import { noShutdownTrigger } from './signal-scope.js';
import { configureLogging, createLogger, resetLogging, type LogEntry } from './logger.js';
import { MockEngine } from '../testing/mock-engine.js';
import type { ContainerConfig } from './engine/engine.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const COMPOSE_FILE = `name: shop
services:
  api:
    image: api:1
    command: ["serve", "--port", "8080"]
  worker:
    image: worker:1
`;

const quietFs: DiagnosticsFs = {
  existsSync: () => false,
  readFileSync: () => '',
};

let dir: string;
let entries: LogEntry[];

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'compose-exec-project-test-'));
  writeFileSync(join(dir, 'docker-compose.yml'), COMPOSE_FILE);
  entries = [];
  configureLogging({ sink: (entry) => entries.push(entry) });
});

afterEach(() => {
  vi.restoreAllMocks();
  resetLogging();
  rmSync(dir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Project
// ---------------------------------------------------------------------------

describe('Project', () => {
  it('loads the services of a directory', () => {
    const project = Project.load(dir);

    expect(project.name).toBe('shop');
    expect(project.serviceNames()).toEqual(['api', 'worker']);
    expect(project.service('api').descriptor.image).toBe('api:1');
  });

  it('rejects an unknown service', () => {
    const project = Project.load(dir);

    for (const name of ['db', 'constructor']) {
      let caught: unknown;
      try {
        project.service(name);
      } catch (err) {
        caught = err;
      }
      expect(isComposeError(caught) && caught.code).toBe('SERVICE_NOT_FOUND');
      expect(caught instanceof Error && caught.message).toBe(`compose: service "${name}" not found`);
    }
  });

  it('builds commands bound to the project', () => {
    const project = Project.load(dir);
    const cmd = project.command('api', 'echo', 'hi');

    expect(cmd.args).toEqual(['echo', 'hi']);
    expect(cmd.project.name).toBe('shop');
    expect(cmd.service.name).toBe('api');
    expect(project.command('api').toString()).toBe('<default>');
  });

  it('fails start for a missing signal', async () => {
    const engine = new MockEngine();
    const project = Project.load(dir, [], { engine, shutdownTrigger: noShutdownTrigger });

    await expect(project.commandContext(null, 'api').start()).rejects.toMatchObject({
      code: 'CONTEXT_REQUIRED',
    });
    expect(engine.calls).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

describe('Service', () => {
  it('binds a bare descriptor to the current directory without a project name', () => {
    const service = Service.fromDescriptor({ name: 'tool', image: 'tool:1' });
    const cmd = service.command('ls', '-l');

    expect(service.name).toBe('tool');
    expect(service.project).toEqual({ name: '', workingDir: process.cwd() });
    expect(cmd.args).toEqual(['ls', '-l']);
  });

  it('runs without creating networks', async () => {
    const engine = new MockEngine();
    const service = Service.fromDescriptor(
      { name: 'tool', image: 'tool:1' },
      { engine, shutdownTrigger: noShutdownTrigger },
    );

    await service.command('true').run();

    expect(engine.callsTo('createNetwork')).toHaveLength(0);
    expect(engine.containerCount()).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Current-directory factories
// ---------------------------------------------------------------------------

describe('projectFromWorkingDir', () => {
  it('runs the service command against the injected engine', async () => {
    const engine = new MockEngine();
    let seen: ContainerConfig | undefined;
    engine.setProgram('api:1', (io) => {
      seen = io.config;
      return 0;
    });

    const project = projectFromWorkingDir({
      dir,
      engine,
      shutdownTrigger: noShutdownTrigger,
      diagnosticsFs: quietFs,
    });
    await project.command('api').run();

    expect(seen?.Cmd).toEqual(['serve', '--port', '8080']);
    expect(engine.hasNetwork('shop_default')).toBe(true);
    expect(engine.closed).toBe(false);
  });

  it('applies the log level from compose-exec.toml', () => {
    writeFileSync(join(dir, 'compose-exec.toml'), '[logging]\nlevel = "debug"\n');

    projectFromWorkingDir({ dir, diagnosticsFs: quietFs });
    createLogger('config-test').debug('visible');

    expect(entries.map((e) => e.msg)).toEqual(['visible']);
  });

  it('rejects an invalid compose-exec.toml', () => {
    writeFileSync(join(dir, 'compose-exec.toml'), '[logging]\nlevel = "loud"\n');

    expect(() => projectFromWorkingDir({ dir, diagnosticsFs: quietFs })).toThrow(
      'logging.level must be one of: debug, info, warn, error',
    );
  });

  it('warns about a missing mirror mount inside a container', () => {
    const containerFs: DiagnosticsFs = {
      existsSync: (path) => path === '/.dockerenv',
      readFileSync: () => '',
    };

    projectFromWorkingDir({ dir, diagnosticsFs: containerFs });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('warn');
    expect(entries[0]?.msg).toBe(MIRROR_MOUNT_WARNING);
  });
});

describe('command', () => {
  it('loads the project in the current directory', () => {
    vi.spyOn(process, 'cwd').mockReturnValue(dir);

    const cmd = command('worker', 'run', '--once');

    expect(cmd.project.name).toBe('shop');
    expect(cmd.service.image).toBe('worker:1');
    expect(cmd.args).toEqual(['run', '--once']);
  });

  it('throws for an unknown service', () => {
    vi.spyOn(process, 'cwd').mockReturnValue(dir);

    expect(() => command('db')).toThrow('compose: service "db" not found');
  });
});

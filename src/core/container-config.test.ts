import { describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  buildContainerConfig,
  healthConfig,
  resolveCommand,
  resolveSecurityOpt,
  type ContainerConfigInput,
} from './container-config.js';
import { isComposeError } from './compose-error.js';
import type { ProjectContext, ServiceDescriptor } from '../types/service.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const project: ProjectContext = { name: 'shop', workingDir: '/srv/shop' };

function input(
  service: Partial<ServiceDescriptor>,
  overrides?: Partial<ContainerConfigInput>,
): ContainerConfigInput {
  return {
    service: { name: 'web', image: 'nginx:1.27', ...service },
    project,
    args: [],
    env: [],
    stdin: false,
    mounts: [],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Container config
// ---------------------------------------------------------------------------

describe('buildContainerConfig', () => {
  it('builds a minimal config', () => {
    const { config, hostConfig } = buildContainerConfig(input({}));

    expect(config).toEqual({
      Image: 'nginx:1.27',
      Tty: false,
      OpenStdin: false,
      StdinOnce: false,
      AttachStdin: false,
      AttachStdout: true,
      AttachStderr: true,
      Labels: {
        'com.docker.compose.project': 'shop',
        'com.docker.compose.service': 'web',
      },
    });
    expect(hostConfig).toEqual({ Init: true });
  });

  it('opens stdin once when stdin is attached', () => {
    const { config } = buildContainerConfig(input({}, { stdin: true }));
    expect([config.OpenStdin, config.StdinOnce, config.AttachStdin]).toEqual([true, true, true]);
  });

  it('prefers explicit args over the service command', () => {
    const service = { command: ['nginx', '-g', 'daemon off;'] };
    expect(buildContainerConfig(input(service)).config.Cmd).toEqual(['nginx', '-g', 'daemon off;']);
    expect(buildContainerConfig(input(service, { args: ['nginx', '-t'] })).config.Cmd).toEqual([
      'nginx',
      '-t',
    ]);
  });

  it('sets entrypoint, trimmed user and working dir override', () => {
    const { config } = buildContainerConfig(
      input({ entrypoint: ['/bin/sh', '-c'], user: ' 1000:1000 ', workingDir: '/app' }, { workingDir: '/tmp' }),
    );

    expect(config.Entrypoint).toEqual(['/bin/sh', '-c']);
    expect(config.User).toBe('1000:1000');
    expect(config.WorkingDir).toBe('/tmp');
  });

  it('falls back to the service working dir', () => {
    expect(buildContainerConfig(input({ workingDir: '/app' })).config.WorkingDir).toBe('/app');
  });

  it('merges service and invocation environment', () => {
    const { config } = buildContainerConfig(
      input({ environment: { A: null, B: '2' } }, { env: ['A=1', 'C'] }),
    );
    expect(config.Env).toEqual(['A=1', 'B=2', 'C']);
  });

  it('keeps service labels alongside identity labels', () => {
    const { config } = buildContainerConfig(
      input({ labels: { tier: 'frontend', 'com.docker.compose.service': 'spoofed' } }),
    );
    expect(config.Labels).toEqual({
      tier: 'frontend',
      'com.docker.compose.project': 'shop',
      'com.docker.compose.service': 'web',
    });
  });

  it('omits the project label without a project name', () => {
    const { config } = buildContainerConfig({ ...input({}), project: { name: '', workingDir: '/' } });
    expect(config.Labels).toEqual({ 'com.docker.compose.service': 'web' });
  });

  it('exposes and publishes ports', () => {
    const { config, hostConfig } = buildContainerConfig(
      input({
        ports: [
          { target: 80, published: '8080' },
          { target: 53, protocol: 'udp', published: '5353', hostIp: '127.0.0.1' },
          { target: 9090 },
        ],
      }),
    );

    expect(config.ExposedPorts).toEqual({ '80/tcp': {}, '53/udp': {}, '9090/tcp': {} });
    expect(hostConfig.PortBindings).toEqual({
      '80/tcp': [{ HostIp: '', HostPort: '8080' }],
      '53/udp': [{ HostIp: '127.0.0.1', HostPort: '5353' }],
    });
  });

  it('passes mounts and disables init when asked', () => {
    const mounts = [{ Type: 'bind' as const, Source: '/srv/shop/data', Target: '/data', ReadOnly: true }];
    const { hostConfig } = buildContainerConfig(input({ init: false }, { mounts }));

    expect(hostConfig.Init).toBe(false);
    expect(hostConfig.Mounts).toEqual(mounts);
  });

  it('translates resource limits', () => {
    const { hostConfig } = buildContainerConfig(
      input({
        memLimit: 536870912,
        memReservation: 268435456,
        memSwapLimit: 1073741824,
        cpus: 1.5,
        cpuShares: 512,
        cpuQuota: 50000,
        cpuset: ' 0-1 ',
        shmSize: 67108864,
      }),
    );

    expect(hostConfig).toMatchObject({
      Memory: 536870912,
      MemoryReservation: 268435456,
      MemorySwap: 1073741824,
      NanoCpus: 1500000000,
      CpuShares: 512,
      CpuQuota: 50000,
      CpusetCpus: '0-1',
      ShmSize: 67108864,
    });
  });

  it('rounds fractional CPUs to whole nanocpus', () => {
    const { hostConfig } = buildContainerConfig(input({ cpus: 0.3333333333 }));
    expect(hostConfig.NanoCpus).toBe(333333333);
  });

  it('translates security and host options', () => {
    const { hostConfig } = buildContainerConfig(
      input({
        privileged: true,
        capAdd: ['NET_ADMIN'],
        capDrop: ['ALL'],
        securityOpt: ['no-new-privileges:true', 'seccomp=unconfined'],
        extraHosts: ['db.internal:10.0.0.5'],
        devices: [
          { source: '/dev/fuse' },
          { source: '/dev/snd', target: '/dev/audio', permissions: 'r' },
        ],
        networkMode: 'host',
      }),
    );

    expect(hostConfig).toMatchObject({
      Privileged: true,
      CapAdd: ['NET_ADMIN'],
      CapDrop: ['ALL'],
      SecurityOpt: ['no-new-privileges:true', 'seccomp=unconfined'],
      ExtraHosts: ['db.internal:10.0.0.5'],
      Devices: [
        { PathOnHost: '/dev/fuse', PathInContainer: '/dev/fuse', CgroupPermissions: 'rwm' },
        { PathOnHost: '/dev/snd', PathInContainer: '/dev/audio', CgroupPermissions: 'r' },
      ],
      NetworkMode: 'host',
    });
  });

  it('uses the injected reader for seccomp profiles', () => {
    const reads: string[] = [];
    const { hostConfig } = buildContainerConfig(
      input(
        { securityOpt: ['seccomp:profiles/strict.json'] },
        {
          readFile: (path) => {
            reads.push(path);
            return '{"defaultAction":"SCMP_ACT_ERRNO"}';
          },
        },
      ),
    );

    expect(reads).toEqual(['/srv/shop/profiles/strict.json']);
    expect(hostConfig.SecurityOpt).toEqual(['seccomp={"defaultAction":"SCMP_ACT_ERRNO"}']);
  });
});

// ---------------------------------------------------------------------------
// Health config
// ---------------------------------------------------------------------------

describe('healthConfig', () => {
  it('converts milliseconds to nanoseconds', () => {
    expect(
      healthConfig({
        test: ['CMD', 'curl', '-f', 'http://localhost/'],
        intervalMs: 5000,
        timeoutMs: 2000,
        startPeriodMs: 10000,
        startIntervalMs: 1000,
        retries: 3,
      }),
    ).toEqual({
      Test: ['CMD', 'curl', '-f', 'http://localhost/'],
      Interval: 5_000_000_000,
      Timeout: 2_000_000_000,
      StartPeriod: 10_000_000_000,
      StartInterval: 1_000_000_000,
      Retries: 3,
    });
  });

  it('disables with NONE', () => {
    expect(healthConfig({ test: ['CMD', 'true'], disable: true, retries: 3 })).toEqual({ Test: ['NONE'] });
  });
});

describe('resolveCommand', () => {
  it('returns an empty list when nothing is set', () => {
    expect(resolveCommand([], {})).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Security options
// ---------------------------------------------------------------------------

describe('resolveSecurityOpt', () => {
  it('passes through non-seccomp options untouched', () => {
    expect(resolveSecurityOpt(' label=disable ', '/srv')).toBe(' label=disable ');
  });

  it('normalizes unconfined and inline JSON', () => {
    expect(resolveSecurityOpt('seccomp:Unconfined', '/srv')).toBe('seccomp=Unconfined');
    expect(resolveSecurityOpt('seccomp={"a":1}', '/srv')).toBe('seccomp={"a":1}');
  });

  it('leaves an empty seccomp value as is', () => {
    expect(resolveSecurityOpt(' seccomp= ', '/srv')).toBe('seccomp=');
  });

  it('inlines a profile read from disk', () => {
    const dir = mkdtempSync(join(tmpdir(), 'compose-exec-seccomp-'));
    try {
      writeFileSync(join(dir, 'profile.json'), '{"defaultAction":"SCMP_ACT_ALLOW"}');
      expect(resolveSecurityOpt('seccomp=profile.json', dir)).toBe(
        'seccomp={"defaultAction":"SCMP_ACT_ALLOW"}',
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('fails with SECURITY_OPT_INVALID when the profile is missing', () => {
    let caught: unknown;
    try {
      resolveSecurityOpt('seccomp=missing.json', '/nonexistent-compose-exec-dir');
    } catch (err) {
      caught = err;
    }
    expect(isComposeError(caught) && caught.code).toBe('SECURITY_OPT_INVALID');
  });
});

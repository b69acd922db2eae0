import { describe, it, expect, beforeEach } from 'vitest';
import { ensureNetworks, resolveNetworking } from './networks.js';
import { EngineError } from './engine/engine.js';
import { MockEngine } from '../testing/mock-engine.js';
import type { ProjectContext } from '../types/service.js';

const project: ProjectContext = {
  name: 'shop',
  workingDir: '/srv/shop',
  networks: {
    back: { external: true, name: 'corp-back' },
    front: { driver: 'overlay', driverOpts: { encrypted: '1' }, labels: { team: 'core' } },
  },
};

// ---------------------------------------------------------------------------
// resolveNetworking
// ---------------------------------------------------------------------------

describe('resolveNetworking', () => {
  it('skips networking when a network mode is set', () => {
    expect(resolveNetworking({ name: 'web', networkMode: 'host' }, project)).toBeUndefined();
  });

  it('skips networking without a project name', () => {
    expect(resolveNetworking({ name: 'web' }, { name: '', workingDir: '/tmp' })).toBeUndefined();
  });

  it('joins the project default network when none are listed', () => {
    const plan = resolveNetworking({ name: 'web' }, project);

    expect(plan?.config).toEqual({ EndpointsConfig: { shop_default: { Aliases: ['web'] } } });
    expect(plan?.targets).toEqual([{ key: 'default', name: 'shop_default', external: false }]);
  });

  it('builds an endpoint per listed network', () => {
    const plan = resolveNetworking(
      {
        name: 'web',
        networks: {
          front: {
            aliases: ['api'],
            ipv4Address: '172.20.0.5',
            driverOpts: { 'com.example.mtu': '1400' },
          },
          back: null,
        },
      },
      project,
    );

    expect(plan?.config.EndpointsConfig).toEqual({
      shop_front: {
        Aliases: ['web', 'api'],
        IPAMConfig: { IPv4Address: '172.20.0.5' },
        DriverOpts: { 'com.example.mtu': '1400' },
      },
      'corp-back': { Aliases: ['web'] },
    });
    expect(plan?.targets.map((t) => [t.name, t.external])).toEqual([
      ['shop_front', false],
      ['corp-back', true],
    ]);
  });

  it('sets only the IPv6 address when that is all that is given', () => {
    const plan = resolveNetworking(
      { name: 'web', networks: { front: { ipv6Address: 'fd00::5' } } },
      project,
    );
    expect(plan?.config.EndpointsConfig.shop_front.IPAMConfig).toEqual({ IPv6Address: 'fd00::5' });
  });
});

// ---------------------------------------------------------------------------
// ensureNetworks
// ---------------------------------------------------------------------------

describe('ensureNetworks', () => {
  let engine: MockEngine;

  beforeEach(() => {
    engine = new MockEngine();
  });

  it('creates a missing network with project labels', async () => {
    await ensureNetworks(engine, 'shop', [{ key: 'default', name: 'shop_default', external: false }]);

    expect(engine.networkRequest('shop_default')).toEqual({
      name: 'shop_default',
      labels: {
        'com.docker.compose.project': 'shop',
        'com.docker.compose.network': 'default',
      },
    });
  });

  it('passes driver, options and declared labels', async () => {
    const plan = resolveNetworking({ name: 'web', networks: { front: null } }, project);
    await ensureNetworks(engine, 'shop', plan?.targets ?? []);

    expect(engine.networkRequest('shop_front')).toEqual({
      name: 'shop_front',
      driver: 'overlay',
      options: { encrypted: '1' },
      labels: {
        team: 'core',
        'com.docker.compose.project': 'shop',
        'com.docker.compose.network': 'front',
      },
    });
  });

  it('does not recreate an existing network', async () => {
    const targets = [{ key: 'default', name: 'shop_default', external: false }];
    await ensureNetworks(engine, 'shop', targets);
    await ensureNetworks(engine, 'shop', targets);

    expect(engine.callsTo('createNetwork')).toHaveLength(1);
  });

  it('requires an exact name match', async () => {
    await engine.createNetwork({ name: 'shop_default_old' });

    await ensureNetworks(engine, 'shop', [{ key: 'default', name: 'shop_default', external: false }]);

    expect(engine.hasNetwork('shop_default')).toBe(true);
  });

  it('skips external networks entirely', async () => {
    await ensureNetworks(engine, 'shop', [{ key: 'back', name: 'corp-back', external: true }]);

    expect(engine.calls).toEqual([]);
  });

  it('succeeds when concurrent callers race to create', async () => {
    const targets = [{ key: 'default', name: 'shop_default', external: false }];

    await Promise.all([
      ensureNetworks(engine, 'shop', targets),
      ensureNetworks(engine, 'shop', targets),
      ensureNetworks(engine, 'shop', targets),
    ]);

    expect(engine.hasNetwork('shop_default')).toBe(true);
  });

  it('tolerates an already-exists message without a status code', async () => {
    engine.failNext('createNetwork', new Error('network with name shop_default already exists'));

    await expect(
      ensureNetworks(engine, 'shop', [{ key: 'default', name: 'shop_default', external: false }]),
    ).resolves.toBeUndefined();
  });

  it('wraps other creation failures', async () => {
    engine.failNext('createNetwork', new EngineError(500, 'pool overlaps'));

    await expect(
      ensureNetworks(engine, 'shop', [{ key: 'default', name: 'shop_default', external: false }]),
    ).rejects.toMatchObject({
      code: 'ENGINE_ERROR',
      message: 'compose: create network "shop_default": pool overlaps',
    });
  });

  it('wraps listing failures', async () => {
    engine.failNext('listNetworks', new EngineError(500, 'daemon busy'));

    await expect(
      ensureNetworks(engine, 'shop', [{ key: 'default', name: 'shop_default', external: false }]),
    ).rejects.toMatchObject({ code: 'ENGINE_ERROR' });
  });
});

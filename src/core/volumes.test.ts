import { describe, it, expect, beforeEach } from 'vitest';
import { ensureVolumes } from './volumes.js';
import { EngineError } from './engine/engine.js';
import { MockEngine } from '../testing/mock-engine.js';
import type { ProjectContext } from '../types/service.js';

const project: ProjectContext = {
  name: 'shop',
  workingDir: '/srv/shop',
  volumes: {
    legacy: { external: true },
    pgdata: { name: 'shop-pg', driver: 'local', driverOpts: { type: 'none' }, labels: { tier: 'db' } },
  },
};

describe('ensureVolumes', () => {
  let engine: MockEngine;

  beforeEach(() => {
    engine = new MockEngine();
  });

  it('creates each named volume the service mounts once', async () => {
    await ensureVolumes(
      engine,
      {
        volumes: [
          { type: 'volume', source: 'data', target: '/a' },
          { type: 'volume', source: 'data', target: '/b' },
          { type: 'bind', source: './conf', target: '/conf' },
          { type: 'volume', target: '/anonymous' },
          { type: 'volume', source: 'legacy', target: '/legacy' },
        ],
      },
      project,
    );

    expect(engine.callsTo('createVolume')).toEqual([{ method: 'createVolume', target: 'shop_data' }]);
    expect(engine.volumeRequest('shop_data')).toEqual({
      name: 'shop_data',
      labels: {
        'com.docker.compose.project': 'shop',
        'com.docker.compose.volume': 'data',
      },
    });
  });

  it('uses declared names, drivers and labels', async () => {
    await ensureVolumes(engine, { volumes: [{ type: 'volume', source: 'pgdata', target: '/pg' }] }, project);

    expect(engine.volumeRequest('shop-pg')).toEqual({
      name: 'shop-pg',
      driver: 'local',
      driverOpts: { type: 'none' },
      labels: {
        tier: 'db',
        'com.docker.compose.project': 'shop',
        'com.docker.compose.volume': 'pgdata',
      },
    });
  });

  it('tolerates a conflict from a concurrent creator', async () => {
    engine.failNext('createVolume', new EngineError(409, 'volume shop_data already exists'));

    await expect(
      ensureVolumes(engine, { volumes: [{ type: 'volume', source: 'data', target: '/a' }] }, project),
    ).resolves.toBeUndefined();
  });

  it('wraps other failures', async () => {
    engine.failNext('createVolume', new EngineError(500, 'disk full'));

    await expect(
      ensureVolumes(engine, { volumes: [{ type: 'volume', source: 'data', target: '/a' }] }, project),
    ).rejects.toMatchObject({
      code: 'ENGINE_ERROR',
      message: 'compose: create volume "shop_data": disk full',
    });
  });

  it('does nothing without named volumes', async () => {
    await ensureVolumes(engine, {}, project);
    expect(engine.calls).toEqual([]);
  });
});

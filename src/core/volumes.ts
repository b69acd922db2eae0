/**
 * Idempotent creation of the named volumes a service mounts.
 */

import type { EngineClient } from './engine/engine.js';
import { isAlreadyExistsError } from './engine/engine.js';
import type { ProjectContext, ServiceDescriptor } from '../types/service.js';
import { LABEL_PROJECT, LABEL_VOLUME } from '../types/service.js';
import { engineError } from './compose-error.js';
import { resolveResourceName } from './resource-names.js';
import { createLogger } from './logger.js';
import type { EnsureOptions } from './networks.js';

/**
 * Create every named volume the service mounts, once per engine name.
 * External volumes and anonymous volumes are left to the engine.
 */
export async function ensureVolumes(
  engine: EngineClient,
  service: Pick<ServiceDescriptor, 'volumes'>,
  project: ProjectContext,
  options: EnsureOptions = {},
): Promise<void> {
  const logger = options.logger ?? createLogger('volumes');
  const call = options.signal ? { signal: options.signal } : {};
  const seen = new Set<string>();

  for (const volume of service.volumes ?? []) {
    if (volume.type !== 'volume') continue;
    const key = volume.source?.trim() ?? '';
    if (key === '') continue;

    const declaration = project.volumes?.[key];
    if (declaration?.external) continue;
    const name = resolveResourceName(project.name, key, declaration?.name, false);
    if (seen.has(name)) continue;
    seen.add(name);

    try {
      await engine.createVolume(
        {
          name,
          ...(declaration?.driver ? { driver: declaration.driver } : {}),
          ...(declaration?.driverOpts ? { driverOpts: declaration.driverOpts } : {}),
          labels: {
            ...declaration?.labels,
            [LABEL_PROJECT]: project.name,
            [LABEL_VOLUME]: key,
          },
        },
        call,
      );
      logger.debug('volume ensured', { volume: name });
    } catch (err) {
      if (isAlreadyExistsError(err)) continue;
      throw engineError(`create volume "${name}"`, err);
    }
  }
}

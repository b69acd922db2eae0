/**
 * Service volume entries → engine mount specifications.
 */

import { isAbsolute, resolve } from 'node:path';
import type { MountConfig } from './engine/engine.js';
import type { ProjectContext, ServiceDescriptor } from '../types/service.js';
import { ErrorCode } from '../types/errors.js';
import { usageError } from './compose-error.js';
import { resolveResourceName } from './resource-names.js';

/**
 * Translate the service's volumes.
 *
 * Bind sources resolve against the project working directory; named
 * volume sources are qualified through the project's declarations. An
 * empty named source is an anonymous volume.
 *
 * @throws ComposeError `BIND_SOURCE_REQUIRED` or `UNSUPPORTED_VOLUME_TYPE`.
 */
export function translateMounts(
  service: Pick<ServiceDescriptor, 'volumes'>,
  project: ProjectContext,
): MountConfig[] {
  const mounts: MountConfig[] = [];
  for (const volume of service.volumes ?? []) {
    const source = volume.source?.trim() ?? '';
    const readOnly = volume.readOnly ?? false;

    switch (volume.type) {
      case '':
      case 'bind': {
        if (source === '') {
          throw usageError(
            ErrorCode.BIND_SOURCE_REQUIRED,
            `bind mount source is required (target ${volume.target})`,
          );
        }
        const absolute = isAbsolute(source) ? resolve(source) : resolve(project.workingDir, source);
        mounts.push({ Type: 'bind', Source: absolute, Target: volume.target, ReadOnly: readOnly });
        break;
      }
      case 'volume': {
        let name = '';
        if (source !== '') {
          const declared = project.volumes?.[source];
          name = resolveResourceName(project.name, source, declared?.name, declared?.external);
        }
        mounts.push({ Type: 'volume', Source: name, Target: volume.target, ReadOnly: readOnly });
        break;
      }
      default:
        throw usageError(
          ErrorCode.UNSUPPORTED_VOLUME_TYPE,
          `unsupported volume type "${volume.type}" (supported: bind, volume)`,
        );
    }
  }
  return mounts;
}

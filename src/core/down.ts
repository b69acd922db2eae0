/**
 * Project teardown: remove every container and network labeled with a
 * project name.
 */

import type { ContainerSummary, EngineClient, NetworkSummary } from './engine/engine.js';
import { isNotFoundError } from './engine/engine.js';
import { createEngineClient } from './engine/docker-engine.js';
import { LABEL_PROJECT } from '../types/service.js';
import { ErrorCode } from '../types/errors.js';
import { ComposeError, engineError, usageError } from './compose-error.js';
import { createLogger, type Logger } from './logger.js';

export interface DownOptions {
  /** Engine to use; never closed here. Without one an owned client is created and closed. */
  engine?: EngineClient;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Best-effort removal of a project's containers (running or not), then its
 * networks. Resources already gone count as removed, so repeated calls
 * succeed.
 *
 * @throws ComposeError `PROJECT_NAME_REQUIRED` for an empty name;
 *   `ENGINE_ERROR` when listing containers fails, or with every other
 *   failure joined into one message.
 */
export async function down(projectName: string, options: DownOptions = {}): Promise<void> {
  const name = projectName.trim();
  if (name === '') {
    throw usageError(ErrorCode.PROJECT_NAME_REQUIRED, 'project name is required');
  }
  const logger = (options.logger ?? createLogger('down')).withContext({ project: name });
  const engine = options.engine ?? createEngineClient();
  const call = options.signal ? { signal: options.signal } : {};
  const labels = [`${LABEL_PROJECT}=${name}`];

  try {
    const failures: string[] = [];

    let containers: ContainerSummary[];
    try {
      containers = await engine.listContainers({ ...call, all: true, labels });
    } catch (err) {
      throw engineError('list containers', err);
    }
    for (const container of containers) {
      try {
        await engine.removeContainer(container.id, { ...call, force: true });
        logger.debug('container removed', { id: container.id });
      } catch (err) {
        if (isNotFoundError(err)) continue;
        failures.push(`container ${container.names.join(',') || container.id}: ${describeError(err)}`);
      }
    }

    let networks: NetworkSummary[];
    try {
      networks = await engine.listNetworks({ ...call, labels });
    } catch (err) {
      failures.push(`failed to list networks: ${describeError(err)}`);
      networks = [];
    }
    for (const network of networks) {
      try {
        await engine.removeNetwork(network.id, call);
        logger.debug('network removed', { network: network.name });
      } catch (err) {
        if (isNotFoundError(err)) continue;
        failures.push(`network ${network.name}: ${describeError(err)}`);
      }
    }

    if (failures.length > 0) {
      throw new ComposeError({
        code: ErrorCode.ENGINE_ERROR,
        message: `down errors: ${failures.join('; ')}`,
      });
    }
    logger.info('project down', { containers: containers.length, networks: networks.length });
  } finally {
    if (!options.engine) {
      await engine.close();
    }
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

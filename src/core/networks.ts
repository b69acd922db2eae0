/**
 * Network attachment for a service container, and idempotent creation of
 * the project networks it joins.
 */

import type {
  EndpointConfig,
  EngineClient,
  NetworkSummary,
  NetworkingConfig,
} from './engine/engine.js';
import { isAlreadyExistsError } from './engine/engine.js';
import type { ProjectContext, ResourceDeclaration, ServiceDescriptor } from '../types/service.js';
import { LABEL_NETWORK, LABEL_PROJECT } from '../types/service.js';
import { engineError } from './compose-error.js';
import { resolveResourceName } from './resource-names.js';
import { createLogger, type Logger } from './logger.js';

export const DEFAULT_NETWORK_KEY = 'default';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A project network the container will join. */
export interface NetworkTarget {
  /** Key in the document (`default` for the implicit network). */
  key: string;
  /** Engine-side name. */
  name: string;
  external: boolean;
  declaration?: ResourceDeclaration;
}

export interface NetworkingPlan {
  config: NetworkingConfig;
  targets: NetworkTarget[];
}

export interface EnsureOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// resolveNetworking
// ---------------------------------------------------------------------------

/**
 * Endpoint settings for every network the service lists, or the project's
 * default network when it lists none.
 *
 * Returns undefined when the service sets a network mode or the project
 * has no name: the engine's defaults apply then.
 */
export function resolveNetworking(
  service: Pick<ServiceDescriptor, 'name' | 'networks' | 'networkMode'>,
  project: ProjectContext,
): NetworkingPlan | undefined {
  if ((service.networkMode ?? '').trim() !== '' || project.name.trim() === '') {
    return undefined;
  }

  const attachments = Object.entries(service.networks ?? {});
  if (attachments.length === 0) {
    attachments.push([DEFAULT_NETWORK_KEY, null]);
  }

  const config: NetworkingConfig = { EndpointsConfig: {} };
  const targets: NetworkTarget[] = [];
  for (const [key, attachment] of attachments) {
    const declaration = project.networks?.[key];
    const name = resolveResourceName(project.name, key, declaration?.name, declaration?.external);

    const endpoint: EndpointConfig = {
      Aliases: [service.name, ...(attachment?.aliases ?? [])],
    };
    const ipv4 = attachment?.ipv4Address;
    const ipv6 = attachment?.ipv6Address;
    if (ipv4 || ipv6) {
      endpoint.IPAMConfig = {
        ...(ipv4 ? { IPv4Address: ipv4 } : {}),
        ...(ipv6 ? { IPv6Address: ipv6 } : {}),
      };
    }
    if (attachment?.driverOpts && Object.keys(attachment.driverOpts).length > 0) {
      endpoint.DriverOpts = { ...attachment.driverOpts };
    }

    config.EndpointsConfig[name] = endpoint;
    const target: NetworkTarget = { key, name, external: declaration?.external ?? false };
    if (declaration) target.declaration = declaration;
    targets.push(target);
  }
  return { config, targets };
}

// ---------------------------------------------------------------------------
// ensureNetworks
// ---------------------------------------------------------------------------

/**
 * Create each non-external target network unless one with exactly that
 * name exists. Losing a creation race to another process is success.
 */
export async function ensureNetworks(
  engine: EngineClient,
  projectName: string,
  targets: readonly NetworkTarget[],
  options: EnsureOptions = {},
): Promise<void> {
  const logger = options.logger ?? createLogger('networks');
  const call = options.signal ? { signal: options.signal } : {};

  for (const target of targets) {
    if (target.external) continue;

    let existing: NetworkSummary[];
    try {
      existing = await engine.listNetworks({ ...call, name: target.name });
    } catch (err) {
      throw engineError(`list networks "${target.name}"`, err);
    }
    // The engine's name filter matches substrings.
    if (existing.some((n) => n.name === target.name)) continue;

    const declaration = target.declaration;
    try {
      await engine.createNetwork(
        {
          name: target.name,
          ...(declaration?.driver ? { driver: declaration.driver } : {}),
          ...(declaration?.driverOpts ? { options: declaration.driverOpts } : {}),
          labels: {
            ...declaration?.labels,
            [LABEL_PROJECT]: projectName,
            [LABEL_NETWORK]: target.key,
          },
        },
        call,
      );
      logger.debug('network created', { network: target.name });
    } catch (err) {
      if (isAlreadyExistsError(err)) {
        logger.debug('network already created elsewhere', { network: target.name });
        continue;
      }
      throw engineError(`create network "${target.name}"`, err);
    }
  }
}

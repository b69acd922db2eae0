/**
 * Naming for engine resources created on behalf of a project.
 */

import { randomBytes } from 'node:crypto';

export const CONTAINER_NAME_PREFIX = 'compose-exec';

/**
 * Engine-side name for a project-level volume or network.
 *
 * External resources use their declared name (or the key itself); an
 * explicit `name:` is used as is; anything else is qualified with the
 * project name so two projects never share it.
 */
export function resolveResourceName(
  project: string,
  key: string,
  explicitName?: string,
  external?: boolean,
): string {
  const name = explicitName?.trim() ?? '';
  if (external) {
    return name !== '' ? name : key;
  }
  if (name !== '') {
    return name;
  }
  const trimmedProject = project.trim();
  return trimmedProject === '' ? key : `${trimmedProject}_${key}`;
}

/** Lowercase and replace anything outside `[a-z0-9-_.]` with `-`, trimming dashes. */
export function sanitizeName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9\-_.]/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** A fresh container name: `compose-exec-<service>-<12 hex>`. */
export function containerNameFor(serviceName: string): string {
  const suffix = randomBytes(6).toString('hex');
  const service = sanitizeName(serviceName);
  return service === ''
    ? `${CONTAINER_NAME_PREFIX}-${suffix}`
    : `${CONTAINER_NAME_PREFIX}-${service}-${suffix}`;
}

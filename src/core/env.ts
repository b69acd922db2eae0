/**
 * Environment list handling.
 *
 * Entries are either `KEY=VALUE` or a bare `KEY` (declared without a
 * value, so the engine leaves it unset rather than empty). Both forms are
 * kept distinct through a merge.
 */

import type { ServiceDescriptor } from '../types/service.js';

/** Split an entry into key and value; `value` is undefined for the bare form. */
export function splitEnvEntry(entry: string): { key: string; value: string | undefined } {
  const eq = entry.indexOf('=');
  if (eq === -1) {
    return { key: entry, value: undefined };
  }
  return { key: entry.slice(0, eq), value: entry.slice(eq + 1) };
}

/**
 * Merge two environment lists.
 *
 * Keys keep the order they were first seen in; a later entry replaces an
 * earlier one with the same key, including its form, so `KEY` overrides
 * `KEY=VALUE` and the reverse. Entries with an empty key are dropped.
 *
 * @example
 * ```ts
 * mergeEnv(['A', 'B=2'], ['A=1', 'C']); // ['A=1', 'B=2', 'C']
 * ```
 */
export function mergeEnv(base: readonly string[], override: readonly string[]): string[] {
  const merged = new Map<string, string>();
  for (const entry of [...base, ...override]) {
    const { key } = splitEnvEntry(entry);
    if (key === '') continue;
    merged.set(key, entry);
  }
  return [...merged.values()];
}

/** Render a service's environment map as an entry list. */
export function serviceEnv(service: Pick<ServiceDescriptor, 'environment'>): string[] {
  const out: string[] = [];
  for (const [key, value] of Object.entries(service.environment ?? {})) {
    out.push(value === null ? key : `${key}=${value}`);
  }
  return out;
}

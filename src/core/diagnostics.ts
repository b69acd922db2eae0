/**
 * Mirror-mount diagnostic.
 *
 * A program using this library from inside a container only sees the
 * project's compose file when the host directory is mounted at the same
 * path. When it is running in a container and no compose file is in
 * sight, say so once per load.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Dependency injection
// ---------------------------------------------------------------------------

/** Minimal filesystem interface for the probes. */
export interface DiagnosticsFs {
  existsSync(path: string): boolean;
  readFileSync(path: string, encoding: 'utf-8'): string;
}

const nodeFs: DiagnosticsFs = { existsSync, readFileSync };

export const MIRROR_MOUNT_WARNING =
  "running inside a container but 'docker-compose.yml' is not found; mount the host's " +
  'current directory at the same path inside this container (mirror mount)';

const CGROUP_MARKERS = ['docker', 'containerd', 'kubepods'];

// ---------------------------------------------------------------------------
// Probes
// ---------------------------------------------------------------------------

/** Whether `dir` holds a `docker-compose.yml` or `docker-compose.yaml`. */
export function hasComposeFile(dir: string, fs: DiagnosticsFs = nodeFs): boolean {
  if (dir === '') return false;
  return (
    fs.existsSync(join(dir, 'docker-compose.yml')) || fs.existsSync(join(dir, 'docker-compose.yaml'))
  );
}

/** Heuristic: `/.dockerenv`, else a container runtime named in PID 1's cgroup. */
export function isProbablyInContainer(fs: DiagnosticsFs = nodeFs): boolean {
  if (fs.existsSync('/.dockerenv')) return true;
  let cgroup: string;
  try {
    cgroup = fs.readFileSync('/proc/1/cgroup', 'utf-8');
  } catch {
    // No procfs: not a Linux container.
    return false;
  }
  return CGROUP_MARKERS.some((marker) => cgroup.includes(marker));
}

/**
 * Log a warning when running inside a container without a compose file in
 * `dir`. Returns whether it warned.
 */
export function warnIfComposeFileMissing(
  dir: string,
  options: { fs?: DiagnosticsFs; logger?: Logger } = {},
): boolean {
  const fs = options.fs ?? nodeFs;
  if (dir === '' || !isProbablyInContainer(fs) || hasComposeFile(dir, fs)) {
    return false;
  }
  (options.logger ?? createLogger('diagnostics')).warn(MIRROR_MOUNT_WARNING, { dir });
  return true;
}

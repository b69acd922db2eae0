/**
 * TOML-based configuration loader.
 *
 * Reads `compose-exec.toml` from a project directory, parses it with
 * smol-toml, validates it, and applies the environment overrides on top.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ErrorCode } from '../types/errors.js';
import { applyEnvOverrides, parseConfig, DEFAULT_CONFIG } from '../types/config.js';
import type { ExecConfig } from '../types/config.js';
import { ComposeError } from './compose-error.js';

export const CONFIG_FILE_NAME = 'compose-exec.toml';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load `compose-exec.toml` from `dir`, then apply `DOCKER_HOST` and
 * `COMPOSE_EXEC_LOG_LEVEL` from `env`.
 *
 * A missing or empty file yields the defaults.
 *
 * @throws ComposeError `CONFIG_INVALID` on invalid TOML or a bad value.
 */
export function loadConfig(dir: string, env: NodeJS.ProcessEnv = process.env): ExecConfig {
  const configPath = join(dir, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return applyEnvOverrides(DEFAULT_CONFIG, env);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return applyEnvOverrides(DEFAULT_CONFIG, env);
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseTOML(content);
  } catch (err) {
    throw new ComposeError({
      code: ErrorCode.CONFIG_INVALID,
      message: `${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err,
    });
  }
  return applyEnvOverrides(parseConfig(raw), env);
}

/**
 * @fileoverview netmeta-mcp configuration
 *
 * Defaults, environment overrides and CLI overrides, applied in that order.
 *
 * Environment:
 * - `NETMETA_R_PATH`: explicit R executable (skips the locator search)
 * - `NETMETA_STATE_DIR`: directory holding session artifacts (default: os.tmpdir())
 * - `NETMETA_TIMEOUT_MS`: child process timeout, 0 = wait indefinitely
 * - `NETMETA_LOG_LEVEL`: read by telemetry/logger.ts
 */

import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '../core/errors.js';

export interface NetmetaConfig {
  /** Explicit R executable; when null the locator searches for one */
  rPath: string | null;

  /** Directory holding the session state artifacts */
  stateDir: string;

  /** Child process timeout in ms; 0 disables the timeout */
  timeoutMs: number;

  /** R packages that must be importable before the bridge is ready */
  requiredPackages: string[];
}

export const DEFAULT_NETMETA_CONFIG: NetmetaConfig = {
  rPath: null,
  stateDir: tmpdir(),
  timeoutMs: 0,
  requiredPackages: ['netmeta', 'jsonlite'],
};

export function parseTimeoutMs(raw: string, key: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(key, `expected a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(trimmed, 10);
}

export function resolveConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: NetmetaConfig = DEFAULT_NETMETA_CONFIG
): NetmetaConfig {
  const config: NetmetaConfig = { ...base, requiredPackages: [...base.requiredPackages] };

  const rPath = env.NETMETA_R_PATH?.trim();
  if (rPath) {
    config.rPath = path.resolve(rPath);
  }

  const stateDir = env.NETMETA_STATE_DIR?.trim();
  if (stateDir) {
    config.stateDir = path.resolve(stateDir);
  }

  const timeout = env.NETMETA_TIMEOUT_MS;
  if (timeout !== undefined && timeout.trim() !== '') {
    config.timeoutMs = parseTimeoutMs(timeout, 'NETMETA_TIMEOUT_MS');
  }

  return config;
}

export function mergeConfig(base: NetmetaConfig, overrides: Partial<NetmetaConfig>): NetmetaConfig {
  return {
    rPath: overrides.rPath !== undefined ? overrides.rPath : base.rPath,
    stateDir: overrides.stateDir ?? base.stateDir,
    timeoutMs: overrides.timeoutMs ?? base.timeoutMs,
    requiredPackages: [...(overrides.requiredPackages ?? base.requiredPackages)],
  };
}

/**
 * @fileoverview Locate and verify the R executable
 *
 * Search order:
 * 1. An explicitly configured path (must exist)
 * 2. `R` next to the running interpreter (`dirname(process.execPath)`)
 * 3. The first executable `R` on PATH
 *
 * Failure at any point here is fatal for bridge construction.
 */

import * as fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import * as path from 'node:path';
import { EngineNotFoundError, PackageMissingError } from '../core/errors.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { scriptArgs, type ProcessInvoker } from './invoker.js';
import { buildPackageCheckScript } from './scripts.js';

export const ENGINE_NOT_INSTALLED_MESSAGE = 'R is not installed or not in PATH';

export function engineExecutableName(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'R.exe' : 'R';
}

export interface LocateEngineOptions {
  explicitPath?: string | null;
  /** Defaults to process.execPath */
  runtimeExecPath?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

async function isExecutableFile(candidate: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    if (platform !== 'win32') {
      await fs.access(candidate, fsConstants.X_OK);
    }
    return true;
  } catch {
    return false;
  }
}

export async function locateEngine(options: LocateEngineOptions = {}): Promise<string> {
  const platform = options.platform ?? process.platform;
  const env = options.env ?? process.env;
  const executable = engineExecutableName(platform);

  if (options.explicitPath) {
    const explicit = path.resolve(options.explicitPath);
    if (await isExecutableFile(explicit, platform)) {
      logInfo('[engine] using configured R executable', { path: explicit });
      return explicit;
    }
    throw new EngineNotFoundError(`Configured R executable not found: ${explicit}`, [explicit]);
  }

  const searched: string[] = [];

  const besideRuntime = path.join(path.dirname(options.runtimeExecPath ?? process.execPath), executable);
  searched.push(besideRuntime);
  if (await isExecutableFile(besideRuntime, platform)) {
    logInfo('[engine] found R beside runtime', { path: besideRuntime });
    return besideRuntime;
  }

  const delimiter = platform === 'win32' ? ';' : ':';
  const pathValue = env.PATH ?? env.Path ?? '';
  for (const dir of pathValue.split(delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, executable);
    searched.push(candidate);
    if (await isExecutableFile(candidate, platform)) {
      logInfo('[engine] found R on PATH', { path: candidate });
      return candidate;
    }
  }

  logDebug('[engine] R search exhausted', { searched });
  throw new EngineNotFoundError(ENGINE_NOT_INSTALLED_MESSAGE, searched);
}

/**
 * Run `R --version`; returns the first line of its banner.
 */
export async function verifyEngine(enginePath: string, invoker: ProcessInvoker): Promise<string> {
  const result = await invoker.run(enginePath, ['--version']);
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
    throw new EngineNotFoundError(`R at ${enginePath} failed to run: ${detail}`, [enginePath]);
  }
  const banner = (result.stdout.trim() || result.stderr.trim()).split(/\r?\n/)[0] ?? '';
  logInfo('[engine] verified R executable', { path: enginePath, version: banner });
  return banner;
}

export async function verifyPackage(
  enginePath: string,
  packageName: string,
  invoker: ProcessInvoker
): Promise<void> {
  const result = await invoker.run(enginePath, scriptArgs(buildPackageCheckScript(packageName)));
  if (result.stdout.trim() !== 'TRUE') {
    throw new PackageMissingError(packageName, enginePath);
  }
  logDebug('[engine] package available', { package: packageName });
}

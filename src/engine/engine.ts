/**
 * @fileoverview Analysis engine
 *
 * An AnalysisEngine executes one named operation and resolves to either the
 * operation's JSON document or a structured `{ error }` value. REngine is
 * the subprocess implementation: each call writes a parameters document to a
 * private temp directory, runs a freshly built script, and decodes stdout.
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { safeJsonParse } from '../core/result.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { scriptArgs, type ProcessInvoker, type ProcessRunResult } from './invoker.js';
import { buildScript } from './scripts.js';
import {
  EMPTY_OUTPUT_MESSAGE,
  ENGINE_ERROR_PREFIX,
  MALFORMED_OUTPUT_PREFIX,
  type EngineOperation,
  type EngineOutcome,
  type OperationParams,
  type OperationResults,
} from './types.js';

export interface ExecuteOptions {
  /** Session slot the operation reads or writes */
  statePath: string;
}

export interface AnalysisEngine {
  execute<Op extends EngineOperation>(
    operation: Op,
    params: OperationParams[Op],
    options: ExecuteOptions
  ): Promise<EngineOutcome<OperationResults[Op]>>;
}

/**
 * Turn a finished run into the operation's outcome.
 */
export function decodeEngineOutput<T>(result: ProcessRunResult): EngineOutcome<T> {
  if (result.exitCode !== 0) {
    return { error: ENGINE_ERROR_PREFIX + result.stderr };
  }
  const stdout = result.stdout.trim();
  if (stdout.length === 0) {
    return { error: EMPTY_OUTPUT_MESSAGE };
  }
  const parsed = safeJsonParse<T>(stdout);
  if (!parsed.ok) {
    return {
      error: MALFORMED_OUTPUT_PREFIX + parsed.error.message,
      raw_output: result.stdout,
    };
  }
  return parsed.value;
}

export interface REngineOptions {
  executable: string;
  invoker: ProcessInvoker;
  /** Parent for per-call temp directories; defaults to os.tmpdir() */
  tempDir?: string;
}

export const PARAMS_FILENAME = 'params.json';

export class REngine implements AnalysisEngine {
  readonly executable: string;
  private readonly invoker: ProcessInvoker;
  private readonly tempDir: string;

  constructor(options: REngineOptions) {
    this.executable = options.executable;
    this.invoker = options.invoker;
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  async execute<Op extends EngineOperation>(
    operation: Op,
    params: OperationParams[Op],
    options: ExecuteOptions
  ): Promise<EngineOutcome<OperationResults[Op]>> {
    let workDir: string | null = null;
    try {
      workDir = await fs.mkdtemp(path.join(this.tempDir, 'netmeta-'));
      const paramsPath = path.join(workDir, PARAMS_FILENAME);
      await fs.writeFile(paramsPath, JSON.stringify(params), 'utf8');

      const script = buildScript(operation, { paramsPath, statePath: options.statePath });
      const started = Date.now();
      const result = await this.invoker.run(this.executable, scriptArgs(script));
      logDebug('[engine] operation finished', {
        operation,
        exitCode: result.exitCode,
        durationMs: Date.now() - started,
      });
      return decodeEngineOutput<OperationResults[Op]>(result);
    } catch (error) {
      return { error: ENGINE_ERROR_PREFIX + getErrorMessage(error) };
    } finally {
      if (workDir) {
        await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
          logWarning('[engine] failed to remove temp directory', {
            path: workDir,
            error: getErrorMessage(error),
          });
        });
      }
    }
  }
}

/**
 * @fileoverview Child process invocation for the R engine
 *
 * The invoker never throws for a failed run: spawn errors, non-zero exits
 * and timeouts all come back as a ProcessRunResult with a non-zero exit code
 * and whatever diagnostic text is available in stderr.
 */

import { execa } from 'execa';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';

export interface ProcessRunResult {
  stdout: string;
  stderr: string;
  /** -1 when the process never produced an exit code (spawn failure, kill, timeout) */
  exitCode: number;
}

export interface ProcessInvoker {
  run(executable: string, args: string[]): Promise<ProcessRunResult>;
}

/** Flags every engine invocation starts with */
export const R_VANILLA_ARGS: readonly string[] = ['--vanilla', '--slave'];

/** Arguments that evaluate `script` as an inline expression */
export function scriptArgs(script: string): string[] {
  return [...R_VANILLA_ARGS, '-e', script];
}

export interface ExecaInvokerOptions {
  /** 0 disables the timeout */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export class ExecaProcessInvoker implements ProcessInvoker {
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ExecaInvokerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.env = options.env ?? process.env;
  }

  async run(executable: string, args: string[]): Promise<ProcessRunResult> {
    const started = Date.now();
    try {
      const result = await execa(executable, args, {
        env: this.env,
        reject: false,
        stdin: 'ignore',
        ...(this.timeoutMs > 0 ? { timeout: this.timeoutMs } : {}),
      });

      const stdout = typeof result.stdout === 'string' ? result.stdout : '';
      let stderr = typeof result.stderr === 'string' ? result.stderr : '';

      let exitCode = result.exitCode ?? -1;
      if (result.timedOut) {
        exitCode = -1;
        stderr = appendLine(stderr, `Process timed out after ${this.timeoutMs}ms`);
      } else if (result.exitCode === undefined) {
        stderr = appendLine(stderr, result.shortMessage || 'Process terminated without an exit code');
      }

      logDebug('[engine] process finished', {
        executable,
        exitCode,
        durationMs: Date.now() - started,
      });
      return { stdout, stderr, exitCode };
    } catch (error) {
      return { stdout: '', stderr: getErrorMessage(error), exitCode: -1 };
    }
  }
}

function appendLine(text: string, line: string): string {
  return text.length > 0 ? `${text}\n${line}` : line;
}

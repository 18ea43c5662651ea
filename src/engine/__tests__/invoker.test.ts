import { describe, it, expect, beforeEach, vi } from 'vitest';
import { execa } from 'execa';
import { ExecaProcessInvoker, R_VANILLA_ARGS, scriptArgs } from '../invoker.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = vi.mocked(execa);

function buildExecaResult(options: {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  timedOut?: boolean;
  shortMessage?: string;
}) {
  return {
    exitCode: options.exitCode,
    stdout: options.stdout ?? '',
    stderr: options.stderr ?? '',
    timedOut: options.timedOut ?? false,
    shortMessage: options.shortMessage ?? '',
    isCanceled: false,
  } as unknown as Awaited<ReturnType<typeof execa>>;
}

describe('scriptArgs', () => {
  it('runs R quietly without profiles and evaluates the script inline', () => {
    expect(R_VANILLA_ARGS).toEqual(['--vanilla', '--slave']);
    expect(scriptArgs('cat(1)')).toEqual(['--vanilla', '--slave', '-e', 'cat(1)']);
  });
});

describe('ExecaProcessInvoker', () => {
  beforeEach(() => {
    execaMock.mockReset();
  });

  it('returns stdout, stderr and exit code of a finished process', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 0, stdout: '{"ok":true}', stderr: 'note' }));
    const invoker = new ExecaProcessInvoker();

    const result = await invoker.run('/usr/bin/R', ['--version']);

    expect(result).toEqual({ stdout: '{"ok":true}', stderr: 'note', exitCode: 0 });
  });

  it('never rejects on failure and sets no timeout by default', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 0 }));
    const env = { PATH: '/bin' };
    await new ExecaProcessInvoker({ env }).run('R', ['-e', '1']);

    expect(execaMock).toHaveBeenCalledWith('R', ['-e', '1'], {
      env,
      reject: false,
      stdin: 'ignore',
    });
  });

  it('passes a positive timeout through', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 0 }));
    await new ExecaProcessInvoker({ timeoutMs: 5000, env: {} }).run('R', []);

    expect(execaMock).toHaveBeenCalledWith('R', [], {
      env: {},
      reject: false,
      stdin: 'ignore',
      timeout: 5000,
    });
  });

  it('keeps a non-zero exit code', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: 1, stderr: 'Error in library(netmeta)' }));

    const result = await new ExecaProcessInvoker().run('R', []);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('Error in library(netmeta)');
  });

  it('reports a timeout as exit code -1 with a note in stderr', async () => {
    execaMock.mockResolvedValue(buildExecaResult({ exitCode: undefined, stderr: 'partial', timedOut: true }));

    const result = await new ExecaProcessInvoker({ timeoutMs: 250 }).run('R', []);

    expect(result).toEqual({
      stdout: '',
      stderr: 'partial\nProcess timed out after 250ms',
      exitCode: -1,
    });
  });

  it('reports a spawn failure as exit code -1 with the failure message', async () => {
    execaMock.mockResolvedValue(
      buildExecaResult({ exitCode: undefined, shortMessage: 'Command failed with ENOENT: R' })
    );

    const result = await new ExecaProcessInvoker().run('R', []);

    expect(result).toEqual({ stdout: '', stderr: 'Command failed with ENOENT: R', exitCode: -1 });
  });

  it('converts a thrown error into a failed run', async () => {
    execaMock.mockRejectedValue(new Error('spawn EACCES'));

    const result = await new ExecaProcessInvoker().run('R', []);

    expect(result).toEqual({ stdout: '', stderr: 'spawn EACCES', exitCode: -1 });
  });
});

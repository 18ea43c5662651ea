import { describe, it, expect, vi } from 'vitest';
import * as path from 'node:path';
import { resolveCliConfig, runCli } from '../index.js';
import { HELP_TEXT } from '../help.js';
import { EngineNotFoundError } from '../../core/errors.js';
import type { EngineInfo, NetmetaBackend } from '../../bridge/netmeta_bridge.js';
import type { NetmetaConfig } from '../../config/index.js';

const ENGINE_INFO: EngineInfo = {
  enginePath: '/usr/lib/R/bin/R',
  engineVersion: 'R version 4.3.2 (2023-10-31)',
  stateDir: '/tmp/netmeta',
};

function fakeBackend(): NetmetaBackend {
  const noSession = async () => ({ error: 'No netmeta result available. Run runnetmeta first.' });
  return {
    runNetmeta: noSession,
    getNetworkGraph: noSession,
    getLeagueTable: noSession,
    getRanking: noSession,
    getForestData: noSession,
    pairwiseToNetmeta: noSession,
    getEngineInfo: () => ENGINE_INFO,
  };
}

describe('runCli', () => {
  it('prints help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(runCli(['--help'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(HELP_TEXT);
  });

  it('prints the version', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(runCli(['-v'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith('netmeta-mcp 0.1.0');
  });

  it('exits with 2 on an unknown flag', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const createBridge = vi.fn(async () => fakeBackend());

    await expect(runCli(['--bogus'], { createBridge })).resolves.toBe(2);
    expect(error).toHaveBeenLastCalledWith("Run 'netmeta-mcp --help' for usage information");
    expect(createBridge).not.toHaveBeenCalled();
  });

  it('prints the engine report for --check', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const createBridge = vi.fn(async (_config: NetmetaConfig) => fakeBackend());

    const code = await runCli(['--check', '--timeout', '100'], {
      env: { NETMETA_TIMEOUT_MS: '5000', NETMETA_STATE_DIR: '/srv/netmeta' },
      createBridge,
    });

    expect(code).toBe(0);
    expect(createBridge).toHaveBeenCalledWith({
      rPath: null,
      stateDir: '/srv/netmeta',
      timeoutMs: 100,
      requiredPackages: ['netmeta', 'jsonlite'],
    });
    expect(log).toHaveBeenCalledWith(
      JSON.stringify(
        {
          ready: true,
          ...ENGINE_INFO,
          requiredPackages: ['netmeta', 'jsonlite'],
          timeoutMs: 100,
        },
        null,
        2
      )
    );
  });

  it('exits with 1 when the engine cannot be found', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const createBridge = vi.fn(async (): Promise<NetmetaBackend> => {
      throw new EngineNotFoundError('R is not installed or not in PATH', ['/usr/bin/R']);
    });

    await expect(runCli(['--check'], { env: {}, createBridge })).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith('netmeta-mcp: [ENGINE_NOT_FOUND] R is not installed or not in PATH');
  });

  it('exits with 1 on a malformed timeout', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const createBridge = vi.fn(async () => fakeBackend());

    await expect(runCli(['--check', '--timeout', '1.5'], { env: {}, createBridge })).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith(
      'netmeta-mcp: [CONFIGURATION_ERROR] Configuration error for --timeout: expected a non-negative integer, got "1.5"'
    );
    expect(createBridge).not.toHaveBeenCalled();
  });
});

describe('resolveCliConfig', () => {
  it('lets flags override the environment', () => {
    const config = resolveCliConfig(
      { 'r-path': 'bin/R', 'state-dir': 'state' },
      { NETMETA_R_PATH: '/opt/R/bin/R', NETMETA_STATE_DIR: '/srv/netmeta' }
    );

    expect(config.rPath).toBe(path.resolve('bin/R'));
    expect(config.stateDir).toBe(path.resolve('state'));
    expect(config.timeoutMs).toBe(0);
  });

  it('keeps environment values when no flag is given', () => {
    const config = resolveCliConfig({}, { NETMETA_R_PATH: '/opt/R/bin/R', NETMETA_TIMEOUT_MS: '30000' });

    expect(config.rPath).toBe('/opt/R/bin/R');
    expect(config.timeoutMs).toBe(30000);
  });
});

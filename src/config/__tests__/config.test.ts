import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_NETMETA_CONFIG,
  mergeConfig,
  parseTimeoutMs,
  resolveConfigFromEnv,
} from '../index.js';
import { ConfigurationError } from '../../core/errors.js';

describe('parseTimeoutMs', () => {
  it('accepts non-negative integers', () => {
    expect(parseTimeoutMs(' 120000 ', 'NETMETA_TIMEOUT_MS')).toBe(120000);
    expect(parseTimeoutMs('0', 'NETMETA_TIMEOUT_MS')).toBe(0);
  });

  it.each(['-1', '2.5', 'ten', ''])('rejects %j', (raw) => {
    expect(() => parseTimeoutMs(raw, 'NETMETA_TIMEOUT_MS')).toThrow(ConfigurationError);
  });
});

describe('resolveConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(resolveConfigFromEnv({})).toEqual({
      rPath: null,
      stateDir: tmpdir(),
      timeoutMs: 0,
      requiredPackages: ['netmeta', 'jsonlite'],
    });
  });

  it('reads every variable', () => {
    expect(
      resolveConfigFromEnv({
        NETMETA_R_PATH: 'R/bin/R',
        NETMETA_STATE_DIR: '/srv/netmeta',
        NETMETA_TIMEOUT_MS: '60000',
      })
    ).toEqual({
      rPath: path.resolve('R/bin/R'),
      stateDir: '/srv/netmeta',
      timeoutMs: 60000,
      requiredPackages: ['netmeta', 'jsonlite'],
    });
  });

  it('ignores blank values', () => {
    const config = resolveConfigFromEnv({ NETMETA_R_PATH: '  ', NETMETA_TIMEOUT_MS: ' ' });

    expect(config.rPath).toBeNull();
    expect(config.timeoutMs).toBe(0);
  });

  it('does not share the package list with the defaults', () => {
    const config = resolveConfigFromEnv({});
    config.requiredPackages.push('metafor');

    expect(DEFAULT_NETMETA_CONFIG.requiredPackages).toEqual(['netmeta', 'jsonlite']);
  });
});

describe('mergeConfig', () => {
  it('applies only the given overrides', () => {
    const base = { ...DEFAULT_NETMETA_CONFIG, rPath: '/opt/R/bin/R' };

    expect(mergeConfig(base, { timeoutMs: 500 })).toEqual({ ...base, timeoutMs: 500 });
  });

  it('can clear the executable path', () => {
    const base = { ...DEFAULT_NETMETA_CONFIG, rPath: '/opt/R/bin/R' };

    expect(mergeConfig(base, { rPath: null }).rPath).toBeNull();
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { logDebug, logError, logInfo, logWarning, resolveLogLevel } from '../logger.js';

const savedLevel = process.env.NETMETA_LOG_LEVEL;

beforeEach(() => {
  process.env.NETMETA_LOG_LEVEL = 'debug';
});

afterEach(() => {
  vi.restoreAllMocks();
  if (savedLevel === undefined) {
    delete process.env.NETMETA_LOG_LEVEL;
  } else {
    process.env.NETMETA_LOG_LEVEL = savedLevel;
  }
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is undefined`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello');

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { tool: 'runnetmeta' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('never writes to stdout', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('a');
    logWarning('b');
    logError('c');
    logDebug('d');

    expect(stdout).not.toHaveBeenCalled();
  });

  it('drops messages below the configured level', () => {
    process.env.NETMETA_LOG_LEVEL = 'warn';
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logInfo('ignored');
    logDebug('ignored');
    logError('kept');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('kept');
  });

  it('silences everything at level silent', () => {
    process.env.NETMETA_LOG_LEVEL = 'silent';
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logError('nope');
    logWarning('nope');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('falls back to info for unknown levels', () => {
    expect(resolveLogLevel({ NETMETA_LOG_LEVEL: 'verbose' })).toBe('info');
    expect(resolveLogLevel({ NETMETA_LOG_LEVEL: ' WARN ' })).toBe('warn');
    expect(resolveLogLevel({})).toBe('info');
  });
});

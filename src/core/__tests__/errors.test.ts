import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  EngineNotFoundError,
  PackageMissingError,
  SessionLockError,
  ValidationError,
  isNetmetaError,
  isStartupFatal,
} from '../errors.js';
import { Err, Ok, isErr, isOk, safeJsonParse } from '../result.js';

describe('netmeta errors', () => {
  it('formats package errors with their details', () => {
    const error = new PackageMissingError('netmeta', '/usr/bin/R');

    expect(error.message).toBe("R package 'netmeta' is not installed");
    expect(error.toString()).toBe("[PACKAGE_MISSING] R package 'netmeta' is not installed");
    expect(error.toJSON()).toMatchObject({
      code: 'PACKAGE_MISSING',
      retryable: false,
      details: { packageName: 'netmeta', enginePath: '/usr/bin/R' },
    });
  });

  it('keeps the searched locations of a missing engine', () => {
    const error = new EngineNotFoundError('R is not installed or not in PATH', ['/usr/bin/R']);

    expect(error.searched).toEqual(['/usr/bin/R']);
    expect(error.name).toBe('EngineNotFoundError');
  });

  it('marks lock failures retryable', () => {
    const error = new SessionLockError('/tmp/s.rds', 'Lock file is already being held');

    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Could not lock session state /tmp/s.rds: Lock file is already being held');
  });

  it('separates startup fatals from per-call failures', () => {
    expect(isStartupFatal(new EngineNotFoundError('x', []))).toBe(true);
    expect(isStartupFatal(new PackageMissingError('netmeta', 'R'))).toBe(true);
    expect(isStartupFatal(new ConfigurationError('--timeout', 'bad'))).toBe(true);
    expect(isStartupFatal(new ValidationError('session_id', 'pattern', '"x y"'))).toBe(false);
    expect(isStartupFatal(new Error('x'))).toBe(false);
  });

  it('recognizes its own errors', () => {
    expect(isNetmetaError(new SessionLockError('p', 'm'))).toBe(true);
    expect(isNetmetaError(new Error('m'))).toBe(false);
  });
});

describe('result helpers', () => {
  it('narrows ok and err values', () => {
    expect(isOk(Ok(1))).toBe(true);
    expect(isErr(Err('bad'))).toBe(true);
  });

  it('parses JSON or keeps the parser error', () => {
    expect(safeJsonParse('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });

    const failed = safeJsonParse('nope');
    expect(failed.ok).toBe(false);
    if (failed.ok) return;
    expect(failed.error).toBeInstanceOf(SyntaxError);
  });
});

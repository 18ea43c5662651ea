/**
 * @fileoverview netmeta-mcp error hierarchy
 *
 * Two families live here. Construction-time fatals (EngineNotFoundError,
 * PackageMissingError, ConfigurationError) abort startup. Everything a
 * remote caller can trigger at run time is returned as structured data
 * instead (see EngineFailureKind in engine/types.ts); ValidationError and
 * SessionLockError are thrown internally and converted at the tool boundary.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class NetmetaError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// ENGINE ERRORS
// ============================================================================

export class EngineNotFoundError extends NetmetaError {
  readonly code = 'ENGINE_NOT_FOUND';
  readonly retryable = false;

  constructor(
    message: string,
    readonly searched: string[] = [],
  ) {
    super(message);
    this.name = 'EngineNotFoundError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        searched: this.searched,
      },
    };
  }
}

export class PackageMissingError extends NetmetaError {
  readonly code = 'PACKAGE_MISSING';
  readonly retryable = false;

  constructor(
    readonly packageName: string,
    readonly enginePath: string,
  ) {
    super(`R package '${packageName}' is not installed`);
    this.name = 'PackageMissingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        packageName: this.packageName,
        enginePath: this.enginePath,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export const VALIDATION_MESSAGE_PREFIX = 'Validation failed for ';

export class ValidationError extends NetmetaError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`${VALIDATION_MESSAGE_PREFIX}${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends NetmetaError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// SESSION ERRORS
// ============================================================================

export class SessionLockError extends NetmetaError {
  readonly code = 'SESSION_LOCK_ERROR';
  readonly retryable = true;

  constructor(
    readonly statePath: string,
    message: string,
  ) {
    super(`Could not lock session state ${statePath}: ${message}`);
    this.name = 'SessionLockError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        statePath: this.statePath,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isNetmetaError(error: unknown): error is NetmetaError {
  return error instanceof NetmetaError;
}

/** Errors that must abort startup rather than be reported to a caller. */
export function isStartupFatal(error: unknown): error is EngineNotFoundError | PackageMissingError | ConfigurationError {
  return (
    error instanceof EngineNotFoundError ||
    error instanceof PackageMissingError ||
    error instanceof ConfigurationError
  );
}

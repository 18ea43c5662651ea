/**
 * @fileoverview Session state slots
 *
 * A slot is one serialized netmeta fit on disk. The default slot lives at
 * `<stateDir>/netmeta_state.rds`; a caller-supplied session id selects
 * `<stateDir>/netmeta_state_<id>.rds`. Operations on one slot are
 * serialized in-process by a promise chain and across processes by a
 * proper-lockfile lock on `<state>.lock`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import { SessionLockError, ValidationError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

export const DEFAULT_STATE_FILENAME = 'netmeta_state.rds';
export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const LOCK_STALE_TIMEOUT_MS = 60_000;
const LOCK_UPDATE_INTERVAL_MS = 10_000;
const LOCK_RETRIES = { retries: 20, minTimeout: 100, maxTimeout: 2_000, factor: 1.5 };

export function isValidSessionId(value: string): boolean {
  return SESSION_ID_PATTERN.test(value);
}

export class SessionStateStore {
  private readonly chains = new Map<string, Promise<void>>();

  constructor(readonly stateDir: string) {}

  pathFor(sessionId?: string): string {
    if (sessionId === undefined) {
      return path.join(this.stateDir, DEFAULT_STATE_FILENAME);
    }
    if (!isValidSessionId(sessionId)) {
      throw new ValidationError('session_id', SESSION_ID_PATTERN.source, JSON.stringify(sessionId));
    }
    return path.join(this.stateDir, `netmeta_state_${sessionId}.rds`);
  }

  async exists(sessionId?: string): Promise<boolean> {
    try {
      const stat = await fs.stat(this.pathFor(sessionId));
      return stat.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Run `fn` with exclusive access to the slot. Throws SessionLockError
   * when the cross-process lock cannot be acquired.
   */
  async withLock<T>(sessionId: string | undefined, fn: (statePath: string) => Promise<T>): Promise<T> {
    const statePath = this.pathFor(sessionId);

    let release!: () => void;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.chains.get(statePath) ?? Promise.resolve();
    const current = previous.then(() => gate);
    this.chains.set(statePath, current);

    await previous;
    try {
      const unlock = await this.acquire(statePath);
      try {
        return await fn(statePath);
      } finally {
        await unlock().catch((error: unknown) => {
          logWarning('[session] failed to release state lock', {
            path: statePath,
            error: getErrorMessage(error),
          });
        });
      }
    } finally {
      release();
      if (this.chains.get(statePath) === current) {
        this.chains.delete(statePath);
      }
    }
  }

  private async acquire(statePath: string): Promise<() => Promise<void>> {
    try {
      await fs.mkdir(this.stateDir, { recursive: true });
      const unlock = await lockfile.lock(statePath, {
        lockfilePath: `${statePath}.lock`,
        realpath: false,
        stale: LOCK_STALE_TIMEOUT_MS,
        update: LOCK_UPDATE_INTERVAL_MS,
        retries: LOCK_RETRIES,
        // Without this handler proper-lockfile throws from a timer.
        onCompromised: (err) => {
          logWarning('[session] state lock compromised', { path: statePath, error: err.message });
        },
      });
      logDebug('[session] lock acquired', { path: statePath });
      return unlock;
    } catch (error) {
      throw new SessionLockError(statePath, getErrorMessage(error));
    }
  }
}

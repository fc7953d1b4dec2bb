/**
 * File-backed State Store
 *
 * Layout under the state directory:
 *   state/<env>.json   deployment state, replaced atomically (temp file + rename)
 *   locks/<env>.lock   advisory lock, created exclusively
 *
 * A lock left behind by a process on this host that no longer exists
 * (for example a run killed by a second Ctrl+C) is reclaimed on acquire.
 */

import { mkdir, open, readFile, rename, rm, writeFile } from 'fs/promises';
import { hostname } from 'os';
import { join } from 'path';
import { StateStore } from './stateStore.js';
import type { DeploymentState, LockHandle, LockInfo } from './state.types.js';
import { ConfigurationError, LockError, formatError } from '../../utils/errors.js';
import { asNumber, asRecord, asString, parseJson, systemClock } from '../../utils/helpers.js';
import type { Clock } from '../../utils/helpers.js';
import { DEFAULT_LOCK_STALE_MS, LOCKS_SUBDIR, STATE_SUBDIR } from '../../utils/constants.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('state');

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Signal 0 checks for existence only; EPERM means the pid exists under another user
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) {
    return false;
  }
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return !isErrnoCode(error, 'ESRCH');
  }
}

export interface FileStateStoreOptions {
  clock?: Clock;
  staleAfterMs?: number;
  /** Liveness check for same-host lock holders */
  isProcessAlive?: (pid: number) => boolean;
}

function parseState(text: string, path: string): DeploymentState {
  const record = asRecord(parseJson(text));
  const environment = asString(record?.environment);
  const lastCompletedStep = asNumber(record?.lastCompletedStep);
  if (!record || !environment || lastCompletedStep === undefined) {
    throw new ConfigurationError(`State file ${path} is corrupt; remove it to start over`);
  }

  const status = asString(record.status);
  const outputs: Record<string, string> = {};
  for (const [key, value] of Object.entries(asRecord(record.outputs) ?? {})) {
    if (typeof value === 'string') outputs[key] = value;
  }

  const steps: DeploymentState['steps'] = {};
  for (const [id, value] of Object.entries(asRecord(record.steps) ?? {})) {
    const step = asRecord(value);
    const index = asNumber(step?.index);
    if (index === undefined) continue;
    steps[id] = {
      id,
      index,
      completedAt: asString(step?.completedAt) ?? '',
      attempts: asNumber(step?.attempts) ?? 1,
    };
  }

  const failure = asRecord(record.lastFailure);

  return {
    environment,
    lastCompletedStep,
    updatedAt: asString(record.updatedAt) ?? '',
    status:
      status === 'in_progress' || status === 'succeeded' || status === 'failed'
        ? status
        : 'not_started',
    outputs,
    steps,
    lastFailure: failure
      ? {
          step: asString(failure.step) ?? '',
          index: asNumber(failure.index) ?? -1,
          message: asString(failure.message) ?? '',
          code: asString(failure.code),
          at: asString(failure.at) ?? '',
        }
      : undefined,
    runId: asString(record.runId),
    lastForceUnlockAt: asString(record.lastForceUnlockAt),
  };
}

function parseLock(text: string, environment: string): LockInfo {
  const record = asRecord(parseJson(text));
  return {
    environment,
    owner: asString(record?.owner) ?? 'unknown',
    pid: asNumber(record?.pid) ?? 0,
    hostname: asString(record?.hostname) ?? 'unknown',
    runId: asString(record?.runId) ?? 'unknown',
    acquiredAt: asString(record?.acquiredAt) ?? new Date(0).toISOString(),
  };
}

export class FileStateStore extends StateStore {
  private readonly stateDir: string;
  private readonly clock: Clock;
  private readonly staleAfterMs: number;
  private readonly isProcessAlive: (pid: number) => boolean;

  constructor(stateDir: string, options: FileStateStoreOptions = {}) {
    super();
    this.stateDir = stateDir;
    this.clock = options.clock ?? systemClock;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_LOCK_STALE_MS;
    this.isProcessAlive = options.isProcessAlive ?? isProcessAlive;
  }

  protected now(): Date {
    return new Date(this.clock.now());
  }

  statePath(environment: string): string {
    return join(this.stateDir, STATE_SUBDIR, `${environment}.json`);
  }

  lockPath(environment: string): string {
    return join(this.stateDir, LOCKS_SUBDIR, `${environment}.lock`);
  }

  async load(environment: string): Promise<DeploymentState | undefined> {
    const path = this.statePath(environment);
    try {
      return parseState(await readFile(path, 'utf-8'), path);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return undefined;
      }
      throw error;
    }
  }

  async save(state: DeploymentState): Promise<void> {
    const path = this.statePath(state.environment);
    await mkdir(join(this.stateDir, STATE_SUBDIR), { recursive: true });

    const tmpPath = `${path}.${process.pid}.tmp`;
    await writeFile(tmpPath, JSON.stringify(state, null, 2) + '\n', 'utf-8');
    await rename(tmpPath, path);
  }

  async clear(environment: string): Promise<void> {
    await rm(this.statePath(environment), { force: true });
  }

  async acquireLock(environment: string, owner: string, runId: string): Promise<LockHandle> {
    const path = this.lockPath(environment);
    await mkdir(join(this.stateDir, LOCKS_SUBDIR), { recursive: true });

    const info: LockInfo = {
      environment,
      owner,
      pid: process.pid,
      hostname: hostname(),
      runId,
      acquiredAt: this.now().toISOString(),
    };

    if (!(await this.createLockFile(path, info))) {
      const holder = await this.readLock(environment);
      if (!holder || !this.isAbandoned(holder)) {
        throw this.lockConflict(environment, holder);
      }
      logger.warn(
        `Reclaiming lock on '${environment}' left by ${holder.owner} (pid ${holder.pid} is no longer running)`
      );
      await rm(path, { force: true });
      if (!(await this.createLockFile(path, info))) {
        throw this.lockConflict(environment, await this.readLock(environment));
      }
    }

    return {
      info,
      release: async () => {
        // Only remove the lock if it is still ours
        const current = await this.readLock(environment);
        if (current?.runId === runId) {
          await rm(path, { force: true });
        }
      },
    };
  }

  /**
   * Create the lock file exclusively; false when it already exists
   */
  private async createLockFile(path: string, info: LockInfo): Promise<boolean> {
    try {
      const handle = await open(path, 'wx');
      try {
        await handle.writeFile(JSON.stringify(info, null, 2) + '\n', 'utf-8');
      } finally {
        await handle.close();
      }
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'EEXIST')) {
        return false;
      }
      throw new LockError(
        'LOCK_HELD',
        info.environment,
        `Could not lock '${info.environment}': ${formatError(error)}`
      );
    }
  }

  private isAbandoned(holder: LockInfo): boolean {
    return holder.hostname === hostname() && !this.isProcessAlive(holder.pid);
  }

  private lockConflict(environment: string, holder: LockInfo | undefined): LockError {
    const since = holder ? Date.parse(holder.acquiredAt) : NaN;
    const ageMs = Number.isNaN(since) ? Infinity : this.clock.now() - since;
    const who = holder ? `${holder.owner} (pid ${holder.pid} on ${holder.hostname})` : 'another run';

    if (ageMs > this.staleAfterMs) {
      return new LockError(
        'LOCK_STALE',
        environment,
        `Environment '${environment}' is locked by ${who} since ${holder?.acquiredAt ?? 'unknown'}; ` +
          `the lock looks stale. Run 'unlock ${environment}' if no deployment is running.`
      );
    }

    return new LockError(
      'LOCK_HELD',
      environment,
      `Environment '${environment}' is locked by ${who} since ${holder?.acquiredAt ?? 'unknown'}`
    );
  }

  async readLock(environment: string): Promise<LockInfo | undefined> {
    try {
      return parseLock(await readFile(this.lockPath(environment), 'utf-8'), environment);
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return undefined;
      }
      throw error;
    }
  }

  async forceUnlock(environment: string): Promise<boolean> {
    const existed = (await this.readLock(environment)) !== undefined;
    await rm(this.lockPath(environment), { force: true });

    const state = await this.loadOrInitial(environment);
    await this.save({ ...state, lastForceUnlockAt: this.now().toISOString() });

    return existed;
  }
}

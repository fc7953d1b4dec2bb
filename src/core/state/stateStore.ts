/**
 * StateStore - Abstract base class for the deployment state recorder
 *
 * Implementations persist one DeploymentState per environment and provide an
 * advisory lock so two runs never drive the same environment at once.
 */

import type {
  DeploymentState,
  FailureRecord,
  LockHandle,
  LockInfo,
  StepRecord,
} from './state.types.js';

/**
 * State of an environment nothing has been recorded for
 */
export function initialState(environment: string, now: Date = new Date()): DeploymentState {
  return {
    environment,
    lastCompletedStep: -1,
    updatedAt: now.toISOString(),
    status: 'not_started',
    outputs: {},
    steps: {},
  };
}

/**
 * Record a completed step. The last-completed index only moves forward over
 * contiguous completed steps.
 */
export function applyStepSuccess(
  state: DeploymentState,
  step: Omit<StepRecord, 'completedAt'>,
  outputs: Record<string, string>,
  now: Date = new Date()
): DeploymentState {
  const steps: Record<string, StepRecord> = {
    ...state.steps,
    [step.id]: { ...step, completedAt: now.toISOString() },
  };

  const completed = new Set(Object.values(steps).map((record) => record.index));
  let lastCompletedStep = state.lastCompletedStep;
  while (completed.has(lastCompletedStep + 1)) {
    lastCompletedStep++;
  }

  return {
    ...state,
    steps,
    lastCompletedStep,
    outputs: { ...state.outputs, ...outputs },
    updatedAt: now.toISOString(),
  };
}

export abstract class StateStore {
  abstract load(environment: string): Promise<DeploymentState | undefined>;

  abstract save(state: DeploymentState): Promise<void>;

  /**
   * Forget everything recorded for the environment
   */
  abstract clear(environment: string): Promise<void>;

  /**
   * Take the environment's lock or throw LockError
   */
  abstract acquireLock(environment: string, owner: string, runId: string): Promise<LockHandle>;

  abstract readLock(environment: string): Promise<LockInfo | undefined>;

  /**
   * Remove a lock regardless of owner
   *
   * @returns whether a lock was present
   */
  abstract forceUnlock(environment: string): Promise<boolean>;

  protected now(): Date {
    return new Date();
  }

  async loadOrInitial(environment: string): Promise<DeploymentState> {
    return (await this.load(environment)) ?? initialState(environment, this.now());
  }

  async markRunStarted(environment: string, runId: string): Promise<DeploymentState> {
    const state = await this.loadOrInitial(environment);
    const next: DeploymentState = {
      ...state,
      status: 'in_progress',
      runId,
      updatedAt: this.now().toISOString(),
    };
    await this.save(next);
    return next;
  }

  async recordStepSuccess(
    environment: string,
    step: Omit<StepRecord, 'completedAt'>,
    outputs: Record<string, string> = {}
  ): Promise<DeploymentState> {
    const state = await this.loadOrInitial(environment);
    const next = applyStepSuccess(state, step, outputs, this.now());
    await this.save(next);
    return next;
  }

  async recordFailure(
    environment: string,
    failure: Omit<FailureRecord, 'at'>
  ): Promise<DeploymentState> {
    const state = await this.loadOrInitial(environment);
    const now = this.now().toISOString();
    const next: DeploymentState = {
      ...state,
      status: 'failed',
      lastFailure: { ...failure, at: now },
      updatedAt: now,
    };
    await this.save(next);
    return next;
  }

  async markSucceeded(environment: string): Promise<DeploymentState> {
    const state = await this.loadOrInitial(environment);
    const next: DeploymentState = {
      ...state,
      status: 'succeeded',
      lastFailure: undefined,
      updatedAt: this.now().toISOString(),
    };
    await this.save(next);
    return next;
  }
}

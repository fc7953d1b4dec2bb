/**
 * Deployment Step Pipeline
 *
 * Runs steps strictly in order as a state machine:
 *   not_started → running(i) → succeeded | failed(i)
 *
 * For each step:
 * 1. Precondition: failure halts the pipeline before the action runs
 * 2. Already recorded and postcondition holds: skip (mutating steps only)
 * 3. Confirmation, when the step asks for one
 * 4. Action + postcondition, retried up to maxAttempts on transient errors
 *    or an unmet postcondition
 * 5. Success is persisted before moving on; failure is persisted and stops the run
 *
 * There is no rollback: a failed step leaves whatever it applied in place.
 */

import { randomUUID } from 'crypto';
import {
  ConfigurationError,
  ConfirmationDeniedError,
  DeploymentError,
  FatalActionError,
  PollTimeoutError,
  PostconditionError,
  PreconditionError,
  exitCodeFor,
  formatError,
  isRetryable,
} from '../../utils/errors.js';
import { ExitCode, STEP_RETRY_DELAY_MS } from '../../utils/constants.js';
import { combineSignals, currentUser, systemClock } from '../../utils/helpers.js';
import type { Clock } from '../../utils/helpers.js';
import { createLogger } from '../../utils/logger.js';
import type { Environment } from '../../lib/environments.js';
import type { StateStore, DeploymentState, LockHandle } from '../state/index.js';
import type { CheckResult, StepResult } from '../results/index.js';
import type {
  ConfirmationProvider,
  PipelineCallbacks,
  PipelineRunOptions,
  PipelineRunResult,
  PipelineState,
  PipelineStep,
  StepContext,
} from './pipeline.types.js';

const logger = createLogger('pipeline');

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(formatError(error));
}

export interface DeploymentPipelineOptions {
  store: StateStore;
  confirmations: ConfirmationProvider;
  clock?: Clock;
  callbacks?: PipelineCallbacks;
}

type StepOutcome =
  | { status: 'succeeded'; attempts: number; outputs: Record<string, string> }
  | { status: 'skipped' }
  | { status: 'failed'; attempts: number; actionRan: boolean; error: Error };

export class DeploymentPipeline {
  private readonly steps: PipelineStep[];
  private readonly store: StateStore;
  private readonly confirmations: ConfirmationProvider;
  private readonly clock: Clock;
  private readonly callbacks: PipelineCallbacks;
  private state: PipelineState = { status: 'not_started' };

  constructor(steps: PipelineStep[], options: DeploymentPipelineOptions) {
    const ids = new Set<string>();
    for (const step of steps) {
      if (ids.has(step.id)) {
        throw new ConfigurationError(`Duplicate pipeline step id '${step.id}'`);
      }
      if (!Number.isInteger(step.maxAttempts) || step.maxAttempts < 1) {
        throw new ConfigurationError(`Step '${step.id}' needs maxAttempts >= 1`);
      }
      ids.add(step.id);
    }

    this.steps = steps;
    this.store = options.store;
    this.confirmations = options.confirmations;
    this.clock = options.clock ?? systemClock;
    this.callbacks = options.callbacks ?? {};
  }

  getState(): PipelineState {
    return this.state;
  }

  getSteps(): readonly PipelineStep[] {
    return this.steps;
  }

  private setState(state: PipelineState): void {
    this.state = state;
    this.callbacks.onStateChange?.(state);
  }

  /**
   * Resolve a 1-based position or a step id
   */
  resolveStep(selector: string): PipelineStep {
    const position = Number(selector);
    const step = Number.isInteger(position)
      ? this.steps[position - 1]
      : this.steps.find((candidate) => candidate.id === selector);

    if (!step) {
      const known = this.steps.map((candidate, i) => `${i + 1}=${candidate.id}`).join(', ');
      throw new ConfigurationError(`Unknown step '${selector}' (${known})`);
    }
    return step;
  }

  /**
   * Run the pipeline (or the selected steps) for one environment
   */
  async run(environment: Environment, options: PipelineRunOptions = {}): Promise<PipelineRunResult> {
    const runId = randomUUID();
    const startedAt = this.clock.now();
    const results: StepResult[] = [];
    const runSignal = options.signal ?? new AbortController().signal;

    const finish = (
      status: 'succeeded' | 'failed',
      lastCompletedStep: number,
      failure?: { stepId?: string; error: Error }
    ): PipelineRunResult => ({
      runId,
      status,
      steps: results,
      failedStep: failure?.stepId,
      error: failure?.error,
      exitCode: failure ? exitCodeFor(failure.error) : ExitCode.SUCCESS,
      lastCompletedStep,
      durationMs: this.clock.now() - startedAt,
    });

    let selected: PipelineStep[];
    let lock: LockHandle;
    try {
      selected = this.select(options.only);
      lock = await this.store.acquireLock(environment.name, options.owner ?? currentUser(), runId);
    } catch (error) {
      const previous = await this.store.load(environment.name);
      return finish('failed', previous?.lastCompletedStep ?? -1, { error: toError(error) });
    }

    try {
      let recorded = await this.store.markRunStarted(environment.name, runId);
      const outputs: Record<string, string> = { ...recorded.outputs };
      // Asked at most once per invocation, never persisted
      const confirmed = new Set<string>();

      for (const step of selected) {
        const index = this.steps.indexOf(step);
        this.setState({ status: 'running', step: index, stepId: step.id });
        this.callbacks.onStepStart?.(step, index, this.steps.length);

        const stepStartedAt = this.clock.now();
        const outcome = await this.runStep(step, environment, outputs, recorded, runSignal, confirmed);
        const finishedAt = this.clock.now();

        const result: StepResult = {
          index,
          id: step.id,
          name: step.name,
          status: outcome.status,
          actionRan: outcome.status === 'succeeded' || (outcome.status === 'failed' && outcome.actionRan),
          attempts: outcome.status === 'skipped' ? 0 : outcome.attempts,
          startedAt: new Date(stepStartedAt).toISOString(),
          finishedAt: new Date(finishedAt).toISOString(),
          durationMs: finishedAt - stepStartedAt,
          outputs: outcome.status === 'succeeded' ? outcome.outputs : {},
          error: outcome.status === 'failed' ? outcome.error : undefined,
        };
        results.push(result);
        this.callbacks.onStepComplete?.(result);

        if (outcome.status === 'failed') {
          recorded = await this.store.recordFailure(environment.name, {
            step: step.id,
            index,
            message: outcome.error.message,
            code: outcome.error instanceof DeploymentError ? outcome.error.code : undefined,
          });
          this.setState({ status: 'failed', step: index, stepId: step.id, error: outcome.error });
          return finish('failed', recorded.lastCompletedStep, {
            stepId: step.id,
            error: outcome.error,
          });
        }

        if (outcome.status === 'succeeded') {
          Object.assign(outputs, outcome.outputs);
          recorded = await this.store.recordStepSuccess(
            environment.name,
            { id: step.id, index, attempts: outcome.attempts },
            outcome.outputs
          );
        }
      }

      if (recorded.lastCompletedStep >= this.steps.length - 1) {
        recorded = await this.store.markSucceeded(environment.name);
      }
      this.setState({ status: 'succeeded' });
      return finish('succeeded', recorded.lastCompletedStep);
    } finally {
      await lock.release();
    }
  }

  private select(only?: string[]): PipelineStep[] {
    if (!only) {
      return this.steps;
    }
    for (const id of only) {
      if (!this.steps.some((step) => step.id === id)) {
        throw new ConfigurationError(`Unknown step '${id}'`);
      }
    }
    return this.steps.filter((step) => only.includes(step.id));
  }

  private async runStep(
    step: PipelineStep,
    environment: Environment,
    runOutputs: Record<string, string>,
    recorded: DeploymentState,
    runSignal: AbortSignal,
    confirmed: Set<string>
  ): Promise<StepOutcome> {
    const timeout = step.timeoutMs ? AbortSignal.timeout(step.timeoutMs) : undefined;
    const signal = combineSignals(runSignal, timeout);
    const stepOutputs: Record<string, string> = {};
    const stepLogger = createLogger(step.id);

    const context = (attempt: number): StepContext => ({
      environment,
      signal,
      outputs: { ...runOutputs, ...stepOutputs },
      attempt,
      logger: stepLogger,
      report: (message) => this.callbacks.onProgress?.(message),
    });

    const fail = (error: unknown, attempts: number, actionRan: boolean): StepOutcome => {
      let reported = toError(error);
      if (timeout?.aborted && !runSignal.aborted && !(reported instanceof PollTimeoutError)) {
        reported = new PollTimeoutError(`step ${step.id}`, {
          elapsedMs: step.timeoutMs ?? 0,
          cancelled: false,
          lastStatus: reported.message,
        });
      }
      return { status: 'failed', attempts, actionRan, error: reported };
    };

    if (runSignal.aborted) {
      return fail(new FatalActionError(`Run cancelled before '${step.id}'`), 0, false);
    }

    // 1. Precondition
    let precondition: CheckResult;
    try {
      precondition = await step.precondition(context(0));
    } catch (error) {
      return fail(error, 0, false);
    }
    if (!precondition.ok) {
      return fail(new PreconditionError(step.id, precondition.reason), 0, false);
    }

    // 2. Resume: already done and still true
    if (step.mutating && recorded.steps[step.id]) {
      let still: CheckResult;
      try {
        still = await step.postcondition(context(0));
      } catch (error) {
        still = { ok: false, reason: formatError(error) };
      }
      if (still.ok) {
        logger.debug(`${step.id}: recorded complete and postcondition holds, skipping`);
        return { status: 'skipped' };
      }
      logger.debug(`${step.id}: recorded complete but ${still.reason}; running again`);
    }

    // 3. Confirmation
    const request = step.confirmation?.(context(0));
    if (request && !confirmed.has(request.id)) {
      const accepted = await this.confirmations.confirm(request);
      if (!accepted) {
        return fail(new ConfirmationDeniedError(request.title), 0, false);
      }
      confirmed.add(request.id);
    }

    // 4. Action + postcondition with bounded retry
    const retryDelayMs = step.retryDelayMs ?? STEP_RETRY_DELAY_MS;
    for (let attempt = 1; ; attempt++) {
      let postcondition: CheckResult;
      try {
        const produced = await step.action(context(attempt));
        if (produced) {
          Object.assign(stepOutputs, produced);
        }
        postcondition = await step.postcondition(context(attempt));
      } catch (error) {
        if (!isRetryable(error) || attempt >= step.maxAttempts || signal.aborted) {
          return fail(error, attempt, true);
        }
        this.callbacks.onAttemptFailed?.(step, attempt, formatError(error), retryDelayMs);
        await this.clock.sleep(retryDelayMs, signal);
        continue;
      }

      if (postcondition.ok) {
        return { status: 'succeeded', attempts: attempt, outputs: { ...stepOutputs } };
      }

      if (attempt >= step.maxAttempts || signal.aborted) {
        return fail(new PostconditionError(step.id, postcondition.reason, attempt), attempt, true);
      }

      this.callbacks.onAttemptFailed?.(step, attempt, postcondition.reason, retryDelayMs);
      await this.clock.sleep(retryDelayMs, signal);
    }
  }
}

/**
 * Readiness Poller
 *
 * The single polling primitive used for every "wait until ready" need:
 * cluster status, controller pods, application sync and batch jobs.
 *
 * Contract:
 * - a terminal probe outcome (complete / failed) is returned immediately
 * - a probe keeps being invoked every `intervalMs` while it reports pending
 * - once `timeoutMs` has elapsed the poll returns `timed_out`; the last sleep is
 *   shortened so the total never exceeds `timeoutMs + intervalMs`
 * - an aborted signal returns `timed_out` with `cancelled: true` without waiting
 *   for the current interval to finish
 * - a retryable DeploymentError thrown by the probe counts as pending; any
 *   other error propagates
 */

import { DeploymentError, formatError } from '../../utils/errors.js';
import { systemClock } from '../../utils/helpers.js';
import type { PollOutcome, ProbeOutcome, CheckResult } from '../results/index.js';
import type { PollOptions, Probe } from './polling.types.js';

function detailOf(outcome: ProbeOutcome): string | undefined {
  return outcome.kind === 'failed' ? outcome.reason : outcome.detail;
}

/**
 * Repeatedly invoke `probe` until it reports a terminal outcome or the deadline passes
 */
export async function poll(probe: Probe, options: PollOptions): Promise<PollOutcome> {
  const clock = options.clock ?? systemClock;
  const { intervalMs, timeoutMs, signal } = options;
  const startedAt = clock.now();
  let lastDetail: string | undefined;
  let attempt = 0;

  const timedOut = (cancelled: boolean): PollOutcome => ({
    kind: 'timed_out',
    elapsedMs: clock.now() - startedAt,
    cancelled,
    lastDetail,
  });

  while (true) {
    if (signal?.aborted) {
      return timedOut(true);
    }

    attempt++;
    let outcome: ProbeOutcome;
    try {
      outcome = await probe({ attempt, signal });
    } catch (error) {
      // Only retryable orchestrator errors count as "not ready yet"
      if (!(error instanceof DeploymentError) || !error.retryable) {
        throw error;
      }
      outcome = { kind: 'pending', detail: formatError(error) };
    }

    if (outcome.kind !== 'pending') {
      return outcome;
    }

    lastDetail = detailOf(outcome) ?? lastDetail;

    const elapsed = clock.now() - startedAt;
    if (elapsed >= timeoutMs) {
      return timedOut(false);
    }

    options.onPending?.({ attempt, elapsedMs: elapsed, detail: outcome.detail });

    await clock.sleep(Math.min(intervalMs, timeoutMs - elapsed), signal);

    if (signal?.aborted) {
      return timedOut(true);
    }
  }
}

/**
 * Adapt a boolean or CheckResult readiness check into a probe
 */
export function untilReady(
  check: (signal?: AbortSignal) => Promise<boolean | CheckResult>
): Probe {
  return async ({ signal }) => {
    const result = await check(signal);
    if (typeof result === 'boolean') {
      return result ? { kind: 'complete' } : { kind: 'pending' };
    }
    return result.ok
      ? { kind: 'complete', detail: result.detail }
      : { kind: 'pending', detail: result.reason };
  };
}

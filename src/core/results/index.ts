/**
 * Results Module
 */

import type { CheckResult, PollOutcome, ProbeOutcome } from './results.types.js';

export function pending(detail?: string): ProbeOutcome {
  return { kind: 'pending', detail };
}

export function complete(detail?: string): ProbeOutcome {
  return { kind: 'complete', detail };
}

export function failed(reason: string): ProbeOutcome {
  return { kind: 'failed', reason };
}

/**
 * Terminal outcomes stop polling
 */
export function isTerminal(outcome: PollOutcome): boolean {
  return outcome.kind !== 'pending';
}

export function passed(detail?: string): CheckResult {
  return { ok: true, detail };
}

export function notMet(reason: string): CheckResult {
  return { ok: false, reason };
}

/**
 * Short human-readable description of an outcome
 */
export function describeOutcome(outcome: PollOutcome): string {
  switch (outcome.kind) {
    case 'pending':
      return outcome.detail ? `pending (${outcome.detail})` : 'pending';
    case 'complete':
      return outcome.detail ? `complete (${outcome.detail})` : 'complete';
    case 'failed':
      return `failed: ${outcome.reason}`;
    case 'timed_out':
      return outcome.cancelled ? 'cancelled' : 'timed out';
  }
}

export { ExitCode } from '../../utils/constants.js';

export type {
  PollOutcome,
  ProbeOutcome,
  CheckResult,
  StepStatus,
  StepResult,
} from './results.types.js';

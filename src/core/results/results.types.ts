/**
 * Result Vocabulary Types
 * Shared by the poller, the wave scheduler and the pipeline
 */

/**
 * Outcome of a single probe or of a whole poll
 */
export type PollOutcome =
  | { kind: 'pending'; detail?: string }
  | { kind: 'complete'; detail?: string }
  | { kind: 'failed'; reason: string }
  | { kind: 'timed_out'; elapsedMs: number; cancelled: boolean; lastDetail?: string };

/** What a probe may report; `timed_out` is only produced by the poller */
export type ProbeOutcome = Exclude<PollOutcome, { kind: 'timed_out' }>;

/**
 * Result of a precondition, postcondition or prerequisite check
 */
export type CheckResult = { ok: true; detail?: string } | { ok: false; reason: string };

export type StepStatus = 'succeeded' | 'skipped' | 'failed';

/**
 * Per-step record of one pipeline invocation
 */
export interface StepResult {
  index: number;
  id: string;
  name: string;
  status: StepStatus;
  /** Whether the step's action ran at least once */
  actionRan: boolean;
  attempts: number;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  outputs: Record<string, string>;
  error?: Error;
}

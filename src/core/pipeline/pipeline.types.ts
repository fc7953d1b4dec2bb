/**
 * Pipeline Domain Types
 */

import type { Environment } from '../../lib/environments.js';
import type { Logger } from '../../utils/logger.js';
import type { ExitCode } from '../../utils/constants.js';
import type { CheckResult, StepResult } from '../results/index.js';

/**
 * Everything a step sees while it runs
 */
export interface StepContext {
  environment: Environment;
  /** Aborts on run cancellation or when the step's own timeout expires */
  signal: AbortSignal;
  /** Outputs recorded by earlier steps plus those produced so far by this one */
  outputs: Readonly<Record<string, string>>;
  /** 1-based action attempt, 0 while evaluating the precondition */
  attempt: number;
  logger: Logger;
  report(message: string): void;
}

/**
 * A typed-phrase confirmation the operator must give before a mutating action
 */
export interface ConfirmationRequest {
  /** Requests sharing an id are asked once per invocation */
  id: string;
  title: string;
  message: string;
  expectedPhrase: string;
}

export interface ConfirmationProvider {
  confirm(request: ConfirmationRequest): Promise<boolean>;
}

export interface PipelineStep {
  id: string;
  name: string;
  /** Mutating steps are skipped when already recorded and their postcondition holds */
  mutating: boolean;
  /** Total attempts of action + postcondition, at least 1 */
  maxAttempts: number;
  timeoutMs?: number;
  retryDelayMs?: number;
  precondition(context: StepContext): Promise<CheckResult>;
  /** May return outputs to record */
  action(context: StepContext): Promise<Record<string, string> | void>;
  postcondition(context: StepContext): Promise<CheckResult>;
  confirmation?(context: StepContext): ConfirmationRequest | undefined;
}

export type PipelineState =
  | { status: 'not_started' }
  | { status: 'running'; step: number; stepId: string }
  | { status: 'succeeded' }
  | { status: 'failed'; step: number; stepId: string; error: Error };

export interface PipelineCallbacks {
  onStateChange?: (state: PipelineState) => void;
  onStepStart?: (step: PipelineStep, index: number, total: number) => void;
  onStepComplete?: (result: StepResult) => void;
  onAttemptFailed?: (step: PipelineStep, attempt: number, reason: string, delayMs: number) => void;
  onProgress?: (message: string) => void;
}

export interface PipelineRunOptions {
  /** Run only these step ids, in pipeline order */
  only?: string[];
  signal?: AbortSignal;
  /** Recorded as the lock owner */
  owner?: string;
}

export interface PipelineRunResult {
  runId: string;
  status: 'succeeded' | 'failed';
  steps: StepResult[];
  failedStep?: string;
  error?: Error;
  exitCode: ExitCode;
  lastCompletedStep: number;
  durationMs: number;
}

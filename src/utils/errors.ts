/**
 * Shared error handling utilities and the deployment error taxonomy
 */

import { ExitCode } from './constants.js';

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Checks if error message contains specific text (case-insensitive)
 */
export function isErrorMessage(error: unknown, fragment: string): boolean {
  return formatError(error).toLowerCase().includes(fragment.toLowerCase());
}

// ============================================================================
// Taxonomy
// ============================================================================

export type DeploymentErrorCode =
  | 'VALIDATION_FAILED'
  | 'PRECONDITION_FAILED'
  | 'CONFIGURATION_INVALID'
  | 'LOCK_HELD'
  | 'LOCK_STALE'
  | 'TRANSIENT_ACTION_FAILURE'
  | 'FATAL_ACTION_FAILURE'
  | 'POLL_TIMEOUT'
  | 'POSTCONDITION_FAILED'
  | 'JOB_FAILED'
  | 'CONFIRMATION_DENIED';

/**
 * Base class for every error the orchestrator raises on purpose.
 */
export class DeploymentError extends Error {
  readonly code: DeploymentErrorCode;
  readonly retryable: boolean;
  readonly exitCode: ExitCode;

  constructor(
    code: DeploymentErrorCode,
    message: string,
    options: { retryable?: boolean; exitCode?: ExitCode; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.exitCode = options.exitCode ?? ExitCode.ACTION_FAILED;
  }
}

/**
 * One unmet prerequisite
 */
export interface RequirementFailure {
  name: string;
  reason: string;
  hint?: string;
}

export class ValidationError extends DeploymentError {
  readonly failures: RequirementFailure[];

  constructor(failures: RequirementFailure[]) {
    const lines = failures.map((f) => `  - ${f.name}: ${f.reason}`);
    super(
      'VALIDATION_FAILED',
      `${failures.length} prerequisite(s) not met:\n${lines.join('\n')}`,
      { exitCode: ExitCode.PRECONDITION_FAILED }
    );
    this.failures = failures;
  }
}

export class PreconditionError extends DeploymentError {
  readonly stepId: string;

  constructor(stepId: string, reason: string) {
    super('PRECONDITION_FAILED', `Precondition for '${stepId}' not met: ${reason}`, {
      exitCode: ExitCode.PRECONDITION_FAILED,
    });
    this.stepId = stepId;
  }
}

export class ConfigurationError extends DeploymentError {
  constructor(message: string) {
    super('CONFIGURATION_INVALID', message, { exitCode: ExitCode.PRECONDITION_FAILED });
  }
}

export class LockError extends DeploymentError {
  readonly environment: string;

  constructor(code: 'LOCK_HELD' | 'LOCK_STALE', environment: string, message: string) {
    super(code, message, { exitCode: ExitCode.PRECONDITION_FAILED });
    this.environment = environment;
  }
}

export class TransientActionError extends DeploymentError {
  constructor(message: string, cause?: unknown) {
    super('TRANSIENT_ACTION_FAILURE', message, { retryable: true, cause });
  }
}

export class FatalActionError extends DeploymentError {
  constructor(message: string, cause?: unknown) {
    super('FATAL_ACTION_FAILURE', message, { cause });
  }
}

export class PollTimeoutError extends DeploymentError {
  readonly subject: string;
  readonly lastStatus?: string;
  readonly logExcerpt?: string;
  readonly cancelled: boolean;

  constructor(
    subject: string,
    details: { elapsedMs: number; cancelled: boolean; lastStatus?: string; logExcerpt?: string }
  ) {
    const what = details.cancelled ? 'was cancelled' : 'timed out';
    const seconds = Math.round(details.elapsedMs / 1000);
    const status = details.lastStatus ? ` (last status: ${details.lastStatus})` : '';
    super('POLL_TIMEOUT', `Waiting for ${subject} ${what} after ${seconds}s${status}`);
    this.subject = subject;
    this.lastStatus = details.lastStatus;
    this.logExcerpt = details.logExcerpt;
    this.cancelled = details.cancelled;
  }
}

export class PostconditionError extends DeploymentError {
  readonly stepId: string;
  readonly attempts: number;

  constructor(stepId: string, reason: string, attempts: number) {
    super(
      'POSTCONDITION_FAILED',
      `Postcondition for '${stepId}' still not met after ${attempts} attempt(s): ${reason}`
    );
    this.stepId = stepId;
    this.attempts = attempts;
  }
}

export class JobFailedError extends DeploymentError {
  readonly jobName: string;
  readonly wave: number;
  readonly logExcerpt?: string;

  constructor(jobName: string, wave: number, reason: string, logExcerpt?: string) {
    super('JOB_FAILED', `Job '${jobName}' (wave ${wave}) failed: ${reason}`);
    this.jobName = jobName;
    this.wave = wave;
    this.logExcerpt = logExcerpt;
  }
}

export class ConfirmationDeniedError extends DeploymentError {
  constructor(title: string) {
    super('CONFIRMATION_DENIED', `Confirmation declined: ${title}`, {
      exitCode: ExitCode.CONFIRMATION_DECLINED,
    });
  }
}

/**
 * Whether an error may be retried by a bounded retry loop
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof DeploymentError && error.retryable;
}

/**
 * Maps any thrown value onto the CLI exit code
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof DeploymentError) {
    return error.exitCode;
  }
  return ExitCode.ACTION_FAILED;
}

/**
 * Extracts a log excerpt from errors that carry one
 */
export function logExcerptOf(error: unknown): string | undefined {
  if (error instanceof PollTimeoutError || error instanceof JobFailedError) {
    return error.logExcerpt;
  }
  return undefined;
}

/**
 * Deployment State Types
 */

export type RunStatus = 'not_started' | 'in_progress' | 'succeeded' | 'failed';

export interface StepRecord {
  id: string;
  index: number;
  completedAt: string;
  attempts: number;
}

export interface FailureRecord {
  step: string;
  index: number;
  message: string;
  code?: string;
  at: string;
}

/**
 * Persisted progress of one environment
 */
export interface DeploymentState {
  environment: string;
  /** 0-based index of the last step completed in order, -1 when none */
  lastCompletedStep: number;
  updatedAt: string;
  status: RunStatus;
  /** Values produced by steps (infrastructure outputs, cluster name, ...) */
  outputs: Record<string, string>;
  steps: Record<string, StepRecord>;
  lastFailure?: FailureRecord;
  runId?: string;
  lastForceUnlockAt?: string;
}

export interface LockInfo {
  environment: string;
  owner: string;
  pid: number;
  hostname: string;
  runId: string;
  acquiredAt: string;
}

export interface LockHandle {
  info: LockInfo;
  release(): Promise<void>;
}

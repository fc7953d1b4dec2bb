/**
 * Job Domain Types
 */

import type { ManifestPayload } from '../../services/ClusterService.js';
import type { Clock } from '../../utils/helpers.js';

/**
 * A batch job declared with the wave it belongs to
 */
export interface JobSpec {
  name: string;
  /** Non-negative; lower waves run first */
  wave: number;
  namespace: string;
  payload: ManifestPayload;
  pollTimeoutMs?: number;
  pollIntervalMs?: number;
}

export interface Wave {
  wave: number;
  jobs: JobSpec[];
}

/**
 * Jobs plus the shared resources (ConfigMaps, RBAC) they need
 */
export interface JobPlan {
  namespace: string;
  setup: ManifestPayload[];
  jobs: JobSpec[];
}

export type JobOutcomeStatus = 'complete' | 'failed' | 'timed_out';

export interface JobOutcome {
  job: string;
  wave: number;
  status: JobOutcomeStatus;
  reason?: string;
  elapsedMs: number;
  cancelled?: boolean;
  /** Tail of the job's pod logs, fetched on failure or timeout */
  logExcerpt?: string;
  /** Error raised while submitting, kept so callers can classify it */
  error?: unknown;
}

export interface WaveRunResult {
  success: boolean;
  /** One entry per attempted job, in execution order */
  outcomes: JobOutcome[];
  failedJob?: JobOutcome;
  attemptedCount: number;
  /** Waves whose jobs all completed */
  completedWaves: number[];
}

export interface WaveSchedulerCallbacks {
  onWaveStart?: (wave: number, jobCount: number, index: number, totalWaves: number) => void;
  onJobStart?: (job: JobSpec) => void;
  onJobComplete?: (outcome: JobOutcome) => void;
  onProgress?: (message: string) => void;
}

export interface WaveSchedulerOptions {
  clock?: Clock;
  signal?: AbortSignal;
  defaults?: {
    pollTimeoutMs?: number;
    pollIntervalMs?: number;
  };
  logTailLines?: number;
  callbacks?: WaveSchedulerCallbacks;
}

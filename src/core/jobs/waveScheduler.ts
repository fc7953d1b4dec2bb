/**
 * Job Wave Scheduler
 *
 * Runs batch jobs one at a time, wave by wave:
 * - Wave N+1 starts only after every job of wave N completed
 * - Each job is deleted, re-applied and polled to a terminal state
 * - The first failure or timeout stops the run; later jobs are never submitted
 *
 * Later waves load data that depends on earlier ones, so nothing runs in parallel.
 */

import type { ClusterService } from '../../services/ClusterService.js';
import { poll } from '../polling/index.js';
import { complete, failed, pending } from '../results/index.js';
import type { ProbeOutcome } from '../results/index.js';
import {
  ConfigurationError,
  JobFailedError,
  PollTimeoutError,
  formatError,
} from '../../utils/errors.js';
import { systemClock } from '../../utils/helpers.js';
import type { Clock } from '../../utils/helpers.js';
import { createLogger } from '../../utils/logger.js';
import {
  DEFAULT_JOB_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  JOB_LOG_TAIL_LINES,
  JOB_NAME_LABEL,
} from '../../utils/constants.js';
import type {
  JobOutcome,
  JobPlan,
  JobSpec,
  Wave,
  WaveRunResult,
  WaveSchedulerCallbacks,
  WaveSchedulerOptions,
} from './jobs.types.js';

const logger = createLogger('jobs');

/**
 * Validate job specs and group them into ascending waves.
 * Declaration order is kept within a wave.
 */
export function groupIntoWaves(jobs: JobSpec[]): Wave[] {
  const seen = new Set<string>();
  const byWave = new Map<number, JobSpec[]>();

  for (const job of jobs) {
    if (!job.name || job.name.trim() === '') {
      throw new ConfigurationError('Job name must not be empty');
    }
    if (!Number.isInteger(job.wave) || job.wave < 0) {
      throw new ConfigurationError(
        `Job '${job.name}' has invalid wave ${job.wave} (non-negative integer required)`
      );
    }
    if (seen.has(job.name)) {
      throw new ConfigurationError(`Job '${job.name}' is declared more than once`);
    }
    seen.add(job.name);

    const wave = byWave.get(job.wave) ?? [];
    wave.push(job);
    byWave.set(job.wave, wave);
  }

  return [...byWave.entries()]
    .sort(([a], [b]) => a - b)
    .map(([wave, waveJobs]) => ({ wave, jobs: waveJobs }));
}

/**
 * Map a job's status onto a probe outcome
 */
export function jobProbeOutcome(status: {
  exists: boolean;
  conditions: Record<string, { status: string; reason?: string; message?: string }>;
  active?: number;
}): ProbeOutcome {
  if (!status.exists) {
    return failed('not found after submission');
  }

  if (status.conditions['Complete']?.status === 'True') {
    return complete();
  }

  const failure = status.conditions['Failed'];
  if (failure?.status === 'True') {
    return failed(failure.message ?? failure.reason ?? 'Failed');
  }

  return pending(`active=${status.active ?? 0}`);
}

export class WaveScheduler {
  private readonly cluster: ClusterService;
  private readonly clock: Clock;
  private readonly signal?: AbortSignal;
  private readonly pollTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly logTailLines: number;
  private readonly callbacks: WaveSchedulerCallbacks;

  constructor(cluster: ClusterService, options: WaveSchedulerOptions = {}) {
    this.cluster = cluster;
    this.clock = options.clock ?? systemClock;
    this.signal = options.signal;
    this.pollTimeoutMs = options.defaults?.pollTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.pollIntervalMs = options.defaults?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logTailLines = options.logTailLines ?? JOB_LOG_TAIL_LINES;
    this.callbacks = options.callbacks ?? {};
  }

  /**
   * Apply the plan's shared resources, then run its jobs
   */
  async runPlan(plan: JobPlan): Promise<WaveRunResult> {
    for (const manifest of plan.setup) {
      this.callbacks.onProgress?.(`Applying shared job resources (${manifest.kind})`);
      await this.cluster.applyManifest(manifest, { namespace: plan.namespace, signal: this.signal });
    }
    return this.run(plan.jobs);
  }

  /**
   * Run all jobs in wave order and stop at the first one that does not complete
   */
  async run(jobs: JobSpec[]): Promise<WaveRunResult> {
    const waves = groupIntoWaves(jobs);
    const outcomes: JobOutcome[] = [];
    const completedWaves: number[] = [];

    for (let index = 0; index < waves.length; index++) {
      const { wave, jobs: waveJobs } = waves[index];
      this.callbacks.onWaveStart?.(wave, waveJobs.length, index, waves.length);
      this.callbacks.onProgress?.(
        `Wave ${wave} (${index + 1}/${waves.length}): ${waveJobs.length} job(s)`
      );

      for (const job of waveJobs) {
        this.callbacks.onJobStart?.(job);
        const outcome = await this.runJob(job);
        outcomes.push(outcome);
        this.callbacks.onJobComplete?.(outcome);

        if (outcome.status !== 'complete') {
          logger.debug(`Stopping after ${job.name}: ${outcome.status}`);
          return {
            success: false,
            outcomes,
            failedJob: outcome,
            attemptedCount: outcomes.length,
            completedWaves,
          };
        }
      }

      completedWaves.push(wave);
    }

    return { success: true, outcomes, attemptedCount: outcomes.length, completedWaves };
  }

  private async runJob(job: JobSpec): Promise<JobOutcome> {
    const startedAt = this.clock.now();
    const elapsed = () => this.clock.now() - startedAt;

    try {
      // Jobs are immutable once created: remove the previous run before re-applying
      await this.cluster.deleteResource('job', job.name, job.namespace, this.signal);
      await this.cluster.applyManifest(job.payload, {
        namespace: job.namespace,
        signal: this.signal,
      });
    } catch (error) {
      return {
        job: job.name,
        wave: job.wave,
        status: 'failed',
        reason: `submission failed: ${formatError(error)}`,
        elapsedMs: elapsed(),
        error,
      };
    }

    const outcome = await poll(
      async ({ signal }) =>
        jobProbeOutcome(
          await this.cluster.getResourceStatus('job', job.name, job.namespace, signal)
        ),
      {
        intervalMs: job.pollIntervalMs ?? this.pollIntervalMs,
        timeoutMs: job.pollTimeoutMs ?? this.pollTimeoutMs,
        signal: this.signal,
        clock: this.clock,
        onPending: ({ elapsedMs, detail }) =>
          this.callbacks.onProgress?.(
            `${job.name}: waiting (${Math.round(elapsedMs / 1000)}s${detail ? `, ${detail}` : ''})`
          ),
      }
    );

    switch (outcome.kind) {
      case 'complete':
        return { job: job.name, wave: job.wave, status: 'complete', elapsedMs: elapsed() };
      case 'failed':
        return {
          job: job.name,
          wave: job.wave,
          status: 'failed',
          reason: outcome.reason,
          elapsedMs: elapsed(),
          logExcerpt: await this.fetchLogs(job),
        };
      case 'pending':
      case 'timed_out': {
        const cancelled = outcome.kind === 'timed_out' && outcome.cancelled;
        return {
          job: job.name,
          wave: job.wave,
          status: 'timed_out',
          reason: outcome.kind === 'timed_out' ? outcome.lastDetail : outcome.detail,
          cancelled,
          elapsedMs: elapsed(),
          logExcerpt: cancelled ? undefined : await this.fetchLogs(job),
        };
      }
    }
  }

  private async fetchLogs(job: JobSpec): Promise<string | undefined> {
    try {
      return await this.cluster.getLogs(
        job.namespace,
        `${JOB_NAME_LABEL}=${job.name}`,
        this.logTailLines,
        this.signal
      );
    } catch (error) {
      logger.warn(`Could not fetch logs for ${job.name}: ${formatError(error)}`);
      return undefined;
    }
  }
}

/**
 * Convert a failed run into the error the pipeline reports
 */
export function assertWaveSuccess(result: WaveRunResult): void {
  const failedJob = result.failedJob;
  if (result.success || !failedJob) {
    return;
  }

  if (failedJob.error !== undefined) {
    throw failedJob.error;
  }

  if (failedJob.status === 'timed_out') {
    throw new PollTimeoutError(`job ${failedJob.job} (wave ${failedJob.wave})`, {
      elapsedMs: failedJob.elapsedMs,
      cancelled: failedJob.cancelled ?? false,
      lastStatus: failedJob.reason,
      logExcerpt: failedJob.logExcerpt,
    });
  }

  throw new JobFailedError(
    failedJob.job,
    failedJob.wave,
    failedJob.reason ?? 'Failed',
    failedJob.logExcerpt
  );
}

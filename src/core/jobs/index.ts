/**
 * Jobs Module
 * Wave-ordered, one-at-a-time execution of batch jobs
 */

export { WaveScheduler, groupIntoWaves, jobProbeOutcome, assertWaveSuccess } from './waveScheduler.js';
export { loadJobSpecs, parseJobPlan } from './jobFile.js';

export type {
  JobSpec,
  JobPlan,
  Wave,
  JobOutcome,
  JobOutcomeStatus,
  WaveRunResult,
  WaveSchedulerCallbacks,
  WaveSchedulerOptions,
} from './jobs.types.js';

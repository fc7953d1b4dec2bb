/**
 * Progress Tracking
 * Handles pipeline and job-wave progress callbacks and spinner state
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { CLI_CONSTANTS, formatDuration } from '../../utils.js';
import type { PipelineCallbacks, PipelineStep } from '../../../core/pipeline/index.js';
import type { StepResult } from '../../../core/results/index.js';
import type { JobOutcome, JobSpec, WaveSchedulerCallbacks } from '../../../core/jobs/index.js';

/**
 * Deployment progress handler with stateful spinner
 */
export class DeploymentProgressHandler {
  private spinner: Ora;
  private currentStep?: PipelineStep;
  private totalSteps: number = 0;

  constructor() {
    this.spinner = ora({ text: 'Preparing deployment...', color: 'cyan' });
  }

  /**
   * Get callbacks object for DeploymentPipeline
   */
  public getCallbacks(): PipelineCallbacks {
    return {
      onStepStart: this.onStepStart.bind(this),
      onStepComplete: this.onStepComplete.bind(this),
      onAttemptFailed: this.onAttemptFailed.bind(this),
      onProgress: this.onProgress.bind(this),
    };
  }

  /**
   * Get callbacks object for the WaveScheduler
   */
  public getJobCallbacks(): WaveSchedulerCallbacks {
    return {
      onWaveStart: this.onWaveStart.bind(this),
      onJobStart: this.onJobStart.bind(this),
      onJobComplete: this.onJobComplete.bind(this),
    };
  }

  /**
   * Stop the spinner (before printing a failure or a prompt)
   */
  public stop(): void {
    this.spinner.stop();
  }

  private stepLabel(index: number): string {
    return chalk.gray(`[${index + 1}/${this.totalSteps}] `);
  }

  /**
   * Called when a step starts
   */
  private onStepStart(step: PipelineStep, index: number, total: number): void {
    this.currentStep = step;
    this.totalSteps = total;
    this.spinner.start(this.stepLabel(index) + chalk.white(step.name));
  }

  /**
   * Called when a step finishes (succeeded, skipped or failed)
   */
  private onStepComplete(result: StepResult): void {
    const label = this.stepLabel(result.index);
    const name = chalk.white(result.name.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH));

    switch (result.status) {
      case 'succeeded': {
        const retries = result.attempts > 1 ? chalk.yellow(` (${result.attempts} attempts)`) : '';
        this.spinner.stopAndPersist({
          symbol: chalk.green('✓'),
          text: label + name + chalk.gray(formatDuration(result.durationMs)) + retries,
        });
        break;
      }
      case 'skipped':
        this.spinner.stopAndPersist({
          symbol: chalk.blue('↻'),
          text: label + name + chalk.gray('already done'),
        });
        break;
      case 'failed':
        this.spinner.stopAndPersist({
          symbol: chalk.red('✗'),
          text: label + name + chalk.red('failed'),
        });
        break;
    }
    this.currentStep = undefined;
  }

  /**
   * Called before a step is retried
   */
  private onAttemptFailed(step: PipelineStep, attempt: number, reason: string, delayMs: number): void {
    this.spinner.stopAndPersist({
      symbol: chalk.yellow('⚠'),
      text: chalk.yellow(
        `${step.name}: attempt ${attempt}/${step.maxAttempts} failed (${reason}); retrying in ${formatDuration(delayMs)}`
      ),
    });
    this.spinner.start(chalk.white(step.name));
  }

  /**
   * Called with progress messages
   */
  private onProgress(message: string): void {
    const prefix = this.currentStep ? chalk.white(`${this.currentStep.name}: `) : '';
    this.spinner.text = prefix + chalk.gray(message);
  }

  /**
   * Called when a job wave starts
   */
  private onWaveStart(wave: number, jobCount: number, index: number, total: number): void {
    this.spinner.stopAndPersist({
      symbol: chalk.cyan('›'),
      text: chalk.cyan(`Wave ${wave}`) + chalk.gray(` (${index + 1}/${total}, ${jobCount} job(s))`),
    });
    this.spinner.start();
  }

  /**
   * Called when a job is submitted
   */
  private onJobStart(job: JobSpec): void {
    this.spinner.text = chalk.gray('Running job ') + chalk.cyan(job.name);
  }

  /**
   * Called when a job reaches a terminal state
   */
  private onJobComplete(outcome: JobOutcome): void {
    const name = chalk.white(`  ${outcome.job}`.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH));
    if (outcome.status === 'complete') {
      this.spinner.stopAndPersist({
        symbol: chalk.green('  ✓'),
        text: name + chalk.gray(formatDuration(outcome.elapsedMs)),
      });
    } else {
      this.spinner.stopAndPersist({
        symbol: chalk.red('  ✗'),
        text: name + chalk.red(outcome.status === 'timed_out' ? 'timed out' : outcome.reason ?? 'failed'),
      });
    }
    this.spinner.start();
  }
}

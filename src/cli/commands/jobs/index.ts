/**
 * Run Jobs Command
 * Runs an environment's data jobs wave by wave, outside the full pipeline
 */

import { randomUUID } from 'crypto';
import { resolve } from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { WaveScheduler, assertWaveSuccess, loadJobSpecs } from '../../../core/jobs/index.js';
import type { WaveRunResult } from '../../../core/jobs/index.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { currentUser } from '../../../utils/helpers.js';
import {
  CLI_CONSTANTS,
  createCancellation,
  createCommandContext,
  exitWithFailure,
  formatDuration,
} from '../../utils.js';
import type { GlobalOptions } from '../../utils.js';
import { DeploymentProgressHandler } from '../deploy/progress.js';

interface RunJobsOptions extends GlobalOptions {
  file?: string;
}

/**
 * Display the per-job summary
 */
export function displayWaveSummary(result: WaveRunResult): void {
  const elapsed = result.outcomes.reduce((sum, outcome) => sum + outcome.elapsedMs, 0);
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log(
    chalk.gray('  Jobs attempted:  ') +
      chalk.white(result.attemptedCount) +
      chalk.gray('   Waves completed: ') +
      chalk.white(result.completedWaves.length) +
      chalk.gray('   Time: ') +
      chalk.white(formatDuration(elapsed))
  );
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log();
}

/**
 * Register the run-jobs command with the CLI program
 */
export function registerRunJobsCommand(program: Command): void {
  program
    .command('run-jobs <env>')
    .description('Run batch jobs in wave order, one at a time, stopping at the first failure')
    .option('-f, --file <jobs.yaml>', 'Job file (defaults to the environment\'s configured job file)')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--state-dir <dir>', 'Directory for state, locks and failure logs')
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string, options: RunJobsOptions) => {
      let stateDir: string | undefined;
      const cancellation = createCancellation();
      try {
        const context = await createCommandContext(envName, options);
        stateDir = context.stateDir;

        const file = options.file ?? context.env.jobs?.file;
        if (!file) {
          throw new ConfigurationError(
            `No job file configured for '${envName}'; pass --file <jobs.yaml>`
          );
        }

        const plan = await loadJobSpecs(resolve(file), context.env.namespace);
        console.log(chalk.bold.white(`\n⚙️  Data jobs for ${context.env.name}`) + chalk.gray(` (${plan.jobs.length} job(s) in ${plan.namespace})`));
        console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));

        const lock = await context.store.acquireLock(envName, currentUser(), randomUUID());
        const progress = new DeploymentProgressHandler();
        let result: WaveRunResult;
        try {
          const scheduler = new WaveScheduler(context.cluster, {
            signal: cancellation.signal,
            defaults: {
              pollTimeoutMs: context.settings.jobTimeoutMs,
              pollIntervalMs: context.settings.pollIntervalMs,
            },
            callbacks: progress.getJobCallbacks(),
          });
          result = await scheduler.runPlan(plan);
        } finally {
          progress.stop();
          await lock.release();
        }

        displayWaveSummary(result);
        assertWaveSuccess(result);
        console.log(chalk.green(`✓ All ${result.attemptedCount} job(s) completed\n`));
      } catch (error) {
        await exitWithFailure(error, 'Data jobs failed', stateDir, {
          environment: envName,
          operation: 'run-jobs',
        });
      } finally {
        cancellation.dispose();
      }
    });
}

/**
 * Deploy Commands
 * `deploy <env>` runs the whole pipeline, `deploy-step <env> <step>` a single step
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { DeploymentPipeline, buildDeploymentSteps } from '../../../core/pipeline/index.js';
import type { PipelineRunResult } from '../../../core/pipeline/index.js';
import { createHttpClient } from '../../../core/verification/index.js';
import {
  confirmationProviderFor,
  createCancellation,
  createCommandContext,
  exitWithFailure,
  stepTimeouts,
} from '../../utils.js';
import type { CommandContext, GlobalOptions } from '../../utils.js';
import {
  displayConfiguration,
  displayDeploymentHeader,
  displayOutputs,
  displayResumeHint,
  displayStepList,
  displayStepsHeader,
  displaySuccessBanner,
} from './display.js';
import { DeploymentProgressHandler } from './progress.js';

interface DeployOptions extends GlobalOptions {
  confirm?: string;
}

/**
 * Build the canonical pipeline for a command context
 */
function createPipeline(
  context: CommandContext,
  options: DeployOptions,
  progress: DeploymentProgressHandler
): DeploymentPipeline {
  const steps = buildDeploymentSteps({
    validator: context.validator,
    infrastructure: context.infrastructure,
    cloud: context.cloud,
    cluster: context.cluster,
    gitops: context.gitops,
    http: createHttpClient(),
    timeouts: stepTimeouts(context.settings),
    jobCallbacks: progress.getJobCallbacks(),
  });

  return new DeploymentPipeline(steps, {
    store: context.store,
    confirmations: confirmationProviderFor(options.confirm),
    callbacks: progress.getCallbacks(),
  });
}

/**
 * Run the pipeline and report; exits non-zero on failure
 */
async function runAndReport(
  context: CommandContext,
  pipeline: DeploymentPipeline,
  progress: DeploymentProgressHandler,
  only?: string[]
): Promise<PipelineRunResult> {
  const cancellation = createCancellation();
  let result: PipelineRunResult;
  try {
    result = await pipeline.run(context.env, { only, signal: cancellation.signal });
  } finally {
    cancellation.dispose();
    progress.stop();
  }

  if (result.status === 'failed') {
    const failed = result.steps.find((step) => step.status === 'failed');
    displayResumeHint(context.env, result);
    await exitWithFailure(result.error, 'Deployment failed', context.stateDir, {
      environment: context.env.name,
      operation: only ? `deploy-step ${only.join(',')}` : 'deploy',
      step: result.failedStep,
      additionalInfo: {
        runId: result.runId,
        attempts: failed?.attempts,
        lastCompletedStep: result.lastCompletedStep,
      },
    });
  }

  return result;
}

/**
 * Register the deploy command with the CLI program
 */
export function registerDeployCommand(program: Command): void {
  program
    .command('deploy <env>')
    .description('Run the full deployment pipeline for an environment (resumes after failures)')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--state-dir <dir>', 'Directory for state, locks and failure logs')
    .option('--confirm <phrase>', 'Confirmation phrase for protected environments (e.g. DEPLOY_PROD)')
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string, options: DeployOptions) => {
      let stateDir: string | undefined;
      try {
        const context = await createCommandContext(envName, options);
        stateDir = context.stateDir;

        displayDeploymentHeader(context.env);
        displayConfiguration(context.env, await context.store.load(envName));
        displayStepsHeader();

        const progress = new DeploymentProgressHandler();
        const pipeline = createPipeline(context, options, progress);
        const result = await runAndReport(context, pipeline, progress);

        displaySuccessBanner(result);
        displayOutputs(await context.store.load(envName));
      } catch (error) {
        await exitWithFailure(error, 'Deployment failed', stateDir, {
          environment: envName,
          operation: 'deploy',
        });
      }
    });
}

/**
 * Register the deploy-step command with the CLI program
 */
export function registerDeployStepCommand(program: Command): void {
  program
    .command('deploy-step <env> [step]')
    .description('Run one pipeline step, by position (1-6) or id; lists the steps when omitted')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--state-dir <dir>', 'Directory for state, locks and failure logs')
    .option('--confirm <phrase>', 'Confirmation phrase for protected environments (e.g. DEPLOY_PROD)')
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string, selector: string | undefined, options: DeployOptions) => {
      let stateDir: string | undefined;
      try {
        const context = await createCommandContext(envName, options);
        stateDir = context.stateDir;

        const progress = new DeploymentProgressHandler();
        const pipeline = createPipeline(context, options, progress);

        if (!selector) {
          displayStepList(pipeline.getSteps());
          return;
        }

        const step = pipeline.resolveStep(selector);
        console.log(chalk.gray(`\nRunning step '${step.id}' on ${context.env.name}\n`));

        const result = await runAndReport(context, pipeline, progress, [step.id]);
        const outcome = result.steps[0];
        console.log(
          outcome?.status === 'skipped'
            ? chalk.blue(`\n↻ ${step.name}: already done, nothing to change\n`)
            : chalk.green(`\n✓ ${step.name} complete\n`)
        );
      } catch (error) {
        await exitWithFailure(error, 'Step failed', stateDir, {
          environment: envName,
          operation: `deploy-step ${selector ?? ''}`.trim(),
        });
      }
    });
}

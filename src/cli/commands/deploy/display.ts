/**
 * Display Functions
 * Handles all UI output for the deploy and deploy-step commands
 */

import chalk from 'chalk';
import { CLI_CONSTANTS, formatDuration } from '../../utils.js';
import type { Environment } from '../../../lib/environments.js';
import type { PipelineRunResult, PipelineStep } from '../../../core/pipeline/index.js';
import type { DeploymentState } from '../../../core/state/index.js';

/**
 * Display deployment header
 */
export function displayDeploymentHeader(env: Environment): void {
  const title = `GitOps Deployment: ${env.name}`;
  const width = 67;
  const left = Math.floor((width - title.length) / 2);

  console.log();
  console.log(chalk.cyan('╔' + '═'.repeat(width) + '╗'));
  console.log(
    chalk.cyan('║') +
      chalk.bold.white(' '.repeat(left) + title + ' '.repeat(width - left - title.length)) +
      chalk.cyan('║')
  );
  console.log(chalk.cyan('╚' + '═'.repeat(width) + '╝'));
  console.log();

  if (env.protected) {
    console.log(
      chalk.yellow.bold('⚠️  PROTECTED ENVIRONMENT') +
        chalk.yellow(` - changes require typing DEPLOY_${env.name.toUpperCase()}\n`)
    );
  }
}

/**
 * Display configuration summary
 */
export function displayConfiguration(env: Environment, state: DeploymentState | undefined): void {
  const { DIVIDER_LENGTH } = CLI_CONSTANTS;

  console.log(chalk.bold.white('📋 Configuration'));
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log(chalk.gray('  Cluster:         ') + chalk.cyan(`${env.clusterName} (${env.region})`));
  console.log(chalk.gray('  Namespace:       ') + chalk.cyan(env.namespace));
  console.log(chalk.gray('  Kubeconfig:      ') + chalk.white(env.kubeconfigPath));
  console.log(
    chalk.gray('  Infrastructure:  ') +
      chalk.white(`${env.infrastructure.workingDir} (${env.infrastructure.varFile})`)
  );
  if (env.jobs) {
    console.log(chalk.gray('  Data jobs:       ') + chalk.white(env.jobs.file));
  }
  if (state && state.lastCompletedStep >= 0) {
    console.log(
      chalk.gray('  Resuming:        ') +
        chalk.magenta(`${state.lastCompletedStep + 1} step(s) recorded complete`)
    );
  }
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log();
}

/**
 * Display the step plan heading
 */
export function displayStepsHeader(): void {
  console.log(chalk.bold.white('🚀 Deployment Steps'));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

/**
 * Display available steps (deploy-step help)
 */
export function displayStepList(steps: readonly PipelineStep[]): void {
  console.log(chalk.bold.white('📋 Steps'));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  steps.forEach((step, index) => {
    const number = chalk.gray(`${String(index + 1).padStart(2)}. `);
    const kind = step.mutating ? chalk.yellow('mutating') : chalk.gray('read-only');
    console.log(`  ${number}${chalk.white(step.id.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH))} ${kind}`);
  });
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log();
}

/**
 * Display success banner
 */
export function displaySuccessBanner(result: PipelineRunResult): void {
  const skipped = result.steps.filter((step) => step.status === 'skipped').length;
  const ran = result.steps.length - skipped;

  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log();
  console.log(chalk.green('╔═══════════════════════════════════════════════════════════════════╗'));
  console.log(
    chalk.green('║') +
      chalk.bold.white('                       Deployment Complete!                        ') +
      chalk.green('║')
  );
  console.log(chalk.green('╚═══════════════════════════════════════════════════════════════════╝'));
  console.log();
  console.log(
    chalk.gray('  Steps run:       ') +
      chalk.white(ran) +
      (skipped > 0 ? chalk.gray(` (${skipped} already done)`) : '')
  );
  console.log(chalk.gray('  Duration:        ') + chalk.white(formatDuration(result.durationMs)));
  console.log();
}

/**
 * Display the outputs recorded for the environment
 */
export function displayOutputs(state: DeploymentState | undefined): void {
  if (!state || Object.keys(state.outputs).length === 0) {
    return;
  }

  console.log(chalk.bold.white('📦 Recorded Outputs'));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  for (const [key, value] of Object.entries(state.outputs)) {
    console.log(chalk.gray(`  ${key.padEnd(CLI_CONSTANTS.LABEL_WIDTH)}`) + chalk.cyan(value));
  }
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log();
}

/**
 * Display what to do after a failure
 */
export function displayResumeHint(env: Environment, result: PipelineRunResult): void {
  if (!result.failedStep) {
    return;
  }
  console.log(chalk.gray('  💡 Fix the cause, then resume with:'));
  console.log(chalk.cyan(`     gitops-orchestrator deploy ${env.name}`));
  console.log(chalk.gray('     or re-run only the failed step:'));
  console.log(chalk.cyan(`     gitops-orchestrator deploy-step ${env.name} ${result.failedStep}`));
  console.log();
}

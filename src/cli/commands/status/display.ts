/**
 * Display Functions
 * Handles UI output for the status command
 */

import chalk from 'chalk';
import { CLI_CONSTANTS } from '../../utils.js';
import type { EnvironmentStatus } from './collect.js';

const RUN_STATUS_COLORS = {
  not_started: chalk.gray,
  in_progress: chalk.yellow,
  succeeded: chalk.green,
  failed: chalk.red,
} as const;

/**
 * Display the status report
 */
export function displayStatus(status: EnvironmentStatus): void {
  const { DIVIDER_LENGTH } = CLI_CONSTANTS;
  const state = status.state;

  console.log(chalk.bold(`\n📊 Environment: ${status.environment}`) + (status.protected ? chalk.yellow(' (protected)') : ''));
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));

  if (!state) {
    console.log(chalk.gray('  No deployment recorded yet'));
  } else {
    const color = RUN_STATUS_COLORS[state.status];
    console.log(chalk.gray('  Status:          ') + color(state.status));
    console.log(chalk.gray('  Last updated:    ') + chalk.white(state.updatedAt));
    if (state.runId) {
      console.log(chalk.gray('  Last run:        ') + chalk.gray(state.runId));
    }
    if (state.lastFailure) {
      console.log(
        chalk.gray('  Last failure:    ') +
          chalk.red(`${state.lastFailure.step}: ${state.lastFailure.message}`)
      );
    }
  }

  if (status.lock) {
    console.log(
      chalk.gray('  Lock:            ') +
        chalk.yellow(
          `held by ${status.lock.owner} (pid ${status.lock.pid} on ${status.lock.hostname}) since ${status.lock.acquiredAt}`
        )
    );
  }
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log();

  // Steps
  console.log(chalk.bold.white('🪜 Steps'));
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  for (const step of status.steps) {
    const symbol = step.done ? chalk.green('✓') : chalk.gray('·');
    const number = chalk.gray(`${step.position}. `);
    const when = step.completedAt ? chalk.gray(step.completedAt) : '';
    console.log(`  ${symbol} ${number}${chalk.white(step.id.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH))}${when}`);
  }
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log();

  // Cluster and applications
  console.log(chalk.bold.white('☸️  Cluster'));
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log(
    chalk.gray('  Cluster:         ') +
      chalk.cyan(status.clusterName) +
      (status.clusterReachable ? chalk.green(' reachable') : chalk.red(' not reachable'))
  );

  if (status.applicationsError) {
    console.log(chalk.yellow(`  ⚠️  Could not read applications: ${status.applicationsError}`));
  } else if (status.clusterReachable && status.applications.length === 0) {
    console.log(chalk.gray('  No applications registered'));
  }

  for (const app of status.applications) {
    const symbol = app.converged ? chalk.green('✓') : chalk.yellow('○');
    const sync = app.sync === 'Synced' ? chalk.green(app.sync) : chalk.yellow(app.sync);
    const health = app.health === 'Healthy' ? chalk.green(app.health) : chalk.yellow(app.health);
    console.log(`  ${symbol} ${chalk.white(app.name.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH))}${sync} / ${health}`);
  }
  console.log(chalk.gray('─'.repeat(DIVIDER_LENGTH)));
  console.log();
}

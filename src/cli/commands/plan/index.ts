/**
 * Plan Command
 * Shows what applying the environment's infrastructure would change
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Command } from 'commander';
import { infraDeclaration } from '../../../core/pipeline/index.js';
import { isNoop } from '../../../services/index.js';
import type { ChangeSet } from '../../../services/index.js';
import { CLI_CONSTANTS, createCommandContext, exitWithFailure } from '../../utils.js';
import type { GlobalOptions } from '../../utils.js';

const ACTION_SYMBOLS: Record<ChangeSet['resources'][number]['action'], string> = {
  create: chalk.green('+'),
  update: chalk.yellow('~'),
  delete: chalk.red('-'),
  replace: chalk.magenta('±'),
};

/**
 * Display a change set
 */
export function displayChangeSet(envName: string, changes: ChangeSet): void {
  console.log(chalk.bold.white(`\n🧭 Infrastructure plan for ${envName}`));
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));

  if (isNoop(changes)) {
    console.log(chalk.green('  No changes. Infrastructure matches the declaration.'));
  } else {
    for (const resource of changes.resources) {
      console.log(`  ${ACTION_SYMBOLS[resource.action]} ${chalk.white(resource.address)}`);
    }
    console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
    console.log(
      chalk.green(`  ${changes.create} to create`) +
        chalk.gray(', ') +
        chalk.yellow(`${changes.update} to update`) +
        chalk.gray(', ') +
        chalk.magenta(`${changes.replace} to replace`) +
        chalk.gray(', ') +
        chalk.red(`${changes.delete} to delete`)
    );
  }
  console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  console.log();
}

/**
 * Register the plan command with the CLI program
 */
export function registerPlanCommand(program: Command): void {
  program
    .command('plan <env>')
    .description('Show the infrastructure changes a deploy would apply')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string, options: GlobalOptions) => {
      try {
        const context = await createCommandContext(envName, options);
        const spinner = ora(`Planning ${context.env.infrastructure.workingDir}...`).start();
        const changes = await context.infrastructure.planChanges(infraDeclaration(context.env));
        spinner.stop();
        displayChangeSet(context.env.name, changes);
      } catch (error) {
        await exitWithFailure(error, 'Plan failed', undefined, {
          environment: envName,
          operation: 'plan',
        });
      }
    });
}

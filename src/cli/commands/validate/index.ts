/**
 * Validate Prerequisites Command
 * Runs the prerequisite validator alone and lists every failure
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Command } from 'commander';
import { requirementsForEnvironment } from '../../../core/validation/index.js';
import { ValidationError } from '../../../utils/errors.js';
import { CLI_CONSTANTS, createCommandContext, exitWithFailure } from '../../utils.js';
import type { GlobalOptions } from '../../utils.js';

/**
 * Register the validate-prereqs command with the CLI program
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate-prereqs [env]')
    .description('Check required tools, credentials and files (defaults to dev)')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string | undefined, options: GlobalOptions) => {
      const name = envName ?? 'dev';
      try {
        const context = await createCommandContext(name, options);
        const requirements = requirementsForEnvironment(context.env, context.cloud);

        const spinner = ora(`Checking ${requirements.length} prerequisite(s)...`).start();
        const report = await context.validator.check(requirements);
        spinner.stop();

        console.log(chalk.bold.white(`\n🔎 Prerequisites for ${context.env.name}`));
        console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
        for (const pass of report.passed) {
          console.log(
            chalk.green('  ✓ ') +
              chalk.white(pass.name.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH)) +
              chalk.gray(pass.detail)
          );
        }
        for (const failure of report.failures) {
          console.log(
            chalk.red('  ✗ ') +
              chalk.white(failure.name.padEnd(CLI_CONSTANTS.STEP_NAME_WIDTH)) +
              chalk.red(failure.reason)
          );
          if (failure.hint) {
            console.log(chalk.gray(`      ${failure.hint}`));
          }
        }
        console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));

        if (!report.ok) {
          throw new ValidationError(report.failures);
        }
        console.log(chalk.green(`\n✓ All ${report.passed.length} prerequisite(s) met\n`));
      } catch (error) {
        await exitWithFailure(error, 'Prerequisites not met', undefined, {
          environment: name,
          operation: 'validate-prereqs',
        });
      }
    });
}

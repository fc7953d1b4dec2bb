/**
 * Destroy Command
 * Deletes applications and infrastructure of an environment
 */

import chalk from 'chalk';
import ora from 'ora';
import type { Command } from 'commander';
import { destroyEnvironment } from '../../../core/teardown/index.js';
import {
  CLI_CONSTANTS,
  confirmationProviderFor,
  createCancellation,
  createCommandContext,
  exitWithFailure,
} from '../../utils.js';
import type { GlobalOptions } from '../../utils.js';

interface DestroyOptions extends GlobalOptions {
  confirm?: string;
}

/**
 * Register the destroy command with the CLI program
 */
export function registerDestroyCommand(program: Command): void {
  program
    .command('destroy <env>')
    .description('Destroy all applications and infrastructure of an environment')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--state-dir <dir>', 'Directory for state, locks and failure logs')
    .option('--confirm <phrase>', 'Confirmation phrase (DESTROY-<env>)')
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string, options: DestroyOptions) => {
      let stateDir: string | undefined;
      const cancellation = createCancellation();
      try {
        const context = await createCommandContext(envName, options);
        stateDir = context.stateDir;

        console.log(chalk.red.bold(`\n🔥 Destroy ${context.env.name}`));
        console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));

        const spinner = ora({ color: 'red' });
        const result = await destroyEnvironment(
          context.env,
          { ...context, confirmations: confirmationProviderFor(options.confirm) },
          {
            signal: cancellation.signal,
            callbacks: {
              onPhaseStart: (phase) => spinner.start(phase),
              onPhaseComplete: (phase, detail) =>
                spinner.stopAndPersist({
                  symbol: chalk.green('✓'),
                  text: chalk.white(phase) + (detail ? chalk.gray(` (${detail})`) : ''),
                }),
              onProgress: (message) => {
                spinner.text = chalk.gray(message);
              },
            },
          }
        ).finally(() => spinner.stop());

        console.log(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
        console.log(
          chalk.green(`\n✓ ${context.env.name} destroyed`) +
            chalk.gray(
              ` (${result.deletedApplications.length} application(s) deleted, state record cleared)\n`
            )
        );
      } catch (error) {
        await exitWithFailure(error, 'Destroy failed', stateDir, {
          environment: envName,
          operation: 'destroy',
        });
      } finally {
        cancellation.dispose();
      }
    });
}

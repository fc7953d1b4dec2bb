/**
 * Status Command
 * Shows recorded progress, the lock holder and live sync/health of an environment
 */

import ora from 'ora';
import type { Command } from 'commander';
import { createCommandContext, exitWithFailure } from '../../utils.js';
import type { GlobalOptions } from '../../utils.js';
import { setSilentMode } from '../../../utils/logger.js';
import { collectStatus } from './collect.js';
import { displayStatus } from './display.js';

interface StatusOptions extends GlobalOptions {
  json?: boolean;
}

/**
 * Register the status command with the CLI program
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status <env>')
    .description('Show recorded state, lock holder and application sync/health')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--state-dir <dir>', 'Directory for state, locks and failure logs')
    .option('--json', 'Print machine-readable JSON', false)
    .option('--debug', 'Enable debug logging for verbose output', false)
    .action(async (envName: string, options: StatusOptions) => {
      try {
        if (options.json) {
          setSilentMode(true);
        }
        const context = await createCommandContext(envName, options);

        const spinner = options.json ? undefined : ora('Reading status...').start();
        const status = await collectStatus(context.env, context);
        spinner?.stop();

        if (options.json) {
          console.log(JSON.stringify(status, null, 2));
          return;
        }
        displayStatus(status);
      } catch (error) {
        await exitWithFailure(error, 'Status failed', undefined, {
          environment: envName,
          operation: 'status',
        });
      }
    });
}

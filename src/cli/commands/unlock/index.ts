/**
 * Unlock Command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { createCommandContext, exitWithFailure } from '../../utils.js';
import type { GlobalOptions } from '../../utils.js';

/**
 * Register the unlock command with the CLI program
 */
export function registerUnlockCommand(program: Command): void {
  program
    .command('unlock <env>')
    .description('Remove a stale environment lock left by an interrupted run')
    .option('-c, --config <file>', 'Environment configuration file')
    .option('--state-dir <dir>', 'Directory for state, locks and failure logs')
    .action(async (envName: string, options: GlobalOptions) => {
      try {
        const context = await createCommandContext(envName, options);
        const holder = await context.store.readLock(envName);
        const removed = await context.store.forceUnlock(envName);

        if (removed && holder) {
          console.log(
            chalk.green(`✓ Removed lock on ${envName}`) +
              chalk.gray(` (held by ${holder.owner}, pid ${holder.pid} on ${holder.hostname})`)
          );
        } else {
          console.log(chalk.gray(`No lock held on ${envName}`));
        }
      } catch (error) {
        await exitWithFailure(error, 'Unlock failed', undefined, {
          environment: envName,
          operation: 'unlock',
        });
      }
    });
}

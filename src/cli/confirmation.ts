/**
 * Interactive confirmation
 */

import chalk from 'chalk';
import { input } from '@inquirer/prompts';
import type { ConfirmationProvider, ConfirmationRequest } from '../core/pipeline/index.js';

/**
 * Ask the operator to type the expected phrase; anything else declines
 */
export class InquirerConfirmationProvider implements ConfirmationProvider {
  async confirm(request: ConfirmationRequest): Promise<boolean> {
    console.log();
    console.log(chalk.yellow.bold(`⚠️  ${request.title}`));
    console.log(chalk.yellow(`   ${request.message}`));
    console.log();

    try {
      const answer = await input({
        message: `Type ${chalk.bold(request.expectedPhrase)} to continue:`,
      });
      return answer.trim() === request.expectedPhrase;
    } catch (error) {
      // Ctrl+C while prompting
      if (error instanceof Error && error.name === 'ExitPromptError') {
        return false;
      }
      throw error;
    }
  }
}

/**
 * Error Logger - Write detailed failure logs to files for debugging
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { formatError, logExcerptOf, PollTimeoutError, DeploymentError } from './errors.js';
import { timestampForFilename } from './helpers.js';
import { LOGS_SUBDIR } from './constants.js';

export interface FailureContext {
  environment?: string;
  operation?: string;
  step?: string;
  job?: string;
  lastStatus?: string;
  logExcerpt?: string;
  additionalInfo?: Record<string, unknown>;
}

/**
 * Write detailed error log to `<stateDir>/logs`
 *
 * @returns Path to the log file
 */
export async function logError(
  error: unknown,
  stateDir: string,
  context: FailureContext = {},
  now: Date = new Date()
): Promise<string> {
  const logsDir = join(stateDir, LOGS_SUBDIR);
  await mkdir(logsDir, { recursive: true });
  const logFile = join(logsDir, `deployment-error-${timestampForFilename(now)}.log`);

  const lastStatus =
    context.lastStatus ?? (error instanceof PollTimeoutError ? error.lastStatus : undefined);
  const logExcerpt = context.logExcerpt ?? logExcerptOf(error);
  const stack = error instanceof Error ? error.stack : undefined;

  const logContent = [
    '='.repeat(70),
    `DEPLOYMENT ERROR LOG`,
    `Timestamp: ${now.toISOString()}`,
    '='.repeat(70),
    '',
    '## Error Details',
    '-'.repeat(70),
    `Message: ${formatError(error)}`,
  ];

  if (error instanceof DeploymentError) {
    logContent.push(`Code: ${error.code}`, `Exit code: ${error.exitCode}`);
  }

  logContent.push('', stack ? `Stack Trace:\n${stack}` : 'No stack trace available', '');

  const where = [
    context.environment && `Environment: ${context.environment}`,
    context.operation && `Operation: ${context.operation}`,
    context.step && `Step: ${context.step}`,
    context.job && `Job: ${context.job}`,
    lastStatus && `Last status: ${lastStatus}`,
  ].filter((line): line is string => typeof line === 'string');

  if (where.length > 0) {
    logContent.push('## Operation Context', '-'.repeat(70), ...where, '');
  }

  if (logExcerpt) {
    logContent.push('## Log Excerpt', '-'.repeat(70), logExcerpt, '');
  }

  if (context.additionalInfo) {
    logContent.push(
      '## Additional Information',
      '-'.repeat(70),
      JSON.stringify(context.additionalInfo, null, 2),
      ''
    );
  }

  logContent.push('='.repeat(70), `End of error log`, '='.repeat(70));

  await writeFile(logFile, logContent.join('\n'), 'utf-8');

  return logFile;
}

/**
 * Command Runner
 *
 * Runs an external CLI (kubectl, terraform, aws) and collects its output.
 * The child environment is passed explicitly on every call.
 */

import { spawn } from 'child_process';
import { FatalActionError, TransientActionError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('exec');

export interface CommandOptions {
  /** Extra variables merged over the parent environment */
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Written to stdin, then stdin is closed */
  input?: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  binary: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Spawn a process and resolve with its exit code and output.
 * A non-zero exit resolves normally; only a failure to start rejects.
 */
export const runCommand: CommandRunner = (binary, args, options = {}) => {
  logger.debug(`${binary} ${args.join(' ')}`);

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(binary, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      signal: options.signal,
      timeout: options.timeoutMs,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        reject(new FatalActionError(`Executable not found: ${binary}`, error));
        return;
      }
      if (error.name === 'AbortError') {
        reject(new TransientActionError(`${binary} was interrupted`, error));
        return;
      }
      reject(new FatalActionError(`Failed to run ${binary}: ${error.message}`, error));
    });

    child.on('close', (exitCode) => {
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      });
    });

    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });
};

/**
 * Retry utility with exponential backoff
 */

import { formatError, isRetryable, FatalActionError, TransientActionError } from './errors.js';
import { sleep } from './helpers.js';
import { createLogger } from './logger.js';

const logger = createLogger('retry');

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  signal?: AbortSignal;
  /** Injected wait, defaults to a real timer */
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const DEFAULT_OPTIONS = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/**
 * Retry a function with exponential backoff
 *
 * @param fn - Async function to retry, receives the 1-based attempt number
 * @param shouldRetry - Determines if an error is retryable (defaults to isRetryable)
 * @returns Result of the function
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
  shouldRetry: (error: unknown, attempt: number) => boolean = isRetryable
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  const multiplier = options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier;
  const wait = options.wait ?? sleep;
  let lastError: unknown;
  let delay = options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error, attempt)) {
        throw error;
      }

      if (attempt === maxAttempts) {
        break;
      }

      if (options.signal?.aborted) {
        break;
      }

      logger.warn(`Attempt ${attempt} failed: ${formatError(error)}`);
      logger.warn(`Retrying in ${delay}ms... (${attempt}/${maxAttempts})`);

      await wait(delay, options.signal);

      delay = Math.min(delay * multiplier, maxDelayMs);
    }
  }

  throw lastError;
}

// ============================================================================
// Command Failure Classification
// ============================================================================

// Connection-level failures: the request never reached a server that could
// judge it, so they win over any validation wording around them
const NETWORK_SIGNATURES = [
  'dial tcp',
  'i/o timeout',
  'failed to download openapi',
  'could not connect to the endpoint url',
  'connect timeout on endpoint url',
  'connection timed out',
  'connection refused',
  'connection reset',
  'econnrefused',
  'econnreset',
  'etimedout',
  'enotfound',
  'unable to connect to the server',
  'tls handshake',
  'unexpected eof',
  ': eof',
];

const FATAL_SIGNATURES = [
  'unauthorized',
  'forbidden',
  'accessdenied',
  'access denied',
  'invalidclienttokenid',
  'expiredtoken',
  'malformed',
  'validationerror',
  'validationexception',
  'invalid value',
  'invalid argument',
  'invalidparameter',
];

const TRANSIENT_SIGNATURES = [
  'timeout',
  'timed out',
  'network',
  'service unavailable',
  '429',
  'too many requests',
  'rate limit',
  'throttl',
  'error acquiring the state lock',
];

/**
 * Whether a failure message looks like a network, timeout or throttling problem
 */
export function isTransientFailureMessage(message: string): boolean {
  const lowerMsg = message.toLowerCase();

  if (NETWORK_SIGNATURES.some((signature) => lowerMsg.includes(signature))) {
    return true;
  }

  // Credential and malformed-input errors are never retried, even when a
  // transient word appears alongside them
  if (FATAL_SIGNATURES.some((signature) => lowerMsg.includes(signature))) {
    return false;
  }

  return TRANSIENT_SIGNATURES.some((signature) => lowerMsg.includes(signature));
}

export interface FailedCommand {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Turns a non-zero command exit into a transient or fatal action error
 */
export function classifyCommandFailure(
  result: FailedCommand,
  context: string
): TransientActionError | FatalActionError {
  const output = (result.stderr.trim() || result.stdout.trim()).split('\n').slice(-5).join('\n');
  const message = `${context} failed (exit ${result.exitCode ?? 'signal'}): ${output || 'no output'}`;

  if (isTransientFailureMessage(output)) {
    return new TransientActionError(message);
  }
  return new FatalActionError(message);
}

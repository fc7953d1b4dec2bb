/**
 * Environment Teardown
 *
 * 1. Typed confirmation `DESTROY-<env>` (every environment, never remembered)
 * 2. Delete GitOps applications while the cluster still answers, so the
 *    controller cascades deletion of their load balancers and volumes
 * 3. Destroy infrastructure, retried with exponential backoff
 * 4. Forget the recorded deployment state
 */

import { randomUUID } from 'crypto';
import type { Environment } from '../../lib/environments.js';
import { ConfirmationDeniedError, formatError, isErrorMessage, isRetryable } from '../../utils/errors.js';
import { retryWithBackoff } from '../../utils/retry.js';
import { RETRY_INITIAL_DELAY_MS, RETRY_MAX_ATTEMPTS, RETRY_MAX_DELAY_MS } from '../../utils/constants.js';
import { createLogger } from '../../utils/logger.js';
import { currentUser } from '../../utils/helpers.js';
import { infraDeclaration } from '../pipeline/index.js';
import type { ConfirmationRequest } from '../pipeline/index.js';
import type {
  TeardownDependencies,
  TeardownOptions,
  TeardownResult,
} from './teardown.types.js';

const logger = createLogger('teardown');

/**
 * Destroy also retries dependency ordering errors, which clear once the
 * dependent resource is gone
 */
export function isRetryableTeardownError(error: unknown): boolean {
  return isRetryable(error) || isErrorMessage(error, 'DependencyViolation');
}

export function destroyConfirmation(env: Environment): ConfirmationRequest {
  return {
    id: `destroy-${env.name}`,
    title: `Destroy ${env.name}`,
    message:
      `This permanently deletes every application, the cluster ${env.clusterName} ` +
      `and all infrastructure of '${env.name}'.`,
    expectedPhrase: `DESTROY-${env.name}`,
  };
}

export async function destroyEnvironment(
  env: Environment,
  deps: TeardownDependencies,
  options: TeardownOptions = {}
): Promise<TeardownResult> {
  const callbacks = options.callbacks ?? {};
  const retry = {
    maxAttempts: RETRY_MAX_ATTEMPTS,
    initialDelayMs: RETRY_INITIAL_DELAY_MS,
    maxDelayMs: RETRY_MAX_DELAY_MS,
    backoffMultiplier: 2,
    ...options.retry,
    signal: options.signal,
  };

  const request = destroyConfirmation(env);
  if (!(await deps.confirmations.confirm(request))) {
    throw new ConfirmationDeniedError(request.title);
  }

  const lock = await deps.store.acquireLock(
    env.name,
    options.owner ?? currentUser(),
    randomUUID()
  );

  try {
    const result: TeardownResult = {
      clusterWasReachable: false,
      deletedApplications: [],
      infrastructureDestroyed: false,
      stateCleared: false,
    };

    // Applications
    callbacks.onPhaseStart?.('Deleting applications');
    result.clusterWasReachable = await deps.cluster.isReachable(options.signal);
    if (result.clusterWasReachable) {
      const applications = await deps.gitops.listApplications(options.signal);
      for (const name of applications) {
        callbacks.onProgress?.(`Deleting application ${name}`);
        await retryWithBackoff(() => deps.gitops.deleteApplication(name, options.signal), retry);
        result.deletedApplications.push(name);
      }
      callbacks.onPhaseComplete?.(
        'Deleting applications',
        `${result.deletedApplications.length} deleted`
      );
    } else {
      logger.warn(`Cluster of '${env.name}' is not reachable; skipping application cleanup`);
      callbacks.onPhaseComplete?.('Deleting applications', 'cluster not reachable, skipped');
    }

    // Infrastructure
    callbacks.onPhaseStart?.('Destroying infrastructure');
    await retryWithBackoff(async (attempt) => {
      if (attempt > 1) {
        callbacks.onProgress?.(`Destroy attempt ${attempt}/${retry.maxAttempts}`);
      }
      await deps.infrastructure.destroy(infraDeclaration(env), options.signal);
    }, retry, isRetryableTeardownError);
    result.infrastructureDestroyed = true;

    const remaining = await deps.cloud
      .describeCluster(env.clusterName, env.region, options.signal)
      .then((description) => description.status)
      .catch((error: unknown) => `unknown (${formatError(error)})`);
    callbacks.onPhaseComplete?.('Destroying infrastructure', `cluster status: ${remaining}`);

    // State
    await deps.store.clear(env.name);
    result.stateCleared = true;

    return result;
  } finally {
    await lock.release();
  }
}

/**
 * Status Collection
 * Gathers recorded state, lock holder and live cluster/application status
 */

import type { Environment } from '../../../lib/environments.js';
import type { ClusterService } from '../../../services/ClusterService.js';
import type { GitOpsService, SyncStatus } from '../../../services/GitOpsService.js';
import { isConverged } from '../../../services/GitOpsService.js';
import { STEP_IDS } from '../../../core/pipeline/index.js';
import type { DeploymentState, LockInfo, StateStore } from '../../../core/state/index.js';
import { formatError } from '../../../utils/errors.js';

export interface StepStatusLine {
  position: number;
  id: string;
  done: boolean;
  completedAt?: string;
  attempts?: number;
}

export interface EnvironmentStatus {
  environment: string;
  protected: boolean;
  clusterName: string;
  state?: DeploymentState;
  steps: StepStatusLine[];
  lock?: LockInfo;
  clusterReachable: boolean;
  applications: Array<SyncStatus & { converged: boolean }>;
  applicationsError?: string;
}

export interface StatusSources {
  store: StateStore;
  cluster: ClusterService;
  gitops: GitOpsService;
}

export async function collectStatus(
  env: Environment,
  sources: StatusSources,
  signal?: AbortSignal
): Promise<EnvironmentStatus> {
  const state = await sources.store.load(env.name);
  const lock = await sources.store.readLock(env.name);

  const steps = STEP_IDS.map((id, index) => {
    const record = state?.steps[id];
    return {
      position: index + 1,
      id,
      done: record !== undefined,
      completedAt: record?.completedAt,
      attempts: record?.attempts,
    };
  });

  const status: EnvironmentStatus = {
    environment: env.name,
    protected: env.protected,
    clusterName: state?.outputs.clusterName ?? env.clusterName,
    state,
    steps,
    lock,
    clusterReachable: await sources.cluster.isReachable(signal),
    applications: [],
  };

  if (!status.clusterReachable) {
    return status;
  }

  try {
    const names =
      env.gitops.applications.length > 0
        ? env.gitops.applications
        : await sources.gitops.listApplications(signal);
    for (const name of names) {
      const sync = await sources.gitops.getSyncStatus(name, signal);
      status.applications.push({ ...sync, converged: isConverged(sync) });
    }
  } catch (error) {
    status.applicationsError = formatError(error);
  }

  return status;
}

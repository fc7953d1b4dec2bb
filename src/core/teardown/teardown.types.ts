/**
 * Teardown Domain Types
 */

import type { CloudService } from '../../services/CloudService.js';
import type { ClusterService } from '../../services/ClusterService.js';
import type { GitOpsService } from '../../services/GitOpsService.js';
import type { InfrastructureService } from '../../services/InfrastructureService.js';
import type { RetryOptions } from '../../utils/retry.js';
import type { StateStore } from '../state/index.js';
import type { ConfirmationProvider } from '../pipeline/index.js';

export interface TeardownDependencies {
  store: StateStore;
  cluster: ClusterService;
  gitops: GitOpsService;
  infrastructure: InfrastructureService;
  cloud: CloudService;
  confirmations: ConfirmationProvider;
}

export interface TeardownCallbacks {
  onPhaseStart?: (phase: string) => void;
  onPhaseComplete?: (phase: string, detail?: string) => void;
  onProgress?: (message: string) => void;
}

export interface TeardownOptions {
  signal?: AbortSignal;
  owner?: string;
  /** Backoff for the destroy commands; defaults to 3 attempts waiting 2s then 4s */
  retry?: RetryOptions;
  callbacks?: TeardownCallbacks;
}

export interface TeardownResult {
  clusterWasReachable: boolean;
  deletedApplications: string[];
  infrastructureDestroyed: boolean;
  stateCleared: boolean;
}

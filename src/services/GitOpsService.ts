/**
 * GitOpsService - Abstract base class for the GitOps-controller collaborator
 */

import type { ManifestPayload } from './ClusterService.js';

export interface ApplicationSpec {
  name: string;
  /** Manifest declaring the Application (or a directory of them) */
  manifest: ManifestPayload;
}

/**
 * Sync and health as reported by the controller, verbatim
 */
export interface SyncStatus {
  name: string;
  exists: boolean;
  /** Synced | OutOfSync | Unknown */
  sync: string;
  /** Healthy | Progressing | Degraded | Suspended | Missing | Unknown */
  health: string;
  message?: string;
}

export abstract class GitOpsService {
  abstract installController(signal?: AbortSignal): Promise<void>;

  abstract isControllerReady(signal?: AbortSignal): Promise<boolean>;

  abstract registerApplication(spec: ApplicationSpec, signal?: AbortSignal): Promise<void>;

  abstract getSyncStatus(appName: string, signal?: AbortSignal): Promise<SyncStatus>;

  abstract listApplications(signal?: AbortSignal): Promise<string[]>;

  abstract deleteApplication(appName: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Converged means Synced and Healthy
 */
export function isConverged(status: SyncStatus): boolean {
  return status.exists && status.sync === 'Synced' && status.health === 'Healthy';
}

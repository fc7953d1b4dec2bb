/**
 * Argo CD Service
 *
 * GitOpsService implemented on top of a ClusterService: the controller is
 * installed from its upstream manifest and Applications are plain custom
 * resources read back with `get -o json`.
 */

import { GitOpsService } from '../GitOpsService.js';
import type { ApplicationSpec, SyncStatus } from '../GitOpsService.js';
import type { ClusterService, ManifestPayload, ResourceStatus } from '../ClusterService.js';
import { asString, getPath } from '../../utils/helpers.js';
import { createLogger } from '../../utils/logger.js';
import {
  ARGOCD_DEPLOYMENTS,
  ARGOCD_INSTALL_MANIFEST_URL,
  ARGOCD_NAMESPACE,
  ARGOCD_STATEFULSETS,
} from '../../utils/constants.js';

const logger = createLogger('argocd');

const APPLICATION_KIND = 'applications.argoproj.io';

export interface ArgoCdOptions {
  namespace?: string;
  installManifestUrl?: string;
  /** Applied after the controller manifest (repository credentials, projects) */
  bootstrapManifests?: ManifestPayload[];
}

function isDeploymentAvailable(status: ResourceStatus): boolean {
  return status.exists && status.conditions['Available']?.status === 'True';
}

function isStatefulSetReady(status: ResourceStatus): boolean {
  const desired = status.replicas ?? 1;
  return status.exists && (status.readyReplicas ?? 0) >= desired;
}

/**
 * Read sync and health from an Application resource
 */
export function toSyncStatus(name: string, status: ResourceStatus): SyncStatus {
  if (!status.exists) {
    return { name, exists: false, sync: 'Unknown', health: 'Missing' };
  }

  const raw = status.raw;
  const message =
    asString(getPath(raw, 'status.operationState.message')) ??
    asString(getPath(raw, 'status.health.message'));

  return {
    name,
    exists: true,
    sync: asString(getPath(raw, 'status.sync.status')) ?? 'Unknown',
    health: asString(getPath(raw, 'status.health.status')) ?? 'Unknown',
    message,
  };
}

export class ArgoCdService extends GitOpsService {
  private readonly cluster: ClusterService;
  private readonly namespace: string;
  private readonly installManifestUrl: string;
  private readonly bootstrapManifests: ManifestPayload[];

  constructor(cluster: ClusterService, options: ArgoCdOptions = {}) {
    super();
    this.cluster = cluster;
    this.namespace = options.namespace ?? ARGOCD_NAMESPACE;
    this.installManifestUrl = options.installManifestUrl ?? ARGOCD_INSTALL_MANIFEST_URL;
    this.bootstrapManifests = options.bootstrapManifests ?? [];
  }

  async installController(signal?: AbortSignal): Promise<void> {
    await this.cluster.ensureNamespace(this.namespace, signal);
    await this.cluster.applyManifest(
      { kind: 'url', url: this.installManifestUrl },
      { namespace: this.namespace, signal }
    );

    for (const manifest of this.bootstrapManifests) {
      logger.debug(`Applying bootstrap manifest (${manifest.kind})`);
      await this.cluster.applyManifest(manifest, { namespace: this.namespace, signal });
    }
  }

  async isControllerReady(signal?: AbortSignal): Promise<boolean> {
    for (const name of ARGOCD_DEPLOYMENTS) {
      const status = await this.cluster.getResourceStatus('deployment', name, this.namespace, signal);
      if (!isDeploymentAvailable(status)) {
        logger.debug(`deployment/${name} not available yet`);
        return false;
      }
    }

    for (const name of ARGOCD_STATEFULSETS) {
      const status = await this.cluster.getResourceStatus(
        'statefulset',
        name,
        this.namespace,
        signal
      );
      if (!isStatefulSetReady(status)) {
        logger.debug(`statefulset/${name} not ready yet`);
        return false;
      }
    }

    return true;
  }

  async registerApplication(spec: ApplicationSpec, signal?: AbortSignal): Promise<void> {
    logger.debug(`Registering ${spec.name}`);
    await this.cluster.applyManifest(spec.manifest, { namespace: this.namespace, signal });
  }

  async getSyncStatus(appName: string, signal?: AbortSignal): Promise<SyncStatus> {
    const status = await this.cluster.getResourceStatus(
      APPLICATION_KIND,
      appName,
      this.namespace,
      signal
    );
    return toSyncStatus(appName, status);
  }

  async listApplications(signal?: AbortSignal): Promise<string[]> {
    const refs = await this.cluster.listResources(APPLICATION_KIND, this.namespace, signal);
    return refs.map((ref) => ref.name);
  }

  async deleteApplication(appName: string, signal?: AbortSignal): Promise<void> {
    await this.cluster.deleteResource(APPLICATION_KIND, appName, this.namespace, signal);
  }
}

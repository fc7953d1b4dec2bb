/**
 * External collaborators
 */

export { ClusterService } from './ClusterService.js';
export { InfrastructureService, isNoop } from './InfrastructureService.js';
export { GitOpsService, isConverged } from './GitOpsService.js';
export { CloudService } from './CloudService.js';
export { KubectlClusterService, parseResourceStatus } from './kubectl/KubectlClusterService.js';
export { TerraformService, parseChangeSet, parseOutputs } from './terraform/TerraformService.js';
export { ArgoCdService, toSyncStatus } from './argocd/ArgoCdService.js';
export { AwsCloudService } from './aws/AwsCloudService.js';
export { runCommand } from './commandRunner.js';

export type {
  ManifestPayload,
  ResourceStatus,
  ResourceCondition,
  ResourceRef,
  ApplyOptions,
} from './ClusterService.js';
export type { InfraDeclaration, ProvisionOutput, ChangeSet } from './InfrastructureService.js';
export type { ApplicationSpec, SyncStatus } from './GitOpsService.js';
export type { Identity, ClusterDescription } from './CloudService.js';
export type { CommandRunner, CommandResult, CommandOptions } from './commandRunner.js';
export type { ArgoCdOptions } from './argocd/ArgoCdService.js';

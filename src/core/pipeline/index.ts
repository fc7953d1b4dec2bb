/**
 * Pipeline Module
 * Ordered, resumable deployment steps
 */

export { DeploymentPipeline } from './pipeline.js';
export { PresetConfirmationProvider, DecliningConfirmationProvider } from './confirmation.js';
export {
  buildDeploymentSteps,
  deployConfirmation,
  infraDeclaration,
  STEP_IDS,
  OUTPUT_CLUSTER_NAME,
  OUTPUT_CLUSTER_ENDPOINT,
  OUTPUT_KUBECONFIG,
} from './steps.js';

export type { DeploymentPipelineOptions } from './pipeline.js';
export type { DeploymentStepDependencies, StepTimeouts, StepId } from './steps.js';
export type {
  PipelineStep,
  StepContext,
  PipelineState,
  PipelineCallbacks,
  PipelineRunOptions,
  PipelineRunResult,
  ConfirmationRequest,
  ConfirmationProvider,
} from './pipeline.types.js';

/**
 * gitops-orchestrator
 * Resumable, dependency-ordered deployment of GitOps-managed Kubernetes environments
 */

export * from './core/results/index.js';
export * from './core/polling/index.js';
export * from './core/validation/index.js';
export * from './core/jobs/index.js';
export * from './core/state/index.js';
export * from './core/pipeline/index.js';
export * from './core/verification/index.js';
export * from './core/teardown/index.js';
export * from './services/index.js';
export {
  loadEnvironment,
  buildEnvironment,
  conventionDefaults,
  listEnvironments,
  manifestPayload,
  BUILT_IN_ENVIRONMENTS,
} from './lib/environments.js';
export type { Environment, InfrastructureSettings, GitOpsSettings } from './lib/environments.js';
export * from './utils/errors.js';
export { retryWithBackoff, classifyCommandFailure } from './utils/retry.js';
export type { RetryOptions } from './utils/retry.js';
export { createLogger, setDebugMode, setSilentMode } from './utils/logger.js';

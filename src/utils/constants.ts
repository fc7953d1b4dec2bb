/**
 * Shared constants across the application
 */

// ============================================================================
// Exit Codes
// ============================================================================

export const ExitCode = {
  SUCCESS: 0,
  PRECONDITION_FAILED: 1,
  ACTION_FAILED: 2,
  CONFIRMATION_DECLINED: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================================================
// File Names
// ============================================================================

export const DEFAULT_STATE_DIR = '.gitops-orchestrator';
export const DEFAULT_CONFIG_FILE = 'deploy.config.yaml';
export const STATE_SUBDIR = 'state';
export const LOCKS_SUBDIR = 'locks';
export const LOGS_SUBDIR = 'logs';

// ============================================================================
// Polling Defaults
// ============================================================================

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_JOB_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_CLUSTER_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_CONTROLLER_TIMEOUT_MS = 10 * 60 * 1000;
export const DEFAULT_SYNC_TIMEOUT_MS = 15 * 60 * 1000;
export const DEFAULT_ACCESS_TIMEOUT_MS = 5 * 60 * 1000;
/** Whole-step bound, covering every attempt and the polls inside it */
export const DEFAULT_STEP_TIMEOUT_MS = 2 * 60 * 60 * 1000;

// ============================================================================
// Locking
// ============================================================================

export const DEFAULT_LOCK_STALE_MS = 30 * 60 * 1000;

// ============================================================================
// Retry Configuration
// ============================================================================

export const RETRY_MAX_ATTEMPTS = 3;
export const RETRY_INITIAL_DELAY_MS = 2000;
export const RETRY_MAX_DELAY_MS = 30000;
export const STEP_RETRY_DELAY_MS = 10_000;

// ============================================================================
// Jobs
// ============================================================================

export const JOB_LOG_TAIL_LINES = 50;
export const JOB_NAME_LABEL = 'job-name';

// ============================================================================
// Tooling
// ============================================================================

export const MIN_TERRAFORM_VERSION = '1.5.0';
export const ARGOCD_NAMESPACE = 'argocd';
export const ARGOCD_INSTALL_MANIFEST_URL =
  'https://raw.githubusercontent.com/argoproj/argo-cd/stable/manifests/install.yaml';
export const ARGOCD_DEPLOYMENTS = ['argocd-server', 'argocd-repo-server', 'argocd-redis'];
export const ARGOCD_STATEFULSETS = ['argocd-application-controller'];
export const HTTP_CHECK_TIMEOUT_MS = 10_000;

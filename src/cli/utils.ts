/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

import { resolve } from 'path';
import chalk from 'chalk';
import { config as envConfig } from '../lib/config.js';
import type { OrchestratorConfig } from '../lib/config.js';
import { loadEnvironment, manifestPayload } from '../lib/environments.js';
import type { Environment } from '../lib/environments.js';
import {
  ArgoCdService,
  AwsCloudService,
  KubectlClusterService,
  TerraformService,
  runCommand,
} from '../services/index.js';
import type {
  CloudService,
  ClusterService,
  GitOpsService,
  InfrastructureService,
} from '../services/index.js';
import { FileStateStore } from '../core/state/index.js';
import { PrerequisiteValidator } from '../core/validation/index.js';
import {
  DecliningConfirmationProvider,
  PresetConfirmationProvider,
} from '../core/pipeline/index.js';
import type { ConfirmationProvider, StepTimeouts } from '../core/pipeline/index.js';
import {
  ConfirmationDeniedError,
  exitCodeFor,
  formatError,
  logExcerptOf,
} from '../utils/errors.js';
import { logError } from '../utils/errorLogger.js';
import type { FailureContext } from '../utils/errorLogger.js';
import { setDebugMode } from '../utils/logger.js';
import { InquirerConfirmationProvider } from './confirmation.js';

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  // Display formatting
  DIVIDER_LENGTH: 70,
  STEP_NAME_WIDTH: 30,
  LABEL_WIDTH: 18,
  LOG_EXCERPT_MAX_LINES: 20,
} as const;

// ============================================================================
// Types
// ============================================================================

/**
 * Options shared by every environment command
 */
export interface GlobalOptions {
  config?: string;
  stateDir?: string;
  debug?: boolean;
}

/**
 * Everything a command needs to act on one environment
 */
export interface CommandContext {
  env: Environment;
  settings: OrchestratorConfig;
  stateDir: string;
  store: FileStateStore;
  cluster: ClusterService;
  cloud: CloudService;
  infrastructure: InfrastructureService;
  gitops: GitOpsService;
  validator: PrerequisiteValidator;
}

// ============================================================================
// Context
// ============================================================================

/**
 * Resolve the environment and wire its collaborators
 */
export async function createCommandContext(
  envName: string,
  options: GlobalOptions = {}
): Promise<CommandContext> {
  if (options.debug || envConfig.debug) {
    setDebugMode(true);
  }

  const configFile = resolve(options.config ?? envConfig.configFile);
  const env = await loadEnvironment(envName, {
    configFile,
    required: options.config !== undefined,
  });

  const stateDir = resolve(options.stateDir ?? envConfig.stateDir);
  const cluster = new KubectlClusterService(env.kubeconfigPath, runCommand);
  const cloud = new AwsCloudService(runCommand, envConfig.awsProfile);

  return {
    env,
    settings: envConfig,
    stateDir,
    store: new FileStateStore(stateDir, { staleAfterMs: envConfig.lockStaleMs }),
    cluster,
    cloud,
    infrastructure: new TerraformService(runCommand),
    gitops: new ArgoCdService(cluster, {
      namespace: env.gitops.namespace,
      installManifestUrl: env.gitops.installManifest,
      bootstrapManifests: env.gitops.bootstrapManifests.map(manifestPayload),
    }),
    validator: new PrerequisiteValidator(),
  };
}

/**
 * Step timeouts from configuration
 */
export function stepTimeouts(settings: OrchestratorConfig): StepTimeouts {
  return {
    pollIntervalMs: settings.pollIntervalMs,
    clusterTimeoutMs: settings.clusterTimeoutMs,
    accessTimeoutMs: settings.accessTimeoutMs,
    controllerTimeoutMs: settings.controllerTimeoutMs,
    syncTimeoutMs: settings.syncTimeoutMs,
    jobTimeoutMs: settings.jobTimeoutMs,
    stepTimeoutMs: settings.stepTimeoutMs,
  };
}

/**
 * Phrase given on the command line wins; otherwise prompt when attached to a terminal
 */
export function confirmationProviderFor(phrase?: string): ConfirmationProvider {
  if (phrase !== undefined) {
    return new PresetConfirmationProvider(phrase);
  }
  if (process.stdin.isTTY) {
    return new InquirerConfirmationProvider();
  }
  return new DecliningConfirmationProvider();
}

// ============================================================================
// Cancellation
// ============================================================================

/**
 * Abort the returned signal on SIGINT/SIGTERM. A second signal exits at once.
 */
export function createCancellation(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error(chalk.yellow(`\n✋ ${name} received, cancelling (press again to force)...`));
    controller.abort(new Error(`Cancelled by ${name}`));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

// ============================================================================
// Failure reporting
// ============================================================================

function tail(text: string, lines: number): string {
  return text.trimEnd().split('\n').slice(-lines).join('\n');
}

/**
 * Print a failure with its last observed status and log excerpt, write the
 * failure log and exit with the mapped code
 */
export async function exitWithFailure(
  error: unknown,
  title: string,
  stateDir: string | undefined,
  context: FailureContext = {}
): Promise<never> {
  console.error(chalk.red(`\n❌ ${title}:\n`));
  console.error(chalk.red(formatError(error)));

  if (context.step) {
    console.error(chalk.gray(`   Step: ${context.step}`));
  }
  if (context.lastStatus) {
    console.error(chalk.gray(`   Last status: ${context.lastStatus}`));
  }

  const excerpt = logExcerptOf(error);
  if (excerpt) {
    console.error();
    console.error(chalk.bold.white('📜 Recent logs'));
    console.error(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
    console.error(chalk.gray(tail(excerpt, CLI_CONSTANTS.LOG_EXCERPT_MAX_LINES)));
    console.error(chalk.gray('─'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
  }

  if (stateDir && !(error instanceof ConfirmationDeniedError)) {
    try {
      const logFile = await logError(error, stateDir, context);
      console.error(chalk.gray(`\n📝 Failure log written to: ${logFile}`));
    } catch (logFailure) {
      console.error(chalk.yellow(`⚠️  Could not write failure log: ${formatError(logFailure)}`));
    }
  }

  console.error();
  process.exit(exitCodeFor(error));
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a duration in milliseconds (e.g. 95000 → "1m 35s")
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}

/**
 * Canonical deployment steps
 *
 * validate-prerequisites → provision-infrastructure → configure-cluster-access
 *   → bootstrap-gitops-controller → sync-applications → verify-deployment
 *
 * Every wait goes through the readiness poller; every collaborator receives the
 * step signal so cancellation reaches in-flight commands and polls.
 */

import { access, constants as fsConstants } from 'fs/promises';
import { isAbsolute, join } from 'path';
import type { AxiosInstance } from 'axios';
import type { CloudService } from '../../services/CloudService.js';
import type { ClusterService } from '../../services/ClusterService.js';
import { isConverged } from '../../services/GitOpsService.js';
import type { GitOpsService } from '../../services/GitOpsService.js';
import type { InfraDeclaration, InfrastructureService } from '../../services/InfrastructureService.js';
import { manifestPayload } from '../../lib/environments.js';
import type { Environment } from '../../lib/environments.js';
import { FatalActionError, PollTimeoutError } from '../../utils/errors.js';
import {
  DEFAULT_ACCESS_TIMEOUT_MS,
  DEFAULT_CLUSTER_TIMEOUT_MS,
  DEFAULT_CONTROLLER_TIMEOUT_MS,
  DEFAULT_JOB_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_STEP_TIMEOUT_MS,
  DEFAULT_SYNC_TIMEOUT_MS,
  STEP_RETRY_DELAY_MS,
} from '../../utils/constants.js';
import type { Clock } from '../../utils/helpers.js';
import { poll, untilReady } from '../polling/index.js';
import type { Probe } from '../polling/index.js';
import { complete, failed, notMet, passed, pending } from '../results/index.js';
import type { CheckResult, PollOutcome } from '../results/index.js';
import { PrerequisiteValidator, requirementsForEnvironment } from '../validation/index.js';
import { WaveScheduler, assertWaveSuccess, loadJobSpecs } from '../jobs/index.js';
import type { JobPlan, WaveSchedulerCallbacks } from '../jobs/index.js';
import { verifyDeployment } from '../verification/index.js';
import type { VerificationReport } from '../verification/index.js';
import type { ConfirmationRequest, PipelineStep, StepContext } from './pipeline.types.js';

export const STEP_IDS = [
  'validate-prerequisites',
  'provision-infrastructure',
  'configure-cluster-access',
  'bootstrap-gitops-controller',
  'sync-applications',
  'verify-deployment',
] as const;

export type StepId = (typeof STEP_IDS)[number];

/** Output keys recorded in DeploymentState */
export const OUTPUT_CLUSTER_NAME = 'clusterName';
export const OUTPUT_CLUSTER_ENDPOINT = 'clusterEndpoint';
export const OUTPUT_KUBECONFIG = 'kubeconfigPath';

export interface StepTimeouts {
  pollIntervalMs: number;
  clusterTimeoutMs: number;
  accessTimeoutMs: number;
  controllerTimeoutMs: number;
  syncTimeoutMs: number;
  jobTimeoutMs: number;
  /** Upper bound on each step as a whole */
  stepTimeoutMs: number;
}

export interface DeploymentStepDependencies {
  validator: PrerequisiteValidator;
  infrastructure: InfrastructureService;
  cloud: CloudService;
  cluster: ClusterService;
  gitops: GitOpsService;
  http: AxiosInstance;
  clock?: Clock;
  timeouts?: Partial<StepTimeouts>;
  /** Delay between attempts of a step */
  retryDelayMs?: number;
  jobCallbacks?: WaveSchedulerCallbacks;
  /** Overrides reading the environment's job file */
  loadJobs?: (env: Environment) => Promise<JobPlan>;
}

const DEFAULT_TIMEOUTS: StepTimeouts = {
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  clusterTimeoutMs: DEFAULT_CLUSTER_TIMEOUT_MS,
  accessTimeoutMs: DEFAULT_ACCESS_TIMEOUT_MS,
  controllerTimeoutMs: DEFAULT_CONTROLLER_TIMEOUT_MS,
  syncTimeoutMs: DEFAULT_SYNC_TIMEOUT_MS,
  jobTimeoutMs: DEFAULT_JOB_TIMEOUT_MS,
  stepTimeoutMs: DEFAULT_STEP_TIMEOUT_MS,
};

/**
 * Infrastructure declaration of an environment
 */
export function infraDeclaration(env: Environment): InfraDeclaration {
  return {
    workingDir: env.infrastructure.workingDir,
    varFile: env.infrastructure.varFile,
    backendConfig: env.infrastructure.backendConfig,
  };
}

/**
 * Confirmation required before changing a protected environment
 */
export function deployConfirmation(env: Environment): ConfirmationRequest | undefined {
  if (!env.protected) {
    return undefined;
  }
  return {
    id: `deploy-${env.name}`,
    title: `Deploy to ${env.name}`,
    message: `You are about to change the protected environment '${env.name}' (cluster ${env.clusterName}, ${env.region}).`,
    expectedPhrase: `DEPLOY_${env.name.toUpperCase()}`,
  };
}

function clusterNameOf(context: StepContext): string {
  return context.outputs[OUTPUT_CLUSTER_NAME] ?? context.environment.clusterName;
}

async function isReadable(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.R_OK);
    return true;
  } catch {
    return false;
  }
}

export function buildDeploymentSteps(deps: DeploymentStepDependencies): PipelineStep[] {
  const timeouts: StepTimeouts = { ...DEFAULT_TIMEOUTS, ...deps.timeouts };
  const retryDelayMs = deps.retryDelayMs ?? STEP_RETRY_DELAY_MS;
  const { cloud, cluster, gitops, infrastructure } = deps;

  /**
   * Poll `probe` and turn anything but `complete` into the error the step reports
   */
  const waitFor = async (
    subject: string,
    probe: Probe,
    timeoutMs: number,
    context: StepContext
  ): Promise<PollOutcome> => {
    const outcome = await poll(probe, {
      intervalMs: timeouts.pollIntervalMs,
      timeoutMs,
      signal: context.signal,
      clock: deps.clock,
      onPending: ({ elapsedMs, detail }) =>
        context.report(`Waiting for ${subject} (${Math.round(elapsedMs / 1000)}s${detail ? `, ${detail}` : ''})`),
    });

    switch (outcome.kind) {
      case 'complete':
        return outcome;
      case 'failed':
        throw new FatalActionError(`${subject} failed: ${outcome.reason}`);
      case 'timed_out':
        throw new PollTimeoutError(subject, {
          elapsedMs: outcome.elapsedMs,
          cancelled: outcome.cancelled,
          lastStatus: outcome.lastDetail,
        });
      case 'pending':
        throw new FatalActionError(`${subject} did not settle`);
    }
  };

  const clusterReachable = async (context: StepContext): Promise<CheckResult> =>
    (await cluster.isReachable(context.signal))
      ? passed()
      : notMet(`cluster ${clusterNameOf(context)} is not reachable with ${context.environment.kubeconfigPath}`);

  const controllerReady = async (context: StepContext): Promise<CheckResult> =>
    (await gitops.isControllerReady(context.signal))
      ? passed()
      : notMet(`GitOps controller in ${context.environment.gitops.namespace} is not ready`);

  /**
   * One look at application sync/health; empty set counts as pending
   */
  const applicationsProbe = async (context: StepContext) => {
    const configured = context.environment.gitops.applications;
    const names = configured.length > 0 ? configured : await gitops.listApplications(context.signal);
    if (names.length === 0) {
      return pending('no applications registered yet');
    }

    const statuses = await Promise.all(names.map((name) => gitops.getSyncStatus(name, context.signal)));
    const waiting = statuses.filter((status) => !isConverged(status));
    if (waiting.length === 0) {
      return complete(`${statuses.length} application(s) synced and healthy`);
    }

    const summary = waiting
      .map((status) => `${status.name}: ${status.sync}/${status.health}`)
      .join(', ');
    return pending(`${statuses.length - waiting.length}/${statuses.length} converged; ${summary}`);
  };

  const loadJobs = deps.loadJobs ?? ((env: Environment): Promise<JobPlan> => {
    if (!env.jobs) {
      return Promise.resolve({ namespace: env.namespace, setup: [], jobs: [] });
    }
    return loadJobSpecs(env.jobs.file, env.namespace);
  });

  // Kept between verify-deployment's action and postcondition
  let lastReport: VerificationReport | undefined;

  const validatePrerequisites: PipelineStep = {
    id: 'validate-prerequisites',
    name: 'Validate prerequisites',
    mutating: false,
    timeoutMs: timeouts.stepTimeoutMs,
    maxAttempts: 1,
    precondition: async () => passed(),
    action: async (context) => {
      const report = await deps.validator.validate(
        requirementsForEnvironment(context.environment, cloud),
        context.signal
      );
      context.report(`${report.passed.length} prerequisite(s) met`);
    },
    postcondition: async () => passed(),
  };

  const provisionInfrastructure: PipelineStep = {
    id: 'provision-infrastructure',
    name: 'Provision infrastructure',
    mutating: true,
    timeoutMs: timeouts.stepTimeoutMs,
    maxAttempts: 3,
    retryDelayMs,
    precondition: async ({ environment }) => {
      const { workingDir, varFile } = environment.infrastructure;
      const path = isAbsolute(varFile) ? varFile : join(workingDir, varFile);
      return (await isReadable(path)) ? passed() : notMet(`variables file ${path} is not readable`);
    },
    confirmation: ({ environment }) => deployConfirmation(environment),
    action: async (context) => {
      const env = context.environment;
      context.report(`Applying infrastructure in ${env.infrastructure.workingDir}`);
      const { outputs } = await infrastructure.apply(infraDeclaration(env), context.signal);

      const clusterName = outputs[env.infrastructure.outputs.clusterName] ?? env.clusterName;
      let endpoint = outputs[env.infrastructure.outputs.clusterEndpoint];

      await waitFor(
        `cluster ${clusterName}`,
        async ({ signal }) => {
          const description = await cloud.describeCluster(clusterName, env.region, signal);
          if (description.status === 'ACTIVE') {
            endpoint = endpoint ?? description.endpoint;
            return complete(description.status);
          }
          if (description.status === 'FAILED') {
            return failed(`cluster status ${description.status}`);
          }
          return pending(description.status);
        },
        timeouts.clusterTimeoutMs,
        context
      );

      return {
        ...outputs,
        [OUTPUT_CLUSTER_NAME]: clusterName,
        ...(endpoint ? { [OUTPUT_CLUSTER_ENDPOINT]: endpoint } : {}),
      };
    },
    postcondition: async (context) => {
      const name = clusterNameOf(context);
      const description = await cloud.describeCluster(name, context.environment.region, context.signal);
      return description.status === 'ACTIVE'
        ? passed(`cluster ${name} is ACTIVE`)
        : notMet(`cluster ${name} is ${description.status}`);
    },
  };

  const configureClusterAccess: PipelineStep = {
    id: 'configure-cluster-access',
    name: 'Configure cluster access',
    mutating: true,
    timeoutMs: timeouts.stepTimeoutMs,
    maxAttempts: 3,
    retryDelayMs,
    precondition: async ({ outputs }) =>
      outputs[OUTPUT_CLUSTER_NAME]
        ? passed()
        : notMet('no provisioned cluster recorded; run provision-infrastructure first'),
    confirmation: ({ environment }) => deployConfirmation(environment),
    action: async (context) => {
      const env = context.environment;
      const name = clusterNameOf(context);
      context.report(`Writing connection profile for ${name} to ${env.kubeconfigPath}`);
      await cloud.writeKubeconfig(name, env.region, env.kubeconfigPath, context.signal);

      await waitFor(
        `cluster ${name} API`,
        untilReady((signal) => cluster.isReachable(signal)),
        timeouts.accessTimeoutMs,
        context
      );
      return { [OUTPUT_KUBECONFIG]: env.kubeconfigPath };
    },
    postcondition: clusterReachable,
  };

  const bootstrapGitOpsController: PipelineStep = {
    id: 'bootstrap-gitops-controller',
    name: 'Bootstrap GitOps controller',
    mutating: true,
    timeoutMs: timeouts.stepTimeoutMs,
    maxAttempts: 3,
    retryDelayMs,
    precondition: clusterReachable,
    confirmation: ({ environment }) => deployConfirmation(environment),
    action: async (context) => {
      context.report(`Installing GitOps controller into ${context.environment.gitops.namespace}`);
      await gitops.installController(context.signal);
      await waitFor(
        'GitOps controller',
        untilReady((signal) => gitops.isControllerReady(signal)),
        timeouts.controllerTimeoutMs,
        context
      );
    },
    postcondition: controllerReady,
  };

  const syncApplications: PipelineStep = {
    id: 'sync-applications',
    name: 'Sync applications',
    mutating: true,
    timeoutMs: timeouts.stepTimeoutMs,
    maxAttempts: 3,
    retryDelayMs,
    precondition: controllerReady,
    confirmation: ({ environment }) => deployConfirmation(environment),
    action: async (context) => {
      const env = context.environment;
      const references = [
        env.gitops.projectManifest,
        env.gitops.appOfAppsManifest,
        env.gitops.applicationsDir,
      ];
      for (const reference of references) {
        if (!reference) continue;
        context.report(`Registering ${reference}`);
        await gitops.registerApplication(
          { name: reference, manifest: manifestPayload(reference) },
          context.signal
        );
      }

      await waitFor(
        `applications of ${env.name}`,
        () => applicationsProbe(context),
        timeouts.syncTimeoutMs,
        context
      );

      const plan = await loadJobs(env);
      if (plan.jobs.length > 0) {
        const scheduler = new WaveScheduler(cluster, {
          clock: deps.clock,
          signal: context.signal,
          defaults: { pollTimeoutMs: timeouts.jobTimeoutMs, pollIntervalMs: timeouts.pollIntervalMs },
          callbacks: {
            ...deps.jobCallbacks,
            onProgress: (message) => {
              deps.jobCallbacks?.onProgress?.(message);
              context.report(message);
            },
          },
        });
        assertWaveSuccess(await scheduler.runPlan(plan));
        context.report(`${plan.jobs.length} data job(s) completed`);
      }
    },
    postcondition: async (context) => {
      const outcome = await applicationsProbe(context);
      if (outcome.kind === 'complete') {
        return passed(outcome.detail);
      }
      return notMet(outcome.kind === 'failed' ? outcome.reason : outcome.detail ?? 'not converged');
    },
  };

  const verify: PipelineStep = {
    id: 'verify-deployment',
    name: 'Verify deployment',
    mutating: false,
    timeoutMs: timeouts.stepTimeoutMs,
    maxAttempts: 3,
    retryDelayMs,
    precondition: clusterReachable,
    action: async (context) => {
      const env = context.environment;
      lastReport = await verifyDeployment(
        cluster,
        deps.http,
        {
          placements: [
            { kind: 'deployment', name: 'argocd-server', namespace: env.gitops.namespace, minReady: 1 },
            ...env.verification.placements,
          ],
          endpoints: env.verification.endpoints,
        },
        context.signal
      );
      for (const check of lastReport.checks) {
        context.report(`[${check.severity}] ${check.name}: ${check.message}`);
      }
    },
    postcondition: async () => {
      if (!lastReport) {
        return notMet('verification has not run');
      }
      if (lastReport.ok) {
        return passed(`${lastReport.checks.length} check(s), ${lastReport.warnings} warning(s)`);
      }
      const failing = lastReport.checks
        .filter((check) => check.severity === 'fail')
        .map((check) => `${check.name}: ${check.message}`);
      return notMet(`${lastReport.failures} check(s) failed (${failing.join('; ')})`);
    },
  };

  return [
    validatePrerequisites,
    provisionInfrastructure,
    configureClusterAccess,
    bootstrapGitOpsController,
    syncApplications,
    verify,
  ];
}

import { describe, it, before, after, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  DeploymentPipeline,
  DecliningConfirmationProvider,
  STEP_IDS,
  buildDeploymentSteps,
  deployConfirmation,
} from '../core/pipeline/index.js';
import type { ConfirmationProvider, DeploymentStepDependencies } from '../core/pipeline/index.js';
import type { JobPlan, JobOutcome } from '../core/jobs/index.js';
import { PrerequisiteValidator } from '../core/validation/index.js';
import { buildEnvironment } from '../lib/environments.js';
import type { Environment } from '../lib/environments.js';
import {
  JobFailedError,
  PollTimeoutError,
  PostconditionError,
  PreconditionError,
  ValidationError,
} from '../utils/errors.js';
import { setSilentMode } from '../utils/logger.js';
import {
  FakeClock,
  FakeCloud,
  FakeCluster,
  FakeGitOps,
  FakeInfrastructure,
  FakeSystemProbe,
  MemoryStateStore,
  RecordingConfirmationProvider,
  deploymentStatus,
  fakeHttp,
  jobStatus,
  synced,
} from './fakes.js';

interface Harness {
  env: Environment;
  cluster: FakeCluster;
  gitops: FakeGitOps;
  cloud: FakeCloud;
  infrastructure: FakeInfrastructure;
  store: MemoryStateStore;
  probe: FakeSystemProbe;
  pipeline: DeploymentPipeline;
}

describe('Deployment Steps', () => {
  let workDir: string;

  before(() => setSilentMode(true));
  after(() => setSilentMode(false));

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'orchestrator-steps-'));
    await writeFile(join(workDir, 'env.tfvars'), 'cluster_version = "1.30"\n');
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  function harness(
    options: {
      name?: string;
      overrides?: Record<string, unknown>;
      confirmations?: ConfirmationProvider;
      deps?: Partial<DeploymentStepDependencies>;
    } = {}
  ): Harness {
    const env = buildEnvironment(options.name ?? 'dev', {
      kubeconfigPath: join(workDir, 'kubeconfig'),
      infrastructure: { workingDir: workDir, varFile: 'env.tfvars' },
      ...options.overrides,
    });

    const cluster = new FakeCluster();
    cluster.setStatus('deployment', 'argocd', 'argocd-server', deploymentStatus('argocd-server', 'argocd', 1));
    const gitops = new FakeGitOps();
    gitops.applications.set('web-app', synced('web-app'));
    const cloud = new FakeCloud();
    cloud.clusterStatuses = ['CREATING', 'ACTIVE'];
    const infrastructure = new FakeInfrastructure();
    const store = new MemoryStateStore();
    const probe = new FakeSystemProbe();
    const clock = new FakeClock();

    const steps = buildDeploymentSteps({
      validator: new PrerequisiteValidator(probe),
      infrastructure,
      cloud,
      cluster,
      gitops,
      http: fakeHttp({}),
      clock,
      retryDelayMs: 0,
      timeouts: { pollIntervalMs: 1_000 },
      ...options.deps,
    });

    const pipeline = new DeploymentPipeline(steps, {
      store,
      clock,
      confirmations: options.confirmations ?? new DecliningConfirmationProvider(),
    });

    return { env, cluster, gitops, cloud, infrastructure, store, probe, pipeline };
  }

  it('declares the six canonical steps in order', () => {
    const { pipeline } = harness();
    assert.deepStrictEqual(
      pipeline.getSteps().map((step) => step.id),
      [...STEP_IDS]
    );
    assert.deepStrictEqual(
      pipeline.getSteps().map((step) => step.mutating),
      [false, true, true, true, true, false]
    );
  });

  it('bounds every step with the configured step timeout', () => {
    assert.deepStrictEqual(
      harness().pipeline.getSteps().map((step) => step.timeoutMs),
      [7_200_000, 7_200_000, 7_200_000, 7_200_000, 7_200_000, 7_200_000]
    );
    const configured = harness({ deps: { timeouts: { pollIntervalMs: 1_000, stepTimeoutMs: 5_400_000 } } });
    assert.ok(configured.pipeline.getSteps().every((step) => step.timeoutMs === 5_400_000));
  });

  it('deploys a fresh environment end to end', async () => {
    const h = harness();

    const result = await h.pipeline.run(h.env);

    assert.strictEqual(result.status, 'succeeded');
    assert.strictEqual(result.lastCompletedStep, 5);
    assert.deepStrictEqual(
      result.steps.map((step) => step.status),
      ['succeeded', 'succeeded', 'succeeded', 'succeeded', 'succeeded', 'succeeded']
    );
    assert.strictEqual(h.infrastructure.applies, 1);
    assert.deepStrictEqual(h.cloud.kubeconfigWrites, [`dev-eks@us-east-1 -> ${join(workDir, 'kubeconfig')}`]);
    assert.strictEqual(h.gitops.installs, 1);
    assert.deepStrictEqual(h.gitops.registered, [
      'argocd/projects/project-dev.yaml',
      'argocd/bootstrap/dev/app-of-apps.yaml',
      'argocd/applications/dev',
    ]);

    const state = await h.store.load('dev');
    assert.strictEqual(state?.status, 'succeeded');
    assert.deepStrictEqual(state?.outputs, {
      eks_cluster_name: 'dev-eks',
      eks_cluster_endpoint: 'https://dev-eks.example.test',
      clusterName: 'dev-eks',
      clusterEndpoint: 'https://dev-eks.example.test',
      kubeconfigPath: join(workDir, 'kubeconfig'),
    });
  });

  it('changes nothing when run again on a deployed environment', async () => {
    const h = harness();
    await h.pipeline.run(h.env);

    const again = await h.pipeline.run(h.env);

    assert.strictEqual(again.status, 'succeeded');
    assert.deepStrictEqual(
      again.steps.map((step) => step.status),
      ['succeeded', 'skipped', 'skipped', 'skipped', 'skipped', 'succeeded']
    );
    assert.strictEqual(h.infrastructure.applies, 1);
    assert.strictEqual(h.cloud.kubeconfigWrites.length, 1);
    assert.strictEqual(h.gitops.installs, 1);
    assert.strictEqual(h.gitops.registered.length, 3);
    assert.deepStrictEqual(h.cluster.mutations, []);
  });

  it('stops before changing anything when a prerequisite is missing', async () => {
    const h = harness();
    h.probe.binaries.delete('kubectl');

    const result = await h.pipeline.run(h.env);

    assert.strictEqual(result.exitCode, 1);
    assert.strictEqual(result.failedStep, 'validate-prerequisites');
    assert.ok(result.error instanceof ValidationError);
    assert.deepStrictEqual(
      result.error.failures.map((failure) => failure.name),
      ['kubectl']
    );
    assert.strictEqual(h.infrastructure.applies, 0);
  });

  it('requires the provisioned cluster before configuring access', async () => {
    const h = harness();

    const result = await h.pipeline.run(h.env, { only: ['configure-cluster-access'] });

    assert.ok(result.error instanceof PreconditionError);
    assert.strictEqual(
      result.error.message,
      "Precondition for 'configure-cluster-access' not met: no provisioned cluster recorded; run provision-infrastructure first"
    );
    assert.strictEqual(result.exitCode, 1);
    assert.deepStrictEqual(h.cloud.kubeconfigWrites, []);
  });

  it('fails provisioning when the cluster reports FAILED', async () => {
    const h = harness();
    h.cloud.clusterStatuses = ['CREATING', 'FAILED'];

    const result = await h.pipeline.run(h.env);

    assert.strictEqual(result.failedStep, 'provision-infrastructure');
    assert.strictEqual(result.error?.message, 'cluster dev-eks failed: cluster status FAILED');
    assert.strictEqual(result.steps[1].attempts, 1);
    assert.strictEqual(result.exitCode, 2);
  });

  describe('protected environments', () => {
    it('declines without a confirmation and applies nothing', async () => {
      const h = harness({ name: 'prod' });

      const result = await h.pipeline.run(h.env);

      assert.strictEqual(result.exitCode, 3);
      assert.strictEqual(result.failedStep, 'provision-infrastructure');
      assert.strictEqual(h.infrastructure.applies, 0);
    });

    it('asks once for the whole run', async () => {
      const confirmations = new RecordingConfirmationProvider('DEPLOY_PROD');
      const h = harness({ name: 'prod', confirmations });
      h.infrastructure.outputsValue = { eks_cluster_name: 'prod-eks' };

      const result = await h.pipeline.run(h.env);

      assert.strictEqual(result.status, 'succeeded');
      assert.deepStrictEqual(
        confirmations.requests.map((request) => [request.id, request.expectedPhrase]),
        [['deploy-prod', 'DEPLOY_PROD']]
      );
    });

    it('only protects environments marked as such', () => {
      assert.strictEqual(deployConfirmation(buildEnvironment('dev')), undefined);
      assert.strictEqual(deployConfirmation(buildEnvironment('prod'))?.title, 'Deploy to prod');
    });
  });

  describe('sync-applications', () => {
    const plan = (namespace: string): JobPlan => ({
      namespace,
      setup: [{ kind: 'file', path: '/jobs/shared.yaml' }],
      jobs: [
        { name: 'load-a', wave: 5, namespace, payload: { kind: 'file', path: '/jobs/load-a.yaml' } },
        { name: 'load-b', wave: 10, namespace, payload: { kind: 'file', path: '/jobs/load-b.yaml' } },
      ],
    });

    it('runs the data jobs once the applications converged', async () => {
      const completed: JobOutcome[] = [];
      const h = harness({
        deps: {
          loadJobs: async (env) => plan(env.namespace),
          jobCallbacks: { onJobComplete: (outcome) => completed.push(outcome) },
        },
      });
      h.cluster.setStatus('job', 'apps-dev', 'load-a', jobStatus('load-a', 'Complete'));
      h.cluster.setStatus('job', 'apps-dev', 'load-b', jobStatus('load-b'), jobStatus('load-b', 'Complete'));

      const result = await h.pipeline.run(h.env);

      assert.strictEqual(result.status, 'succeeded');
      assert.deepStrictEqual(
        h.cluster.calls.filter((call) => call.startsWith('apply')),
        [
          'apply file:/jobs/shared.yaml -n apps-dev',
          'apply file:/jobs/load-a.yaml -n apps-dev',
          'apply file:/jobs/load-b.yaml -n apps-dev',
        ]
      );
      assert.deepStrictEqual(
        completed.map((outcome) => [outcome.job, outcome.status]),
        [
          ['load-a', 'complete'],
          ['load-b', 'complete'],
        ]
      );
    });

    it('fails the step on the first failed job without retrying', async () => {
      const h = harness({ deps: { loadJobs: async (env) => plan(env.namespace) } });
      h.cluster.setStatus('job', 'apps-dev', 'load-a', jobStatus('load-a', 'Failed', 'BackoffLimitExceeded'));

      const result = await h.pipeline.run(h.env);

      assert.strictEqual(result.failedStep, 'sync-applications');
      assert.ok(result.error instanceof JobFailedError);
      assert.strictEqual(result.error.logExcerpt, h.cluster.logs);
      assert.strictEqual(result.steps[4].attempts, 1);
      assert.strictEqual(result.lastCompletedStep, 3);
      assert.ok(!h.cluster.calls.includes('apply file:/jobs/load-b.yaml -n apps-dev'));
    });

    it('times out when applications never converge', async () => {
      const h = harness({ deps: { timeouts: { pollIntervalMs: 1_000, syncTimeoutMs: 3_000 } } });
      h.gitops.applications.set('web-app', synced('web-app', 'Progressing', 'OutOfSync'));

      const result = await h.pipeline.run(h.env);

      assert.ok(result.error instanceof PollTimeoutError);
      assert.strictEqual(
        result.error.message,
        'Waiting for applications of dev timed out after 3s (last status: 0/1 converged; web-app: OutOfSync/Progressing)'
      );
      assert.strictEqual(result.exitCode, 2);
    });
  });

  describe('verify-deployment', () => {
    it('fails with the failing checks after its retries', async () => {
      const h = harness({
        overrides: {
          verification: { endpoints: [{ name: 'web-app', url: 'https://dev.test/health' }] },
        },
        deps: { http: fakeHttp({ 'https://dev.test/health': 503 }) },
      });

      const result = await h.pipeline.run(h.env);

      assert.strictEqual(result.failedStep, 'verify-deployment');
      assert.ok(result.error instanceof PostconditionError);
      assert.strictEqual(
        result.error.message,
        "Postcondition for 'verify-deployment' still not met after 3 attempt(s): 1 check(s) failed (web-app: https://dev.test/health answered 503)"
      );
      assert.strictEqual(result.lastCompletedStep, 4);
    });
  });
});

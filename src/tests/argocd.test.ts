import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ArgoCdService, toSyncStatus } from '../services/argocd/ArgoCdService.js';
import type { ResourceStatus } from '../services/ClusterService.js';
import { isConverged } from '../services/GitOpsService.js';
import { FakeCluster, deploymentStatus, missing } from './fakes.js';

const INSTALL_URL = 'https://example.test/argo-cd/install.yaml';

function application(name: string, sync: string, health: string, message?: string): ResourceStatus {
  return {
    exists: true,
    kind: 'applications.argoproj.io',
    name,
    namespace: 'argocd',
    conditions: {},
    raw: {
      metadata: { name },
      status: {
        sync: { status: sync },
        health: { status: health, message },
      },
    },
  };
}

function statefulSet(name: string, replicas: number, readyReplicas: number): ResourceStatus {
  return { exists: true, kind: 'statefulset', name, namespace: 'argocd', conditions: {}, replicas, readyReplicas };
}

function readyController(cluster: FakeCluster): void {
  for (const name of ['argocd-server', 'argocd-repo-server', 'argocd-redis']) {
    cluster.setStatus('deployment', 'argocd', name, deploymentStatus(name, 'argocd', 1));
  }
  cluster.setStatus(
    'statefulset',
    'argocd',
    'argocd-application-controller',
    statefulSet('argocd-application-controller', 1, 1)
  );
}

describe('ArgoCdService', () => {
  it('installs the controller and its bootstrap manifests into its namespace', async () => {
    const cluster = new FakeCluster();
    const gitops = new ArgoCdService(cluster, {
      installManifestUrl: INSTALL_URL,
      bootstrapManifests: [{ kind: 'file', path: 'secrets/dev/repository-credentials.yaml' }],
    });

    await gitops.installController();

    assert.deepStrictEqual(cluster.calls, [
      'namespace argocd',
      `apply url:${INSTALL_URL} -n argocd`,
      'apply file:secrets/dev/repository-credentials.yaml -n argocd',
    ]);
  });

  it('is ready once every component is available', async () => {
    const cluster = new FakeCluster();
    readyController(cluster);

    assert.strictEqual(await new ArgoCdService(cluster).isControllerReady(), true);
    assert.deepStrictEqual(cluster.calls, [
      'get deployment/argocd-server',
      'get deployment/argocd-repo-server',
      'get deployment/argocd-redis',
      'get statefulset/argocd-application-controller',
    ]);
  });

  it('is not ready while a component is missing or short of replicas', async () => {
    const cluster = new FakeCluster();
    readyController(cluster);
    cluster.setStatus('deployment', 'argocd', 'argocd-repo-server', deploymentStatus('argocd-repo-server', 'argocd', 0));
    assert.strictEqual(await new ArgoCdService(cluster).isControllerReady(), false);
    assert.ok(!cluster.calls.includes('get deployment/argocd-redis'));

    const partial = new FakeCluster();
    readyController(partial);
    partial.setStatus(
      'statefulset',
      'argocd',
      'argocd-application-controller',
      statefulSet('argocd-application-controller', 2, 1)
    );
    assert.strictEqual(await new ArgoCdService(partial).isControllerReady(), false);
  });

  it('reads application status from the custom resource', async () => {
    const cluster = new FakeCluster();
    cluster.setStatus(
      'applications.argoproj.io',
      'gitops',
      'web-app',
      application('web-app', 'OutOfSync', 'Degraded', 'back-off restarting failed container')
    );
    const gitops = new ArgoCdService(cluster, { namespace: 'gitops' });

    assert.deepStrictEqual(await gitops.getSyncStatus('web-app'), {
      name: 'web-app',
      exists: true,
      sync: 'OutOfSync',
      health: 'Degraded',
      message: 'back-off restarting failed container',
    });
    assert.deepStrictEqual(await gitops.getSyncStatus('api-gateway'), {
      name: 'api-gateway',
      exists: false,
      sync: 'Unknown',
      health: 'Missing',
    });
  });

  it('registers, lists and deletes applications through the cluster', async () => {
    const cluster = new FakeCluster();
    cluster.setListing('applications.argoproj.io', 'argocd', [
      { kind: 'applications.argoproj.io', name: 'web-app', namespace: 'argocd' },
      { kind: 'applications.argoproj.io', name: 'api-gateway', namespace: 'argocd' },
    ]);
    const gitops = new ArgoCdService(cluster);

    await gitops.registerApplication({
      name: 'argocd/applications/dev',
      manifest: { kind: 'kustomize', path: 'argocd/applications/dev' },
    });
    assert.deepStrictEqual(await gitops.listApplications(), ['web-app', 'api-gateway']);
    await gitops.deleteApplication('web-app');

    assert.deepStrictEqual(cluster.calls, [
      'apply kustomize:argocd/applications/dev -n argocd',
      'list applications.argoproj.io/argocd',
      'delete applications.argoproj.io/web-app',
    ]);
  });

  it('only counts Synced and Healthy as converged', () => {
    assert.strictEqual(isConverged(toSyncStatus('a', application('a', 'Synced', 'Healthy'))), true);
    assert.strictEqual(isConverged(toSyncStatus('a', application('a', 'Synced', 'Progressing'))), false);
    assert.strictEqual(isConverged(toSyncStatus('a', missing('applications.argoproj.io', 'a', 'argocd'))), false);
    assert.deepStrictEqual(
      toSyncStatus('a', { exists: true, kind: 'x', name: 'a', namespace: 'argocd', conditions: {} }),
      { name: 'a', exists: true, sync: 'Unknown', health: 'Unknown', message: undefined }
    );
  });
});

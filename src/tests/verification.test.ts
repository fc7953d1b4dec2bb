import { describe, it } from 'node:test';
import assert from 'node:assert';
import { verifyDeployment, verifyEndpoint, verifyPlacement } from '../core/verification/index.js';
import type { ResourceStatus } from '../services/ClusterService.js';
import { FakeCluster, deploymentStatus, fakeHttp } from './fakes.js';

class BrokenCluster extends FakeCluster {
  async getResourceStatus(): Promise<ResourceStatus> {
    throw new Error('kubectl get deployment/web-app failed (exit 1): Unauthorized');
  }
}

describe('Deployment Verifier', () => {
  describe('verifyPlacement', () => {
    it('passes when the resource is in the expected namespace', async () => {
      const cluster = new FakeCluster();
      cluster.setStatus('deployment', 'apps-dev', 'web-app', deploymentStatus('web-app', 'apps-dev', 2));

      assert.deepStrictEqual(
        await verifyPlacement(cluster, { kind: 'deployment', name: 'web-app', namespace: 'apps-dev', minReady: 2 }),
        { name: 'deployment/web-app', severity: 'pass', message: 'in apps-dev' }
      );
      assert.deepStrictEqual(cluster.calls, ['get deployment/web-app']);
    });

    it('warns when fewer replicas than expected are ready', async () => {
      const cluster = new FakeCluster();
      cluster.setStatus('deployment', 'apps-prod', 'web-app', deploymentStatus('web-app', 'apps-prod', 1));

      assert.deepStrictEqual(
        await verifyPlacement(cluster, { kind: 'deployment', name: 'web-app', namespace: 'apps-prod', minReady: 2 }),
        { name: 'deployment/web-app', severity: 'warn', message: 'in apps-prod, 1/2 ready' }
      );
    });

    it('names the namespace a misplaced resource was found in', async () => {
      const cluster = new FakeCluster();
      cluster.setListing('deployment', 'all', [
        { kind: 'deployment', name: 'api-gateway', namespace: 'apps-dev' },
        { kind: 'deployment', name: 'web-app', namespace: 'default' },
      ]);

      assert.deepStrictEqual(
        await verifyPlacement(cluster, { kind: 'deployment', name: 'web-app', namespace: 'apps-dev' }),
        {
          name: 'deployment/web-app',
          severity: 'fail',
          message: 'found in namespace default, expected apps-dev',
        }
      );
      assert.deepStrictEqual(cluster.calls, ['get deployment/web-app', 'list deployment/all']);
    });

    it('fails when the resource exists nowhere', async () => {
      const result = await verifyPlacement(new FakeCluster(), {
        kind: 'service',
        name: 'web-app',
        namespace: 'apps-dev',
      });
      assert.strictEqual(result.severity, 'fail');
      assert.strictEqual(result.message, 'not found in namespace apps-dev');
    });
  });

  describe('verifyEndpoint', () => {
    it('accepts any status below 500 by default', async () => {
      const http = fakeHttp({ 'https://dev.test/health': 302, 'https://dev.test/broken': 502 });

      assert.deepStrictEqual(await verifyEndpoint(http, { name: 'web', url: 'https://dev.test/health' }), {
        name: 'web',
        severity: 'pass',
        message: 'https://dev.test/health answered 302',
      });
      assert.strictEqual(
        (await verifyEndpoint(http, { name: 'broken', url: 'https://dev.test/broken' })).severity,
        'fail'
      );
    });

    it('accepts only the listed statuses when given', async () => {
      const http = fakeHttp({ 'https://prod.test/health': 302 });
      const result = await verifyEndpoint(http, {
        name: 'web',
        url: 'https://prod.test/health',
        expectStatus: [200],
      });
      assert.strictEqual(result.severity, 'fail');
    });
  });

  it('records every check and turns thrown errors into failures', async () => {
    const report = await verifyDeployment(new BrokenCluster(), fakeHttp({ 'https://dev.test/health': 200 }), {
      placements: [{ kind: 'deployment', name: 'web-app', namespace: 'apps-dev' }],
      endpoints: [
        { name: 'health', url: 'https://dev.test/health' },
        { name: 'docs', url: 'https://dev.test/docs' },
      ],
    });

    assert.deepStrictEqual(report, {
      ok: false,
      failures: 2,
      warnings: 0,
      checks: [
        {
          name: 'deployment/web-app',
          severity: 'fail',
          message: 'kubectl get deployment/web-app failed (exit 1): Unauthorized',
        },
        { name: 'health', severity: 'pass', message: 'https://dev.test/health answered 200' },
        { name: 'docs', severity: 'fail', message: 'connect ECONNREFUSED https://dev.test/docs' },
      ],
    });
  });

  it('is ok with warnings only', async () => {
    const cluster = new FakeCluster();
    cluster.setStatus('deployment', 'apps-dev', 'web-app', deploymentStatus('web-app', 'apps-dev', 0));

    const report = await verifyDeployment(cluster, fakeHttp({}), {
      placements: [{ kind: 'deployment', name: 'web-app', namespace: 'apps-dev', minReady: 1 }],
      endpoints: [],
    });

    assert.strictEqual(report.ok, true);
    assert.strictEqual(report.warnings, 1);
  });
});

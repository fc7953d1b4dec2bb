import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  DecliningConfirmationProvider,
  PresetConfirmationProvider,
  deployConfirmation,
} from '../core/pipeline/index.js';
import type { ConfirmationRequest } from '../core/pipeline/index.js';
import { destroyConfirmation } from '../core/teardown/index.js';
import { buildEnvironment } from '../lib/environments.js';

const REQUEST: ConfirmationRequest = {
  id: 'deploy-prod',
  title: 'Deploy to prod',
  message: 'You are about to change prod.',
  expectedPhrase: 'DEPLOY_PROD',
};

describe('Confirmation', () => {
  it('accepts a preset phrase only on an exact match', async () => {
    assert.strictEqual(await new PresetConfirmationProvider('DEPLOY_PROD').confirm(REQUEST), true);
    assert.strictEqual(await new PresetConfirmationProvider('deploy_prod').confirm(REQUEST), false);
    assert.strictEqual(await new PresetConfirmationProvider(' DEPLOY_PROD').confirm(REQUEST), false);
    assert.strictEqual(await new PresetConfirmationProvider().confirm(REQUEST), false);
  });

  it('declines everything without a terminal', async () => {
    assert.strictEqual(await new DecliningConfirmationProvider().confirm(), false);
  });

  it('describes the protected deploy and the destroy requests', () => {
    const prod = buildEnvironment('prod', { region: 'us-west-2' });

    assert.deepStrictEqual(deployConfirmation(prod), {
      id: 'deploy-prod',
      title: 'Deploy to prod',
      message: "You are about to change the protected environment 'prod' (cluster prod-eks, us-west-2).",
      expectedPhrase: 'DEPLOY_PROD',
    });
    assert.strictEqual(deployConfirmation(buildEnvironment('uat', { protected: false })), undefined);
    assert.strictEqual(deployConfirmation(buildEnvironment('uat', { protected: true }))?.expectedPhrase, 'DEPLOY_UAT');
    assert.deepStrictEqual(destroyConfirmation(buildEnvironment('dev')), {
      id: 'destroy-dev',
      title: 'Destroy dev',
      message: "This permanently deletes every application, the cluster dev-eks and all infrastructure of 'dev'.",
      expectedPhrase: 'DESTROY-dev',
    });
  });
});

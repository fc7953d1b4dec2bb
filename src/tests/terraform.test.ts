import { describe, it } from 'node:test';
import assert from 'node:assert';
import { TerraformService, parseChangeSet, parseOutputs } from '../services/terraform/TerraformService.js';
import { isNoop } from '../services/InfrastructureService.js';
import { TransientActionError } from '../utils/errors.js';
import { scriptedRunner } from './fakes.js';

const DECLARATION = {
  workingDir: 'terraform/aws',
  varFile: 'environments/dev-eks.tfvars',
  backendConfig: 'backend-dev.tfbackend',
};

const OUTPUT_JSON = JSON.stringify({
  eks_cluster_name: { sensitive: false, type: 'string', value: 'dev-eks' },
  node_groups: { sensitive: false, type: ['list', 'string'], value: ['general', 'data'] },
  unset: { sensitive: false, type: 'string', value: null },
});

describe('TerraformService', () => {
  it('initialises, applies and reads outputs in the working directory', async () => {
    const { run, commands } = scriptedRunner((_, args) =>
      args[1] === 'output' ? { stdout: OUTPUT_JSON } : undefined
    );

    const result = await new TerraformService(run).apply(DECLARATION);

    assert.deepStrictEqual(
      commands.map((command) => command.args.join(' ')),
      [
        '-chdir=terraform/aws init -input=false -reconfigure -backend-config=backend-dev.tfbackend',
        '-chdir=terraform/aws apply -input=false -auto-approve -var-file=environments/dev-eks.tfvars',
        '-chdir=terraform/aws output -json',
      ]
    );
    assert.ok(commands.every((command) => command.binary === 'terraform'));
    assert.strictEqual(commands[0].options?.env?.['TF_IN_AUTOMATION'], '1');
    assert.deepStrictEqual(result.outputs, {
      eks_cluster_name: 'dev-eks',
      node_groups: '["general","data"]',
    });
  });

  it('retries nothing itself but marks a held state lock as transient', async () => {
    const { run, commands } = scriptedRunner((_, args) =>
      args[1] === 'apply'
        ? { exitCode: 1, stderr: 'Error: Error acquiring the state lock\n' }
        : undefined
    );

    await assert.rejects(new TerraformService(run).apply(DECLARATION), (error: unknown) => {
      assert.ok(error instanceof TransientActionError);
      assert.strictEqual(
        error.message,
        'terraform apply failed (exit 1): Error: Error acquiring the state lock'
      );
      return true;
    });
    assert.strictEqual(commands.length, 2);
  });

  it('computes a change set from a saved plan', async () => {
    const plan = {
      resource_changes: [
        { address: 'aws_eks_cluster.this', change: { actions: ['no-op'] } },
        { address: 'aws_eks_node_group.general', change: { actions: ['update'] } },
        { address: 'aws_security_group.nodes', change: { actions: ['delete', 'create'] } },
        { address: 'aws_iam_role.loader', change: { actions: ['create'] } },
      ],
    };
    const { run, commands } = scriptedRunner((_, args) =>
      args[1] === 'show' ? { stdout: JSON.stringify(plan) } : undefined
    );

    const changes = await new TerraformService(run).planChanges({
      workingDir: 'infra',
      varFile: 'dev.tfvars',
    });

    assert.deepStrictEqual(
      commands.map((command) => command.args[1]),
      ['init', 'plan', 'show']
    );
    assert.deepStrictEqual(commands[0].args, ['-chdir=infra', 'init', '-input=false', '-reconfigure']);
    const planFlag = commands[1].args.find((arg) => arg.startsWith('-out='));
    assert.strictEqual(commands[2].args[3], planFlag?.slice('-out='.length));
    assert.deepStrictEqual(changes, {
      create: 1,
      update: 1,
      delete: 0,
      replace: 1,
      resources: [
        { address: 'aws_eks_node_group.general', action: 'update' },
        { address: 'aws_security_group.nodes', action: 'replace' },
        { address: 'aws_iam_role.loader', action: 'create' },
      ],
    });
    assert.strictEqual(isNoop(changes), false);
  });

  it('destroys with the variables file', async () => {
    const { run, commands } = scriptedRunner();
    await new TerraformService(run).destroy(DECLARATION);
    assert.strictEqual(
      commands[1].args.join(' '),
      '-chdir=terraform/aws destroy -input=false -auto-approve -var-file=environments/dev-eks.tfvars'
    );
  });

  it('rejects outputs that are not JSON', async () => {
    const { run } = scriptedRunner((_, args) => (args[1] === 'output' ? { stdout: 'Warning: no outputs' } : undefined));
    await assert.rejects(new TerraformService(run).outputs(DECLARATION), {
      message: 'terraform output returned invalid JSON',
    });
  });

  it('parses empty documents', () => {
    assert.deepStrictEqual(parseOutputs({}), {});
    assert.strictEqual(isNoop(parseChangeSet({})), true);
  });
});

/**
 * Terraform Service
 * InfrastructureService backed by the terraform CLI
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InfrastructureService } from '../InfrastructureService.js';
import type { ChangeSet, InfraDeclaration, ProvisionOutput } from '../InfrastructureService.js';
import { runCommand } from '../commandRunner.js';
import type { CommandRunner } from '../commandRunner.js';
import { classifyCommandFailure } from '../../utils/retry.js';
import { FatalActionError } from '../../utils/errors.js';
import { asArray, asRecord, asString, getPath, parseJson } from '../../utils/helpers.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('terraform');

/**
 * Flatten `terraform output -json` into string values
 */
export function parseOutputs(json: unknown): Record<string, string> {
  const outputs: Record<string, string> = {};
  const record = asRecord(json) ?? {};

  for (const [name, entry] of Object.entries(record)) {
    const value = getPath(entry, 'value');
    if (value === undefined || value === null) continue;
    outputs[name] = typeof value === 'string' ? value : JSON.stringify(value);
  }

  return outputs;
}

/**
 * Count planned actions from `terraform show -json <planfile>`
 */
export function parseChangeSet(json: unknown): ChangeSet {
  const changes: ChangeSet = { create: 0, update: 0, delete: 0, replace: 0, resources: [] };

  for (const resource of asArray(getPath(json, 'resource_changes'))) {
    const address = asString(getPath(resource, 'address')) ?? '(unknown)';
    const actions = asArray(getPath(resource, 'change.actions')).filter(
      (action): action is string => typeof action === 'string'
    );

    let action: ChangeSet['resources'][number]['action'] | undefined;
    if (actions.includes('delete') && actions.includes('create')) {
      action = 'replace';
    } else if (actions.includes('create')) {
      action = 'create';
    } else if (actions.includes('update')) {
      action = 'update';
    } else if (actions.includes('delete')) {
      action = 'delete';
    }

    if (action) {
      changes[action]++;
      changes.resources.push({ address, action });
    }
  }

  return changes;
}

export class TerraformService extends InfrastructureService {
  private readonly run: CommandRunner;
  private readonly binary: string;
  private readonly env: Record<string, string | undefined>;

  constructor(
    run: CommandRunner = runCommand,
    options: { binary?: string; env?: Record<string, string | undefined> } = {}
  ) {
    super();
    this.run = run;
    this.binary = options.binary ?? 'terraform';
    this.env = { TF_IN_AUTOMATION: '1', ...options.env };
  }

  private async terraform(
    declaration: InfraDeclaration,
    args: string[],
    context: string,
    signal?: AbortSignal
  ): Promise<string> {
    const result = await this.run(this.binary, [`-chdir=${declaration.workingDir}`, ...args], {
      env: this.env,
      signal,
    });
    if (result.exitCode !== 0) {
      throw classifyCommandFailure(result, context);
    }
    return result.stdout;
  }

  private async init(declaration: InfraDeclaration, signal?: AbortSignal): Promise<void> {
    const backendArgs = declaration.backendConfig
      ? [`-backend-config=${declaration.backendConfig}`]
      : [];
    logger.debug(`init in ${declaration.workingDir}`);
    await this.terraform(
      declaration,
      ['init', '-input=false', '-reconfigure', ...backendArgs],
      'terraform init',
      signal
    );
  }

  async apply(declaration: InfraDeclaration, signal?: AbortSignal): Promise<ProvisionOutput> {
    await this.init(declaration, signal);
    await this.terraform(
      declaration,
      ['apply', '-input=false', '-auto-approve', `-var-file=${declaration.varFile}`],
      'terraform apply',
      signal
    );
    return this.readOutputs(declaration, signal);
  }

  async planChanges(declaration: InfraDeclaration, signal?: AbortSignal): Promise<ChangeSet> {
    await this.init(declaration, signal);

    const planDir = await mkdtemp(join(tmpdir(), 'orchestrator-plan-'));
    const planFile = join(planDir, 'changes.tfplan');
    try {
      await this.terraform(
        declaration,
        ['plan', '-input=false', `-var-file=${declaration.varFile}`, `-out=${planFile}`],
        'terraform plan',
        signal
      );
      const stdout = await this.terraform(
        declaration,
        ['show', '-json', planFile],
        'terraform show',
        signal
      );
      const json = parseJson(stdout);
      if (json === undefined) {
        throw new FatalActionError('terraform show returned invalid JSON');
      }
      return parseChangeSet(json);
    } finally {
      await rm(planDir, { recursive: true, force: true });
    }
  }

  async outputs(declaration: InfraDeclaration, signal?: AbortSignal): Promise<ProvisionOutput> {
    await this.init(declaration, signal);
    return this.readOutputs(declaration, signal);
  }

  async destroy(declaration: InfraDeclaration, signal?: AbortSignal): Promise<void> {
    await this.init(declaration, signal);
    await this.terraform(
      declaration,
      ['destroy', '-input=false', '-auto-approve', `-var-file=${declaration.varFile}`],
      'terraform destroy',
      signal
    );
  }

  private async readOutputs(
    declaration: InfraDeclaration,
    signal?: AbortSignal
  ): Promise<ProvisionOutput> {
    const stdout = await this.terraform(
      declaration,
      ['output', '-json'],
      'terraform output',
      signal
    );
    const json = parseJson(stdout);
    if (json === undefined) {
      throw new FatalActionError('terraform output returned invalid JSON');
    }
    return { outputs: parseOutputs(json) };
  }
}

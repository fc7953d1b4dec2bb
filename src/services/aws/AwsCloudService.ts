/**
 * AWS Cloud Service
 * CloudService backed by the aws CLI (sts, eks)
 */

import { CloudService } from '../CloudService.js';
import type { ClusterDescription, Identity } from '../CloudService.js';
import { runCommand } from '../commandRunner.js';
import type { CommandResult, CommandRunner } from '../commandRunner.js';
import { classifyCommandFailure } from '../../utils/retry.js';
import { FatalActionError } from '../../utils/errors.js';
import { asString, getPath, parseJson } from '../../utils/helpers.js';

export class AwsCloudService extends CloudService {
  private readonly run: CommandRunner;
  private readonly profile?: string;

  constructor(run: CommandRunner = runCommand, profile?: string) {
    super();
    this.run = run;
    this.profile = profile;
  }

  private aws(args: string[], signal?: AbortSignal): Promise<CommandResult> {
    const profileArgs = this.profile ? ['--profile', this.profile] : [];
    return this.run('aws', [...args, ...profileArgs], { signal });
  }

  async whoAmI(signal?: AbortSignal): Promise<Identity> {
    const result = await this.aws(['sts', 'get-caller-identity', '--output', 'json'], signal);
    if (result.exitCode !== 0) {
      // Credential problems are never worth retrying
      throw new FatalActionError(
        `aws sts get-caller-identity failed: ${result.stderr.trim() || 'no output'}`
      );
    }

    const json = parseJson(result.stdout);
    const arn = asString(getPath(json, 'Arn'));
    if (!arn) {
      throw new FatalActionError('aws sts get-caller-identity returned no Arn');
    }
    return {
      account: asString(getPath(json, 'Account')) ?? '',
      arn,
      userId: asString(getPath(json, 'UserId')) ?? '',
    };
  }

  async describeCluster(
    name: string,
    region: string,
    signal?: AbortSignal
  ): Promise<ClusterDescription> {
    const result = await this.aws(
      ['eks', 'describe-cluster', '--name', name, '--region', region, '--output', 'json'],
      signal
    );

    if (result.exitCode !== 0) {
      if (result.stderr.includes('ResourceNotFoundException')) {
        return { name, status: 'NOT_FOUND' };
      }
      throw classifyCommandFailure(result, `aws eks describe-cluster ${name}`);
    }

    const json = parseJson(result.stdout);
    return {
      name,
      status: asString(getPath(json, 'cluster.status')) ?? 'UNKNOWN',
      endpoint: asString(getPath(json, 'cluster.endpoint')),
      version: asString(getPath(json, 'cluster.version')),
    };
  }

  async writeKubeconfig(
    name: string,
    region: string,
    kubeconfigPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    const result = await this.aws(
      ['eks', 'update-kubeconfig', '--name', name, '--region', region, '--kubeconfig', kubeconfigPath],
      signal
    );
    if (result.exitCode !== 0) {
      throw classifyCommandFailure(result, `aws eks update-kubeconfig ${name}`);
    }
  }
}

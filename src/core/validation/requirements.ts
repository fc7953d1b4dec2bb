/**
 * Requirement builders and the standard prerequisite list
 */

import { join, isAbsolute } from 'path';
import type { Environment } from '../../lib/environments.js';
import type { CloudService } from '../../services/CloudService.js';
import { MIN_TERRAFORM_VERSION } from '../../utils/constants.js';
import type {
  BinaryPresentRequirement,
  CredentialValidRequirement,
  FileExistsRequirement,
  Requirement,
  VersionAtLeastRequirement,
} from './validation.types.js';

export function binaryPresent(binary: string, hint?: string): BinaryPresentRequirement {
  return { kind: 'binary-present', name: binary, binary, hint };
}

export function fileExists(path: string, name: string = path, hint?: string): FileExistsRequirement {
  return { kind: 'file-exists', name, path, hint };
}

export function versionAtLeast(
  binary: string,
  minimum: string,
  versionArgs: string[] = ['version'],
  hint?: string
): VersionAtLeastRequirement {
  return { kind: 'version-at-least', name: `${binary} >= ${minimum}`, binary, minimum, versionArgs, hint };
}

export function credentialValid(
  name: string,
  check: (signal?: AbortSignal) => Promise<string>,
  hint?: string
): CredentialValidRequirement {
  return { kind: 'credential-valid', name, check, hint };
}

function resolveIn(dir: string, path: string): string {
  return isAbsolute(path) ? path : join(dir, path);
}

/**
 * Everything a deployment of `env` needs before anything is changed
 */
export function requirementsForEnvironment(env: Environment, cloud: CloudService): Requirement[] {
  const requirements: Requirement[] = [
    binaryPresent('aws', 'Install the AWS CLI: https://aws.amazon.com/cli/'),
    binaryPresent('kubectl', 'Install kubectl: https://kubernetes.io/docs/tasks/tools/'),
    versionAtLeast(
      'terraform',
      MIN_TERRAFORM_VERSION,
      ['version'],
      'Install Terraform: https://developer.hashicorp.com/terraform/install'
    ),
    credentialValid(
      'cloud credentials',
      async (signal) => (await cloud.whoAmI(signal)).arn,
      'Run: aws configure (or set AWS_PROFILE)'
    ),
    fileExists(
      resolveIn(env.infrastructure.workingDir, env.infrastructure.varFile),
      'infrastructure variables file'
    ),
  ];

  if (env.gitops.sshKeyPath) {
    requirements.push(
      fileExists(
        env.gitops.sshKeyPath,
        'GitOps repository deploy key',
        `Generate one with: ssh-keygen -t ed25519 -f ${env.gitops.sshKeyPath}`
      )
    );
  }

  if (env.jobs) {
    requirements.push(fileExists(env.jobs.file, 'data job definitions'));
  }

  return requirements;
}

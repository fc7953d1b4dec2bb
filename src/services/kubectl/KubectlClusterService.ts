/**
 * Kubectl Cluster Service
 *
 * ClusterService backed by the kubectl CLI. The kubeconfig is passed with
 * `--kubeconfig` on every invocation instead of through KUBECONFIG.
 */

import { ClusterService } from '../ClusterService.js';
import type {
  ApplyOptions,
  ManifestPayload,
  ResourceCondition,
  ResourceRef,
  ResourceStatus,
} from '../ClusterService.js';
import { runCommand } from '../commandRunner.js';
import type { CommandResult, CommandRunner } from '../commandRunner.js';
import { classifyCommandFailure } from '../../utils/retry.js';
import { createLogger } from '../../utils/logger.js';
import {
  asArray,
  asNumber,
  asRecord,
  asString,
  getPath,
  parseJson,
} from '../../utils/helpers.js';
import { FatalActionError } from '../../utils/errors.js';

const logger = createLogger('kubectl');

const REQUEST_TIMEOUT = '--request-timeout=30s';

/**
 * Normalize `kubectl get -o json` output into a ResourceStatus
 */
export function parseResourceStatus(
  kind: string,
  name: string,
  namespace: string,
  json: unknown
): ResourceStatus {
  const conditions: Record<string, ResourceCondition> = {};
  for (const entry of asArray(getPath(json, 'status.conditions'))) {
    const type = asString(getPath(entry, 'type'));
    const status = asString(getPath(entry, 'status'));
    if (type && status) {
      conditions[type] = {
        status,
        reason: asString(getPath(entry, 'reason')),
        message: asString(getPath(entry, 'message')),
      };
    }
  }

  return {
    exists: true,
    kind,
    name,
    namespace: asString(getPath(json, 'metadata.namespace')) ?? namespace,
    conditions,
    replicas: asNumber(getPath(json, 'status.replicas')) ?? asNumber(getPath(json, 'spec.replicas')),
    readyReplicas: asNumber(getPath(json, 'status.readyReplicas')),
    availableReplicas: asNumber(getPath(json, 'status.availableReplicas')),
    succeeded: asNumber(getPath(json, 'status.succeeded')),
    failed: asNumber(getPath(json, 'status.failed')),
    active: asNumber(getPath(json, 'status.active')),
    phase: asString(getPath(json, 'status.phase')),
    raw: json,
  };
}

function isNotFound(result: CommandResult): boolean {
  return /\(NotFound\)|not found/i.test(result.stderr);
}

export class KubectlClusterService extends ClusterService {
  private readonly kubeconfigPath: string;
  private readonly run: CommandRunner;
  private readonly binary: string;

  constructor(kubeconfigPath: string, run: CommandRunner = runCommand, binary = 'kubectl') {
    super();
    this.kubeconfigPath = kubeconfigPath;
    this.run = run;
    this.binary = binary;
  }

  private kubectl(
    args: string[],
    options: { input?: string; signal?: AbortSignal } = {}
  ): Promise<CommandResult> {
    return this.run(this.binary, ['--kubeconfig', this.kubeconfigPath, ...args], options);
  }

  private async mustSucceed(
    args: string[],
    context: string,
    options: { input?: string; signal?: AbortSignal } = {}
  ): Promise<string> {
    const result = await this.kubectl(args, options);
    if (result.exitCode !== 0) {
      throw classifyCommandFailure(result, context);
    }
    return result.stdout;
  }

  async applyManifest(payload: ManifestPayload, options: ApplyOptions = {}): Promise<void> {
    const namespaceArgs = options.namespace ? ['-n', options.namespace] : [];

    switch (payload.kind) {
      case 'file':
        await this.mustSucceed(
          ['apply', ...namespaceArgs, '-f', payload.path],
          `kubectl apply -f ${payload.path}`,
          { signal: options.signal }
        );
        return;
      case 'kustomize':
        await this.mustSucceed(
          ['apply', ...namespaceArgs, '-k', payload.path],
          `kubectl apply -k ${payload.path}`,
          { signal: options.signal }
        );
        return;
      case 'url':
        // Large CRDs (argo-cd) exceed the client-side annotation limit
        await this.mustSucceed(
          ['apply', ...namespaceArgs, '--server-side', '--force-conflicts', '-f', payload.url],
          `kubectl apply -f ${payload.url}`,
          { signal: options.signal }
        );
        return;
      case 'inline':
        await this.mustSucceed(['apply', ...namespaceArgs, '-f', '-'], 'kubectl apply (inline)', {
          input: payload.yaml,
          signal: options.signal,
        });
        return;
    }
  }

  async getResourceStatus(
    kind: string,
    name: string,
    namespace: string,
    signal?: AbortSignal
  ): Promise<ResourceStatus> {
    const result = await this.kubectl(
      ['get', kind, name, '-n', namespace, '-o', 'json', REQUEST_TIMEOUT],
      { signal }
    );

    if (result.exitCode !== 0) {
      if (isNotFound(result)) {
        return { exists: false, kind, name, namespace, conditions: {} };
      }
      throw classifyCommandFailure(result, `kubectl get ${kind}/${name}`);
    }

    const json = parseJson(result.stdout);
    if (json === undefined) {
      throw new FatalActionError(`kubectl get ${kind}/${name} returned invalid JSON`);
    }
    return parseResourceStatus(kind, name, namespace, json);
  }

  async deleteResource(
    kind: string,
    name: string,
    namespace: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.mustSucceed(
      ['delete', kind, name, '-n', namespace, '--ignore-not-found=true'],
      `kubectl delete ${kind}/${name}`,
      { signal }
    );
  }

  async listResources(
    kind: string,
    namespace: string | 'all',
    signal?: AbortSignal
  ): Promise<ResourceRef[]> {
    const scope = namespace === 'all' ? ['--all-namespaces'] : ['-n', namespace];
    const stdout = await this.mustSucceed(
      ['get', kind, ...scope, '-o', 'json', REQUEST_TIMEOUT],
      `kubectl get ${kind}`,
      { signal }
    );

    const refs: ResourceRef[] = [];
    for (const item of asArray(getPath(parseJson(stdout), 'items'))) {
      const metadata = asRecord(getPath(item, 'metadata'));
      const name = asString(metadata?.name);
      if (name) {
        refs.push({ kind, name, namespace: asString(metadata?.namespace) });
      }
    }
    return refs;
  }

  async getLogs(
    namespace: string,
    selector: string,
    tailLines: number,
    signal?: AbortSignal
  ): Promise<string> {
    const result = await this.kubectl(
      ['logs', '-n', namespace, '-l', selector, `--tail=${tailLines}`, '--all-containers=true'],
      { signal }
    );

    if (result.exitCode !== 0) {
      logger.debug(`Could not read logs for ${selector}: ${result.stderr.trim()}`);
      return `(logs unavailable: ${result.stderr.trim() || `exit ${result.exitCode}`})`;
    }
    return result.stdout.trimEnd();
  }

  async ensureNamespace(namespace: string, signal?: AbortSignal): Promise<void> {
    await this.applyManifest(
      {
        kind: 'inline',
        yaml: `apiVersion: v1\nkind: Namespace\nmetadata:\n  name: ${namespace}\n`,
      },
      { signal }
    );
  }

  async isReachable(signal?: AbortSignal): Promise<boolean> {
    const result = await this.kubectl(['cluster-info', '--request-timeout=10s'], { signal });
    return result.exitCode === 0;
  }
}

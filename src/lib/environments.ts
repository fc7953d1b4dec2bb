/**
 * Environment definitions
 *
 * Each deployment target is described by an Environment. Every field has a
 * convention-based default derived from the environment name; a YAML file
 * (`deploy.config.yaml`) can override any of them per environment.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { parse } from 'yaml';
import type { ManifestPayload } from '../services/ClusterService.js';
import type { EndpointCheck, PlacementAssertion } from '../core/verification/index.js';
import { ConfigurationError, formatError } from '../utils/errors.js';
import { asRecord, expandHome } from '../utils/helpers.js';
import { ARGOCD_INSTALL_MANIFEST_URL, ARGOCD_NAMESPACE } from '../utils/constants.js';

// ============================================================================
// Types
// ============================================================================

export interface InfrastructureSettings {
  workingDir: string;
  varFile: string;
  backendConfig?: string;
  /** Names of the infrastructure outputs the pipeline reads */
  outputs: {
    clusterName: string;
    clusterEndpoint: string;
  };
}

export interface GitOpsSettings {
  namespace: string;
  installManifest: string;
  projectManifest?: string;
  appOfAppsManifest?: string;
  /** Kustomize directory holding every Application of the environment */
  applicationsDir?: string;
  /** Applications to await; every Application in the namespace when empty */
  applications: string[];
  sshKeyPath?: string;
  /** Applied right after the controller (repository credentials, sealed secrets) */
  bootstrapManifests: string[];
}

export interface Environment {
  readonly name: string;
  /** Protected environments require typed confirmation before mutating steps */
  readonly protected: boolean;
  readonly region: string;
  readonly clusterName: string;
  /** Namespace of the workloads */
  readonly namespace: string;
  readonly kubeconfigPath: string;
  readonly infrastructure: Readonly<InfrastructureSettings>;
  readonly gitops: Readonly<GitOpsSettings>;
  readonly jobs?: Readonly<{ file: string }>;
  readonly verification: Readonly<{
    placements: PlacementAssertion[];
    endpoints: EndpointCheck[];
  }>;
}

export const BUILT_IN_ENVIRONMENTS = ['dev', 'uat', 'prod'] as const;

const ENVIRONMENT_NAME = /^[a-z0-9][a-z0-9-]*$/;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Defaults derived from the environment name
 */
export function conventionDefaults(name: string): Environment {
  const clusterName = `${name}-eks`;
  return {
    name,
    protected: name === 'prod',
    region: 'us-east-1',
    clusterName,
    namespace: `apps-${name}`,
    kubeconfigPath: expandHome(`~/.kube/config-${clusterName}`),
    infrastructure: {
      workingDir: 'terraform/aws',
      varFile: `environments/${name}-eks.tfvars`,
      backendConfig: `backend-${name}.tfbackend`,
      outputs: {
        clusterName: 'eks_cluster_name',
        clusterEndpoint: 'eks_cluster_endpoint',
      },
    },
    gitops: {
      namespace: ARGOCD_NAMESPACE,
      installManifest: ARGOCD_INSTALL_MANIFEST_URL,
      projectManifest: `argocd/projects/project-${name}.yaml`,
      appOfAppsManifest: `argocd/bootstrap/${name}/app-of-apps.yaml`,
      applicationsDir: `argocd/applications/${name}`,
      applications: [],
      bootstrapManifests: [],
    },
    verification: { placements: [], endpoints: [] },
  };
}

/**
 * Turn a manifest reference into a payload: URLs, kustomize directories and files
 */
export function manifestPayload(reference: string): ManifestPayload {
  if (/^https?:\/\//.test(reference)) {
    return { kind: 'url', url: reference };
  }
  if (!/\.ya?ml$|\.json$/.test(reference)) {
    return { kind: 'kustomize', path: reference };
  }
  return { kind: 'file', path: reference };
}

// ============================================================================
// Parsing
// ============================================================================

type Fields = Record<string, unknown>;

function section(source: Fields, key: string, where: string): Fields {
  const value = source[key];
  if (value === undefined || value === null) return {};
  const record = asRecord(value);
  if (!record) {
    throw new ConfigurationError(`${where}.${key} must be a mapping`);
  }
  return record;
}

function optionalString(source: Fields, key: string, where: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalBoolean(source: Fields, key: string, where: string): boolean | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${where}.${key} must be true or false`);
  }
  return value;
}

function stringList(source: Fields, key: string, where: string): string[] | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${where}.${key} must be a list of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConfigurationError(`${where}.${key} must be a list of strings`);
    }
    items.push(item);
  }
  return items;
}

function entries(source: Fields, key: string, where: string): Fields[] {
  const value = source[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${where}.${key} must be a list`);
  }
  return value.map((item, index) => {
    const record = asRecord(item);
    if (!record) {
      throw new ConfigurationError(`${where}.${key}[${index}] must be a mapping`);
    }
    return record;
  });
}

function requiredString(source: Fields, key: string, where: string): string {
  const value = optionalString(source, key, where);
  if (value === undefined) {
    throw new ConfigurationError(`${where}.${key} is required`);
  }
  return value;
}

function parsePlacements(source: Fields, where: string): PlacementAssertion[] {
  return entries(source, 'placements', where).map((entry, index) => {
    const at = `${where}.placements[${index}]`;
    const rawMinReady = entry['minReady'];
    let minReady: number | undefined;
    if (rawMinReady !== undefined) {
      if (typeof rawMinReady !== 'number' || rawMinReady < 0) {
        throw new ConfigurationError(`${at}.minReady must be a non-negative number`);
      }
      minReady = rawMinReady;
    }
    return {
      kind: requiredString(entry, 'kind', at),
      name: requiredString(entry, 'name', at),
      namespace: requiredString(entry, 'namespace', at),
      minReady,
    };
  });
}

function parseEndpoints(source: Fields, where: string): EndpointCheck[] {
  return entries(source, 'endpoints', where).map((entry, index) => {
    const at = `${where}.endpoints[${index}]`;
    const rawStatus = entry['expectStatus'];
    let expectStatus: number[] | undefined;
    if (rawStatus !== undefined) {
      if (!Array.isArray(rawStatus)) {
        throw new ConfigurationError(`${at}.expectStatus must be a list of status codes`);
      }
      expectStatus = [];
      for (const code of rawStatus) {
        if (typeof code !== 'number') {
          throw new ConfigurationError(`${at}.expectStatus must be a list of status codes`);
        }
        expectStatus.push(code);
      }
    }
    return {
      name: requiredString(entry, 'name', at),
      url: requiredString(entry, 'url', at),
      expectStatus,
    };
  });
}

/**
 * Merge one `environments.<name>` entry over the convention defaults
 */
export function buildEnvironment(name: string, overrides: Fields = {}): Environment {
  if (!ENVIRONMENT_NAME.test(name)) {
    throw new ConfigurationError(
      `Invalid environment name '${name}' (lowercase letters, digits and dashes)`
    );
  }

  const where = `environments.${name}`;
  const defaults = conventionDefaults(name);
  const clusterName = optionalString(overrides, 'clusterName', where) ?? defaults.clusterName;

  const infra = section(overrides, 'infrastructure', where);
  const infraWhere = `${where}.infrastructure`;
  const outputs = section(infra, 'outputs', infraWhere);
  const gitops = section(overrides, 'gitops', where);
  const gitopsWhere = `${where}.gitops`;
  const jobs = section(overrides, 'jobs', where);
  const verification = section(overrides, 'verification', where);
  const verificationWhere = `${where}.verification`;

  const sshKeyPath = optionalString(gitops, 'sshKeyPath', gitopsWhere);
  const kubeconfigPath = optionalString(overrides, 'kubeconfigPath', where);
  const jobsFile = optionalString(jobs, 'file', `${where}.jobs`);

  return {
    name,
    protected: optionalBoolean(overrides, 'protected', where) ?? defaults.protected,
    region: optionalString(overrides, 'region', where) ?? defaults.region,
    clusterName,
    namespace: optionalString(overrides, 'namespace', where) ?? defaults.namespace,
    kubeconfigPath: kubeconfigPath
      ? expandHome(kubeconfigPath)
      : expandHome(`~/.kube/config-${clusterName}`),
    infrastructure: {
      workingDir:
        optionalString(infra, 'workingDir', infraWhere) ?? defaults.infrastructure.workingDir,
      varFile: optionalString(infra, 'varFile', infraWhere) ?? defaults.infrastructure.varFile,
      backendConfig:
        optionalString(infra, 'backendConfig', infraWhere) ?? defaults.infrastructure.backendConfig,
      outputs: {
        clusterName:
          optionalString(outputs, 'clusterName', `${infraWhere}.outputs`) ??
          defaults.infrastructure.outputs.clusterName,
        clusterEndpoint:
          optionalString(outputs, 'clusterEndpoint', `${infraWhere}.outputs`) ??
          defaults.infrastructure.outputs.clusterEndpoint,
      },
    },
    gitops: {
      namespace: optionalString(gitops, 'namespace', gitopsWhere) ?? defaults.gitops.namespace,
      installManifest:
        optionalString(gitops, 'installManifest', gitopsWhere) ?? defaults.gitops.installManifest,
      projectManifest:
        optionalString(gitops, 'projectManifest', gitopsWhere) ?? defaults.gitops.projectManifest,
      appOfAppsManifest:
        optionalString(gitops, 'appOfAppsManifest', gitopsWhere) ??
        defaults.gitops.appOfAppsManifest,
      applicationsDir:
        optionalString(gitops, 'applicationsDir', gitopsWhere) ?? defaults.gitops.applicationsDir,
      applications: stringList(gitops, 'applications', gitopsWhere) ?? [],
      sshKeyPath: sshKeyPath ? expandHome(sshKeyPath) : undefined,
      bootstrapManifests: stringList(gitops, 'bootstrapManifests', gitopsWhere) ?? [],
    },
    jobs: jobsFile ? { file: jobsFile } : undefined,
    verification: {
      placements: parsePlacements(verification, verificationWhere),
      endpoints: parseEndpoints(verification, verificationWhere),
    },
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadEnvironmentOptions {
  configFile: string;
  /** The file was named explicitly, so it must exist */
  required?: boolean;
}

/**
 * Read the `environments` map of a configuration file
 */
export async function readEnvironmentsFile(path: string): Promise<Record<string, Fields>> {
  let document: unknown;
  try {
    document = parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read ${path}: ${formatError(error)}`);
  }

  const root = asRecord(document) ?? {};
  const environments = section(root, 'environments', path);
  const result: Record<string, Fields> = {};
  for (const [name, value] of Object.entries(environments)) {
    result[name] = asRecord(value) ?? {};
  }
  return result;
}

/**
 * Names of the environments available with this configuration
 */
export async function listEnvironments(options: LoadEnvironmentOptions): Promise<string[]> {
  if (!existsSync(options.configFile)) {
    return [...BUILT_IN_ENVIRONMENTS];
  }
  return Object.keys(await readEnvironmentsFile(options.configFile));
}

/**
 * Resolve an environment by name. The result is frozen.
 */
export async function loadEnvironment(
  name: string,
  options: LoadEnvironmentOptions
): Promise<Environment> {
  if (!existsSync(options.configFile)) {
    if (options.required) {
      throw new ConfigurationError(`Configuration file not found: ${options.configFile}`);
    }
    if (!BUILT_IN_ENVIRONMENTS.some((builtIn) => builtIn === name)) {
      throw new ConfigurationError(
        `Unknown environment '${name}' (available: ${BUILT_IN_ENVIRONMENTS.join(', ')})`
      );
    }
    return deepFreeze(buildEnvironment(name));
  }

  const environments = await readEnvironmentsFile(options.configFile);
  const overrides = environments[name];
  if (!overrides) {
    const available = Object.keys(environments).join(', ') || 'none';
    throw new ConfigurationError(
      `Unknown environment '${name}' in ${options.configFile} (available: ${available})`
    );
  }
  return deepFreeze(buildEnvironment(name, overrides));
}

/**
 * Job file loader
 *
 * Reads a YAML job plan:
 *
 *   namespace: apps-dev
 *   defaults:
 *     pollTimeoutSeconds: 600
 *     pollIntervalSeconds: 10
 *   setup:
 *     - jobs/shared
 *   jobs:
 *     - name: load-foundation
 *       wave: 5
 *       manifest: jobs/load-foundation.yaml
 *
 * Manifest paths are relative to the job file. A file manifest must hold a
 * Job whose metadata.name is the declared job name, since the scheduler
 * deletes and watches `job/<name>`.
 */

import { readFile } from 'fs/promises';
import { dirname, isAbsolute, join } from 'path';
import { parse, parseAllDocuments } from 'yaml';
import { manifestPayload } from '../../lib/environments.js';
import type { ManifestPayload } from '../../services/ClusterService.js';
import { ConfigurationError, formatError } from '../../utils/errors.js';
import { asArray, asNumber, asRecord, asString, getPath } from '../../utils/helpers.js';
import type { JobPlan, JobSpec } from './jobs.types.js';

function resolveManifest(reference: string, baseDir: string): ManifestPayload {
  const payload = manifestPayload(reference);
  if (isAbsolute(reference)) {
    return payload;
  }
  switch (payload.kind) {
    case 'file':
      return { kind: 'file', path: join(baseDir, payload.path) };
    case 'kustomize':
      return { kind: 'kustomize', path: join(baseDir, payload.path) };
    default:
      return payload;
  }
}

function seconds(value: unknown, where: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  const parsed = asNumber(value);
  if (parsed === undefined || parsed <= 0) {
    throw new ConfigurationError(`${where} must be a positive number of seconds`);
  }
  return parsed * 1000;
}

/**
 * Parse a job plan document
 *
 * @param fallbackNamespace - Used when neither the file nor a job names one
 */
export function parseJobPlan(document: unknown, file: string, fallbackNamespace: string): JobPlan {
  const root = asRecord(document);
  if (!root) {
    throw new ConfigurationError(`${file} must contain a mapping`);
  }

  const baseDir = dirname(file);
  const namespace = asString(root.namespace) ?? fallbackNamespace;
  const defaults = asRecord(root.defaults) ?? {};
  const defaultTimeout = seconds(defaults.pollTimeoutSeconds, `${file}: defaults.pollTimeoutSeconds`);
  const defaultInterval = seconds(
    defaults.pollIntervalSeconds,
    `${file}: defaults.pollIntervalSeconds`
  );

  const setup = asArray(root.setup).map((entry, index) => {
    const reference = asString(entry);
    if (!reference) {
      throw new ConfigurationError(`${file}: setup[${index}] must be a manifest path`);
    }
    return resolveManifest(reference, baseDir);
  });

  if (root.jobs !== undefined && !Array.isArray(root.jobs)) {
    throw new ConfigurationError(`${file}: jobs must be a list`);
  }

  const jobs = asArray(root.jobs).map((entry, index): JobSpec => {
    const where = `${file}: jobs[${index}]`;
    const job = asRecord(entry);
    if (!job) {
      throw new ConfigurationError(`${where} must be a mapping`);
    }

    const name = asString(job.name);
    const wave = asNumber(job.wave);
    const manifest = asString(job.manifest);
    if (!name) throw new ConfigurationError(`${where}.name is required`);
    if (wave === undefined) throw new ConfigurationError(`${where}.wave is required`);
    if (!manifest) throw new ConfigurationError(`${where}.manifest is required`);

    return {
      name,
      wave,
      namespace: asString(job.namespace) ?? namespace,
      payload: resolveManifest(manifest, baseDir),
      pollTimeoutMs: seconds(job.pollTimeoutSeconds, `${where}.pollTimeoutSeconds`) ?? defaultTimeout,
      pollIntervalMs:
        seconds(job.pollIntervalSeconds, `${where}.pollIntervalSeconds`) ?? defaultInterval,
    };
  });

  return { namespace, setup, jobs };
}

/**
 * Fail unless the job's manifest file declares `Job/<job.name>`.
 * Kustomize and URL payloads are only known to the cluster and are not checked.
 */
async function assertJobManifest(job: JobSpec): Promise<void> {
  if (job.payload.kind !== 'file') return;

  const path = job.payload.path;
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Could not read manifest of job '${job.name}': ${formatError(error)}`);
  }

  const documents = parseAllDocuments(text);
  const broken = documents.find((document) => document.errors.length > 0);
  if (broken) {
    throw new ConfigurationError(`${path} is not valid YAML: ${broken.errors[0].message}`);
  }

  const declared = documents
    .map((document): unknown => document.toJS())
    .filter((resource) => asString(getPath(resource, 'kind')) === 'Job')
    .map((resource) => asString(getPath(resource, 'metadata.name')) ?? '');

  if (!declared.includes(job.name)) {
    const found =
      declared.length > 0
        ? `declares Job ${declared.map((name) => `'${name}'`).join(', ')}`
        : 'declares no Job';
    throw new ConfigurationError(`${path} ${found}, expected Job '${job.name}'`);
  }
}

/**
 * Read and parse a YAML job plan, checking each job's manifest
 */
export async function loadJobSpecs(file: string, fallbackNamespace: string): Promise<JobPlan> {
  let document: unknown;
  try {
    document = parse(await readFile(file, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read job file ${file}: ${formatError(error)}`);
  }
  const plan = parseJobPlan(document, file, fallbackNamespace);
  for (const job of plan.jobs) {
    await assertJobManifest(job);
  }
  return plan;
}

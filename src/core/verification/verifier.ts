/**
 * Deployment Verifier
 * Placement assertions against the cluster and reachability checks over HTTP
 */

import https from 'https';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { ClusterService } from '../../services/ClusterService.js';
import { formatError } from '../../utils/errors.js';
import { HTTP_CHECK_TIMEOUT_MS } from '../../utils/constants.js';
import type {
  EndpointCheck,
  PlacementAssertion,
  VerificationCheck,
  VerificationReport,
  VerificationSpec,
} from './verification.types.js';

/**
 * HTTP client for endpoint checks: self-signed certificates are accepted,
 * redirects are not followed and every status resolves.
 */
export function createHttpClient(): AxiosInstance {
  return axios.create({
    timeout: HTTP_CHECK_TIMEOUT_MS,
    maxRedirects: 0,
    validateStatus: () => true,
    httpsAgent: new https.Agent({ rejectUnauthorized: false }),
  });
}

export async function verifyPlacement(
  cluster: ClusterService,
  assertion: PlacementAssertion,
  signal?: AbortSignal
): Promise<VerificationCheck> {
  const name = `${assertion.kind}/${assertion.name}`;
  const status = await cluster.getResourceStatus(
    assertion.kind,
    assertion.name,
    assertion.namespace,
    signal
  );

  if (!status.exists) {
    const elsewhere = (await cluster.listResources(assertion.kind, 'all', signal)).find(
      (ref) => ref.name === assertion.name
    );
    return {
      name,
      severity: 'fail',
      message: elsewhere
        ? `found in namespace ${elsewhere.namespace ?? '(cluster)'}, expected ${assertion.namespace}`
        : `not found in namespace ${assertion.namespace}`,
    };
  }

  if (assertion.minReady !== undefined) {
    const ready = status.readyReplicas ?? 0;
    if (ready < assertion.minReady) {
      return {
        name,
        severity: 'warn',
        message: `in ${assertion.namespace}, ${ready}/${assertion.minReady} ready`,
      };
    }
  }

  return { name, severity: 'pass', message: `in ${assertion.namespace}` };
}

export async function verifyEndpoint(
  http: AxiosInstance,
  check: EndpointCheck,
  signal?: AbortSignal
): Promise<VerificationCheck> {
  const response = await http.get(check.url, { signal });
  const accepted = check.expectStatus
    ? check.expectStatus.includes(response.status)
    : response.status < 500;

  return {
    name: check.name,
    severity: accepted ? 'pass' : 'fail',
    message: `${check.url} answered ${response.status}`,
  };
}

/**
 * Run every check; a check that throws is recorded as a failure
 */
export async function verifyDeployment(
  cluster: ClusterService,
  http: AxiosInstance,
  spec: VerificationSpec,
  signal?: AbortSignal
): Promise<VerificationReport> {
  const checks: VerificationCheck[] = [];

  for (const assertion of spec.placements) {
    try {
      checks.push(await verifyPlacement(cluster, assertion, signal));
    } catch (error) {
      checks.push({
        name: `${assertion.kind}/${assertion.name}`,
        severity: 'fail',
        message: formatError(error),
      });
    }
  }

  for (const endpoint of spec.endpoints) {
    try {
      checks.push(await verifyEndpoint(http, endpoint, signal));
    } catch (error) {
      checks.push({ name: endpoint.name, severity: 'fail', message: formatError(error) });
    }
  }

  const failures = checks.filter((check) => check.severity === 'fail').length;
  const warnings = checks.filter((check) => check.severity === 'warn').length;

  return { ok: failures === 0, checks, failures, warnings };
}

/**
 * Verification Domain Types
 */

/**
 * A resource that must exist in exactly one expected namespace
 */
export interface PlacementAssertion {
  /** deployment, statefulset, service, ... */
  kind: string;
  name: string;
  namespace: string;
  /** Fewer ready replicas is reported as a warning, not a failure */
  minReady?: number;
}

/**
 * An HTTP endpoint that must answer
 */
export interface EndpointCheck {
  name: string;
  url: string;
  /** Accepted status codes; defaults to anything below 500 */
  expectStatus?: number[];
}

export interface VerificationSpec {
  placements: PlacementAssertion[];
  endpoints: EndpointCheck[];
}

export type CheckSeverity = 'pass' | 'warn' | 'fail';

export interface VerificationCheck {
  name: string;
  severity: CheckSeverity;
  message: string;
}

export interface VerificationReport {
  ok: boolean;
  checks: VerificationCheck[];
  failures: number;
  warnings: number;
}

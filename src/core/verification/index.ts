/**
 * Verification Module
 */

export { verifyDeployment, verifyPlacement, verifyEndpoint, createHttpClient } from './verifier.js';

export type {
  PlacementAssertion,
  EndpointCheck,
  VerificationSpec,
  VerificationCheck,
  VerificationReport,
  CheckSeverity,
} from './verification.types.js';

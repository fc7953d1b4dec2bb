/**
 * Validation Module
 * Prerequisite checks run before any mutating step
 */

export { PrerequisiteValidator, compareVersions } from './validator.js';
export { HostSystemProbe, extractVersion } from './systemProbe.js';
export {
  binaryPresent,
  fileExists,
  versionAtLeast,
  credentialValid,
  requirementsForEnvironment,
} from './requirements.js';

export type {
  Requirement,
  RequirementPass,
  ValidationReport,
  SystemProbe,
  BinaryPresentRequirement,
  CredentialValidRequirement,
  FileExistsRequirement,
  VersionAtLeastRequirement,
} from './validation.types.js';

/**
 * Validation Domain Types
 */

import type { RequirementFailure } from '../../utils/errors.js';

interface RequirementBase {
  /** Shown in reports, e.g. "kubectl" or "terraform var file" */
  name: string;
  /** How to fix it */
  hint?: string;
}

export interface BinaryPresentRequirement extends RequirementBase {
  kind: 'binary-present';
  binary: string;
}

export interface CredentialValidRequirement extends RequirementBase {
  kind: 'credential-valid';
  /** Resolves with a description of the identity, rejects when invalid */
  check: (signal?: AbortSignal) => Promise<string>;
}

export interface FileExistsRequirement extends RequirementBase {
  kind: 'file-exists';
  path: string;
}

export interface VersionAtLeastRequirement extends RequirementBase {
  kind: 'version-at-least';
  binary: string;
  minimum: string;
  versionArgs: string[];
}

export type Requirement =
  | BinaryPresentRequirement
  | CredentialValidRequirement
  | FileExistsRequirement
  | VersionAtLeastRequirement;

export interface RequirementPass {
  name: string;
  detail: string;
}

export interface ValidationReport {
  ok: boolean;
  passed: RequirementPass[];
  failures: RequirementFailure[];
}

/**
 * Read-only view of the host the validator inspects
 */
export interface SystemProbe {
  /** Absolute path of the executable, or undefined when not on PATH */
  findExecutable(binary: string): Promise<string | undefined>;
  /** First x.y.z version printed by `<binary> <args>` */
  readVersion(binary: string, args: string[], signal?: AbortSignal): Promise<string | undefined>;
  isReadable(path: string): Promise<boolean>;
}

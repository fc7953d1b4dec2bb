/**
 * Prerequisite Validator
 *
 * Evaluates every requirement, even after one fails, so the operator sees the
 * complete list of what is missing in a single run.
 */

import { ValidationError, formatError } from '../../utils/errors.js';
import type { RequirementFailure } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { HostSystemProbe } from './systemProbe.js';
import type {
  Requirement,
  RequirementPass,
  SystemProbe,
  ValidationReport,
} from './validation.types.js';

const logger = createLogger('validate');

/**
 * Compare dotted versions numerically. Missing parts count as 0, a leading `v` is ignored.
 *
 * @returns negative when a < b, 0 when equal, positive when a > b
 */
export function compareVersions(a: string, b: string): number {
  const parse = (version: string) =>
    version
      .replace(/^v/, '')
      .split('.')
      .map((part) => parseInt(part, 10) || 0);

  const left = parse(a);
  const right = parse(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) {
      return diff < 0 ? -1 : 1;
    }
  }
  return 0;
}

type Evaluation = { ok: true; detail: string } | { ok: false; reason: string };

export class PrerequisiteValidator {
  private readonly probe: SystemProbe;

  constructor(probe: SystemProbe = new HostSystemProbe()) {
    this.probe = probe;
  }

  /**
   * Evaluate all requirements and return the report without throwing
   */
  async check(requirements: Requirement[], signal?: AbortSignal): Promise<ValidationReport> {
    const passed: RequirementPass[] = [];
    const failures: RequirementFailure[] = [];

    for (const requirement of requirements) {
      let evaluation: Evaluation;
      try {
        evaluation = await this.evaluate(requirement, signal);
      } catch (error) {
        evaluation = { ok: false, reason: formatError(error) };
      }

      if (evaluation.ok) {
        logger.debug(`✓ ${requirement.name}: ${evaluation.detail}`);
        passed.push({ name: requirement.name, detail: evaluation.detail });
      } else {
        logger.debug(`✗ ${requirement.name}: ${evaluation.reason}`);
        failures.push({ name: requirement.name, reason: evaluation.reason, hint: requirement.hint });
      }
    }

    return { ok: failures.length === 0, passed, failures };
  }

  /**
   * Evaluate all requirements; throws ValidationError listing every failure
   */
  async validate(requirements: Requirement[], signal?: AbortSignal): Promise<ValidationReport> {
    const report = await this.check(requirements, signal);
    if (!report.ok) {
      throw new ValidationError(report.failures);
    }
    return report;
  }

  private async evaluate(requirement: Requirement, signal?: AbortSignal): Promise<Evaluation> {
    switch (requirement.kind) {
      case 'binary-present': {
        const path = await this.probe.findExecutable(requirement.binary);
        return path
          ? { ok: true, detail: path }
          : { ok: false, reason: `${requirement.binary} not found on PATH` };
      }

      case 'file-exists': {
        const readable = await this.probe.isReadable(requirement.path);
        return readable
          ? { ok: true, detail: requirement.path }
          : { ok: false, reason: `${requirement.path} does not exist or is not readable` };
      }

      case 'credential-valid': {
        const identity = await requirement.check(signal);
        return { ok: true, detail: identity };
      }

      case 'version-at-least': {
        const path = await this.probe.findExecutable(requirement.binary);
        if (!path) {
          return { ok: false, reason: `${requirement.binary} not found on PATH` };
        }
        const version = await this.probe.readVersion(
          requirement.binary,
          requirement.versionArgs,
          signal
        );
        if (!version) {
          return { ok: false, reason: `could not determine ${requirement.binary} version` };
        }
        if (compareVersions(version, requirement.minimum) < 0) {
          return {
            ok: false,
            reason: `version ${version} is older than required ${requirement.minimum}`,
          };
        }
        return { ok: true, detail: `version ${version}` };
      }
    }
  }
}
